import { v4 as uuidv4 } from "uuid";
import type { DatasetOverview } from "@shelter/shared";
import { parseAdoptionCsv, summarizeDataset } from "@core";

export interface UploadPreview {
  analysisId: string;
  filename: string;
  overview: DatasetOverview;
}

export class IngestService {
  /**
   * Parse an uploaded CSV into a throwaway record set and summarize it.
   * The record set the server was started with is left untouched.
   */
  static previewUpload(fileBuffer: Buffer, filename: string): UploadPreview {
    const analysisId = uuidv4();
    const recordSet = parseAdoptionCsv(fileBuffer, filename);
    console.log(`[Ingest] Preview ${analysisId}: ${recordSet.records.length} records from ${filename}`);
    return { analysisId, filename, overview: summarizeDataset(recordSet) };
  }
}
