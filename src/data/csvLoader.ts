import { readFileSync } from "fs";
import type { Readable } from "stream";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { AdoptionRowSchema, REQUIRED_COLUMNS } from "@shelter/shared";
import type { AdoptionRecord, RecordSet } from "@shelter/shared";
import { LoadError } from "../errors.js";
import { deriveCalendarFields, parseTimestamp } from "./timestamp.js";

const RawTableSchema = z.array(z.array(z.string()));

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function parseTable(input: string | Buffer, source: string): string[][] {
  let raw: unknown;
  try {
    raw = parse(input, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error: unknown) {
    // csv-parse rejects malformed input (unbalanced quotes, uneven cell counts)
    const message = error instanceof Error ? error.message : String(error);
    throw new LoadError("ParseFailure", `Malformed CSV in ${source}: ${message}`, {
      source,
      csvCode: errorCode(error),
    });
  }
  return RawTableSchema.parse(raw);
}

/**
 * Parse adoption CSV content into an immutable record set.
 *
 * Rules:
 * - header must contain Outcome, AnimalNumber, Species, DateTime (extra columns ignored)
 * - every DateTime must parse, otherwise nothing is loaded
 * - derived calendar fields are computed here once and frozen
 */
export function parseAdoptionCsv(input: string | Buffer, source: string): RecordSet {
  const [header = [], ...rows] = parseTable(input, source);

  const missing = REQUIRED_COLUMNS.filter(col => !header.includes(col));
  if (missing.length > 0) {
    throw new LoadError("MissingColumn", `Missing required column(s) in ${source}: ${missing.join(", ")}`, {
      source,
      missing,
      found: header,
    });
  }

  const index = {
    Outcome: header.indexOf("Outcome"),
    AnimalNumber: header.indexOf("AnimalNumber"),
    Species: header.indexOf("Species"),
    DateTime: header.indexOf("DateTime"),
  };

  const records: Readonly<AdoptionRecord>[] = rows.map((cells, i) => {
    const rowNumber = i + 1;
    const result = AdoptionRowSchema.safeParse({
      Outcome: cells[index.Outcome] ?? "",
      AnimalNumber: cells[index.AnimalNumber] ?? "",
      Species: cells[index.Species] ?? "",
      DateTime: cells[index.DateTime] ?? "",
    });

    if (!result.success) {
      throw new LoadError("ParseFailure", `Row ${rowNumber}: ${result.error.issues.map(x => x.message).join("; ")}`, {
        source,
        row: rowNumber,
      });
    }

    const row = result.data;
    const civil = parseTimestamp(row.DateTime);
    if (!civil) {
      throw new LoadError("ParseFailure", `Row ${rowNumber}: unparseable DateTime "${row.DateTime}"`, {
        source,
        row: rowNumber,
        value: row.DateTime,
      });
    }

    return Object.freeze({
      outcome: row.Outcome,
      animalId: row.AnimalNumber,
      species: row.Species,
      ...deriveCalendarFields(civil),
    });
  });

  const noSpecies = records.filter(r => r.species === "").length;
  if (noSpecies > 0) {
    console.warn(`[CSV Loader] ${noSpecies} row(s) in ${source} have no Species; grouped under ""`);
  }

  console.log(`[CSV Loader] Loaded ${records.length} adoption records from ${source}`);

  return Object.freeze({
    source,
    loadedAt: new Date().toISOString(),
    records: Object.freeze(records),
  });
}

/**
 * Read and parse a CSV file synchronously.
 */
export function loadAdoptionRecords(path: string): RecordSet {
  let content: Buffer;
  try {
    content = readFileSync(path);
  } catch (error: unknown) {
    const code = errorCode(error);
    throw new LoadError("SourceNotFound", `Cannot open ${path}${code ? ` (${code})` : ""}`, {
      source: path,
      fsCode: code,
    });
  }
  return parseAdoptionCsv(content, path);
}

/**
 * Collect a readable stream (e.g. stdin) and parse it once it ends.
 */
export async function loadAdoptionRecordsFromStream(stream: Readable, source = "stream"): Promise<RecordSet> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LoadError("SourceNotFound", `Cannot read ${source}: ${message}`, { source });
  }
  return parseAdoptionCsv(Buffer.concat(chunks), source);
}

export function load(source: string): RecordSet;
export function load(source: Readable): Promise<RecordSet>;
export function load(source: string | Readable): RecordSet | Promise<RecordSet> {
  return typeof source === "string" ? loadAdoptionRecords(source) : loadAdoptionRecordsFromStream(source);
}
