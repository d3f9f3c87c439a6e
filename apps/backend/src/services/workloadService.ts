import type { CounselorNeedsReport, RecordSet, WorkloadQuery } from "@shelter/shared";
import { calculateCounselorNeeds } from "@core";
import type { AppConfig } from "../config";

export class WorkloadService {
  /**
   * Counselor needs for a parsed query; unset parameters take the configured defaults.
   */
  static forecast(recordSet: RecordSet, query: WorkloadQuery, config: AppConfig): CounselorNeedsReport {
    const { defaults } = config;
    return calculateCounselorNeeds(
      recordSet,
      {
        minutesPerAdoption: query.minutesPerAdoption ?? defaults.minutesPerAdoption,
        nonAdoptingPercent: query.nonAdoptingPercent ?? defaults.nonAdoptingPercent,
        counselorCount: query.counselorCount ?? defaults.counselorCount,
      },
      {
        filter: { weekday: query.weekday, species: query.species, month: query.month },
        workdayHours: query.workdayHours ?? config.workdayHours,
        dailyVolumeOverride: query.dailyVolume,
        peakDayAdoptions: query.peakDayAdoptions,
      }
    );
  }
}
