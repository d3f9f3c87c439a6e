import type { DatasetOverview, RecordSet } from "@shelter/shared";
import { availableMonths, availableWeekdays, dailyCounts, speciesDistribution } from "./aggregation.js";

/**
 * Headline facts about a loaded record set. Empty sets report nulls rather than failing.
 */
export function summarizeDataset(recordSet: RecordSet): DatasetOverview {
    const { records } = recordSet;
    const timestamps = records.map(r => r.timestamp).sort();
    const daily = dailyCounts(records);

    return {
        source: recordSet.source,
        totalRecords: records.length,
        firstTimestamp: timestamps[0] ?? null,
        lastTimestamp: timestamps[timestamps.length - 1] ?? null,
        averageDailyAdoptions: daily.length === 0 ? null : records.length / daily.length,
        species: Array.from(new Set(records.map(r => r.species))),
        speciesCounts: speciesDistribution(records),
        availableWeekdays: availableWeekdays(records),
        availableMonths: availableMonths(records),
    };
}
