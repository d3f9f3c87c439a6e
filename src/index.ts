export { LoadError, DomainError, isLoadError, isDomainError } from "./errors.js";
export { parseTimestamp, deriveCalendarFields } from "./data/timestamp.js";
export type { CivilDateTime, CalendarFields } from "./data/timestamp.js";
export { load, loadAdoptionRecords, loadAdoptionRecordsFromStream, parseAdoptionCsv } from "./data/csvLoader.js";
export {
    aggregate,
    applyFilter,
    averageDailyVolume,
    availableMonths,
    availableWeekdays,
    countBy,
    dailyCounts,
    densifyHourly,
    hourlyAverages,
    hourlyTotals,
    matchesFilter,
    monthlyCounts,
    peakHour,
    speciesDistribution,
    weekdayCounts,
    weekdayDistribution,
} from "./logic/aggregation.js";
export {
    assessCapacity,
    capacityUtilization,
    classifyCapacity,
    estimate,
    estimatePeak,
    guestBreakdown,
    hourlyWorkload,
    nonAdoptingMultiplier,
    timeBreakdown,
    validateWorkloadParams,
} from "./logic/workload/workloadEstimator.js";
export { calculateCounselorNeeds } from "./logic/workload/counselorNeeds.js";
export type { CounselorNeedsOptions } from "./logic/workload/counselorNeeds.js";
export { calculateDailyTrend, dailyStats, linearTrend, sampleStd } from "./logic/trendEngine.js";
export { dailyDistribution, fitNormal, histogram, hourlyDensity, normalCurve, normalPdf } from "./logic/distribution.js";
export { summarizeDataset } from "./logic/overview.js";
export { formatSummaryReport } from "./logic/report.js";
