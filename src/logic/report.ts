import type { CounselorNeedsReport, DatasetOverview, RecordFilter } from "@shelter/shared";
import { formatCount, formatHour, formatOneDecimal } from "../utils/numberFormatter.js";

const RULE = "=".repeat(60);

const STATUS_LABELS = {
    "under-utilized": "UNDER-UTILIZED",
    optimal: "OPTIMAL",
    "over-capacity": "OVER-CAPACITY",
} as const;

function describeFilter(filter: RecordFilter): string | null {
    const parts: string[] = [];
    if (filter.weekday) parts.push(`weekday=${filter.weekday}`);
    if (filter.species) parts.push(`species=${filter.species}`);
    if (filter.month !== undefined) parts.push(`month=${filter.month}`);
    return parts.length ? parts.join(", ") : null;
}

/**
 * Plain-text summary printed by the forecast script.
 */
export function formatSummaryReport(overview: DatasetOverview, needs: CounselorNeedsReport): string {
    const { daily, peakHour, capacity } = needs;
    const first = overview.firstTimestamp?.slice(0, 10) ?? "--";
    const last = overview.lastTimestamp?.slice(0, 10) ?? "--";
    const filterText = describeFilter(needs.filter);

    const lines = [
        RULE,
        "ADOPTION DEMAND FORECAST SUMMARY REPORT",
        RULE,
        "",
        "DATA OVERVIEW:",
        `   - Total adoption records: ${formatCount(overview.totalRecords)}`,
        `   - Date range: ${first} to ${last}`,
        ...(filterText ? [`   - Filter: ${filterText} (${formatCount(needs.recordCount)} records)`] : []),
        `   - Average daily adoptions: ${formatOneDecimal(needs.averageDailyAdoptions)}`,
        ...(needs.volumeOverridden ? [`   - Daily volume used: ${formatOneDecimal(daily.dailyAdoptionVolume)} (override)`] : []),
        `   - Species: ${overview.species.join(", ")}`,
        "",
        "TIME ANALYSIS:",
        `   - Average time per adoption: ${daily.minutesPerAdoption} minutes`,
        `   - Non-adopting visitor percentage: ${daily.nonAdoptingPercent}%`,
        `   - Peak adoption hour: ${formatHour(peakHour.peakHour)} (${peakHour.peakAdoptions} adoptions)`,
        "",
        "COUNSELOR WORKLOAD:",
        `   - Number of counselors: ${daily.counselorCount}`,
        `   - Total daily counselor time needed: ${formatOneDecimal(daily.totalCounselorHours)} hours`,
        `   - Average hours per counselor: ${formatOneDecimal(daily.hoursPerCounselor)} hours`,
        `   - Peak hour workload per counselor: ${formatOneDecimal(peakHour.peakHourPerCounselor)} hours`,
        "",
        "CAPACITY ANALYSIS:",
        `   - Workday length: ${capacity.workdayHours} hours`,
        `   - Daily capacity utilization: ${formatOneDecimal(capacity.utilizationPercent)}%`,
        `   - Status: ${STATUS_LABELS[capacity.status]}`,
    ];

    if (capacity.additionalHoursPerCounselor !== undefined && capacity.recommendedAdditionalCounselors !== undefined) {
        lines.push(`   - Additional counselor time needed: ${formatOneDecimal(capacity.additionalHoursPerCounselor)} hours`);
        lines.push(`   - Recommended additional counselors: ${formatOneDecimal(capacity.recommendedAdditionalCounselors)}`);
    }

    lines.push("", RULE);
    return lines.join("\n");
}
