// trendEngine.ts
import type { AdoptionRecord, DailyStats, DailyTrend, LinearTrend, RecordFilter } from "@shelter/shared";
import { DomainError } from "../errors.js";
import { dailyCounts } from "./aggregation.js";

/**
 * Least-squares line through (i, values[i]), i = 0..n-1.
 * A single point gives a flat line through it.
 */
export function linearTrend(values: readonly number[]): LinearTrend {
    const n = values.length;
    if (n === 0) {
        throw new DomainError("EmptyDataset", "Cannot fit a trend to an empty series");
    }
    if (n === 1) return { slope: 0, intercept: values[0] };

    const meanX = (n - 1) / 2;
    const meanY = values.reduce((s, v) => s + v, 0) / n;

    let sxy = 0;
    let sxx = 0;
    values.forEach((y, x) => {
        sxy += (x - meanX) * (y - meanY);
        sxx += (x - meanX) * (x - meanX);
    });

    const slope = sxy / sxx;
    return { slope, intercept: meanY - slope * meanX };
}

// Sample standard deviation (n - 1); 0 for fewer than two values
export function sampleStd(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const mean = values.reduce((s, v) => s + v, 0) / values.length;
    const sq = values.reduce((s, v) => s + (v - mean) * (v - mean), 0);
    return Math.sqrt(sq / (values.length - 1));
}

export function dailyStats(counts: readonly number[]): DailyStats {
    if (counts.length === 0) {
        throw new DomainError("EmptyDataset", "No daily counts to summarize");
    }
    return {
        days: counts.length,
        mean: counts.reduce((s, c) => s + c, 0) / counts.length,
        max: Math.max(...counts),
        min: Math.min(...counts),
        std: sampleStd(counts),
    };
}

/**
 * Adoptions per day with a fitted trend line and summary statistics.
 */
export function calculateDailyTrend(
    records: readonly Readonly<AdoptionRecord>[],
    filter?: RecordFilter
): DailyTrend {
    const daily = dailyCounts(records, filter);
    const counts = daily.map(d => d.count);
    const { slope, intercept } = linearTrend(counts);

    return {
        slope,
        intercept,
        series: daily.map((d, i) => ({ date: d.key, count: d.count, trend: intercept + slope * i })),
        stats: dailyStats(counts),
    };
}
