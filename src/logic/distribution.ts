/**
 * Display overlays: histogram of daily counts and fitted normal curves.
 * Nothing here feeds the workload figures.
 */

import { CURVE_SAMPLE_POINTS, DAILY_HISTOGRAM_BINS } from "@shelter/shared";
import type {
    AdoptionRecord,
    CurvePoint,
    DailyDistribution,
    HistogramBin,
    HourlyDensity,
    NormalFit,
    RecordFilter,
} from "@shelter/shared";
import { applyFilter, dailyCounts, hourlyTotals } from "./aggregation.js";
import { sampleStd } from "./trendEngine.js";

type Records = readonly Readonly<AdoptionRecord>[];

export function normalPdf(x: number, mean: number, std: number): number {
    const z = (x - mean) / std;
    return Math.exp(-0.5 * z * z) / (std * Math.sqrt(2 * Math.PI));
}

// null when the values cannot define a curve (fewer than two, or no spread)
export function fitNormal(values: readonly number[]): NormalFit | null {
    if (values.length < 2) return null;
    const std = sampleStd(values);
    if (std === 0) return null;
    return { mean: values.reduce((s, v) => s + v, 0) / values.length, std };
}

export function normalCurve(
    fit: NormalFit,
    from: number,
    to: number,
    scale: number,
    points: number = CURVE_SAMPLE_POINTS
): CurvePoint[] {
    if (points < 2) return [{ x: from, y: normalPdf(from, fit.mean, fit.std) * scale }];
    const step = (to - from) / (points - 1);
    return Array.from({ length: points }, (_, i) => {
        const x = from + step * i;
        return { x, y: normalPdf(x, fit.mean, fit.std) * scale };
    });
}

/**
 * Equal-width bins between min and max; the max value lands in the last bin.
 */
export function histogram(values: readonly number[], bins: number = DAILY_HISTOGRAM_BINS): HistogramBin[] {
    if (values.length === 0) return [];
    const min = Math.min(...values);
    const max = Math.max(...values);
    if (min === max) return [{ start: min, end: max, count: values.length }];

    const width = (max - min) / bins;
    const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
        start: min + width * i,
        end: i === bins - 1 ? max : min + width * (i + 1),
        count: 0,
    }));
    values.forEach(v => {
        const idx = Math.min(bins - 1, Math.floor((v - min) / width));
        result[idx].count++;
    });
    return result;
}

export function dailyDistribution(records: Records, filter?: RecordFilter): DailyDistribution {
    const counts = dailyCounts(records, filter).map(d => d.count);
    const bins = histogram(counts);
    const fit = fitNormal(counts);
    if (!fit) return { histogram: bins, fit: null, curve: [] };

    const min = Math.min(...counts);
    const max = Math.max(...counts);
    // Scale the pdf to histogram frequency
    const scale = (counts.length * (max - min)) / DAILY_HISTOGRAM_BINS;
    return { histogram: bins, fit, curve: normalCurve(fit, min, max, scale) };
}

/**
 * Raw hourly totals with a normal curve over the adoption hours, scaled by records / 24.
 */
export function hourlyDensity(records: Records, filter?: RecordFilter): HourlyDensity {
    const subset = applyFilter(records, filter);
    const bars = hourlyTotals(subset);
    const fit = fitNormal(subset.map(r => r.hour));
    if (!fit) return { bars, fit: null, curve: [] };
    return { bars, fit, curve: normalCurve(fit, 0, 23, subset.length / 24) };
}
