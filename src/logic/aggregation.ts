import { HOURS_OF_DAY, WEEKDAY_ORDER } from "@shelter/shared";
import type {
    AdoptionRecord,
    AggregateEntry,
    DenseHourlyCell,
    Dimension,
    DimensionKeyMap,
    HourlyAverage,
    RecordFilter,
    Weekday,
    YearMonth,
} from "@shelter/shared";
import { DomainError } from "../errors.js";

type Records = readonly Readonly<AdoptionRecord>[];

/**
 * Build a predicate from filter criteria. Every given criterion must match (AND).
 */
export function matchesFilter(filter: RecordFilter = {}): (record: Readonly<AdoptionRecord>) => boolean {
    return record =>
        (filter.weekday === undefined || record.weekday === filter.weekday) &&
        (filter.species === undefined || record.species === filter.species) &&
        (filter.month === undefined || record.month === filter.month);
}

export function applyFilter(records: Records, filter?: RecordFilter): Records {
    if (!filter) return records;
    return records.filter(matchesFilter(filter));
}

/**
 * Count records per key, observed keys only, in first-observed order.
 * `identify` turns structured keys (year/month) into a grouping id.
 */
export function countBy<K>(
    records: Records,
    keyFn: (record: Readonly<AdoptionRecord>) => K,
    filter?: RecordFilter,
    identify: (key: K) => string = key => String(key)
): AggregateEntry<K>[] {
    const groups = new Map<string, AggregateEntry<K>>();

    applyFilter(records, filter).forEach(record => {
        const key = keyFn(record);
        const id = identify(key);
        const entry = groups.get(id);
        if (entry) entry.count++;
        else groups.set(id, { key, count: 1 });
    });

    return Array.from(groups.values());
}

const yearMonthId = (k: YearMonth) => `${k.year}-${String(k.month).padStart(2, "0")}`;
const weekdayIndex = (day: Weekday) => WEEKDAY_ORDER.indexOf(day);

export function dailyCounts(records: Records, filter?: RecordFilter): AggregateEntry<string>[] {
    return countBy(records, r => r.date, filter).sort((a, b) => a.key.localeCompare(b.key));
}

/** Raw per-hour totals across the whole (filtered) dataset, not densified. */
export function hourlyTotals(records: Records, filter?: RecordFilter): AggregateEntry<number>[] {
    return countBy(records, r => r.hour, filter).sort((a, b) => a.key - b.key);
}

export function weekdayCounts(records: Records, filter?: RecordFilter): AggregateEntry<Weekday>[] {
    return countBy(records, r => r.weekday, filter).sort((a, b) => weekdayIndex(a.key) - weekdayIndex(b.key));
}

export function speciesDistribution(records: Records, filter?: RecordFilter): AggregateEntry<string>[] {
    return countBy(records, r => r.species, filter).sort((a, b) => b.count - a.count || a.key.localeCompare(b.key));
}

export function monthlyCounts(records: Records, filter?: RecordFilter): AggregateEntry<YearMonth>[] {
    return countBy(records, r => ({ year: r.year, month: r.month }), filter, yearMonthId).sort(
        (a, b) => a.key.year - b.key.year || a.key.month - b.key.month
    );
}

/**
 * Seven entries Monday..Sunday, zero for weekdays with no records.
 */
export function weekdayDistribution(records: Records, filter?: RecordFilter): AggregateEntry<Weekday>[] {
    const counts = new Map(weekdayCounts(records, filter).map(e => [e.key, e.count]));
    return WEEKDAY_ORDER.map(day => ({ key: day, count: counts.get(day) ?? 0 }));
}

export function aggregate<D extends Dimension>(
    records: Records,
    dimension: D,
    filter?: RecordFilter
): AggregateEntry<DimensionKeyMap[D]>[];
export function aggregate(
    records: Records,
    dimension: Dimension,
    filter?: RecordFilter
): AggregateEntry<DimensionKeyMap[Dimension]>[] {
    switch (dimension) {
        case "date": return dailyCounts(records, filter);
        case "hour": return hourlyTotals(records, filter);
        case "weekday": return weekdayCounts(records, filter);
        case "species": return speciesDistribution(records, filter);
        case "month": return monthlyCounts(records, filter);
    }
}

/**
 * Every filtered date x hours 0-23, with explicit zero cells.
 * D distinct dates always yield exactly D * 24 cells.
 */
export function densifyHourly(records: Records, filter?: RecordFilter): DenseHourlyCell[] {
    const filtered = applyFilter(records, filter);
    const cellCounts = new Map<string, number>();
    filtered.forEach(r => {
        const id = `${r.date}|${r.hour}`;
        cellCounts.set(id, (cellCounts.get(id) ?? 0) + 1);
    });

    const dates = Array.from(new Set(filtered.map(r => r.date))).sort();
    return dates.flatMap(date =>
        HOURS_OF_DAY.map(hour => ({ date, hour, count: cellCounts.get(`${date}|${hour}`) ?? 0 }))
    );
}

/**
 * Mean adoptions per hour of day over the true number of days in the subset.
 * All average-per-hour figures go through the dense grid.
 */
export function hourlyAverages(records: Records, filter?: RecordFilter): HourlyAverage[] {
    const cells = densifyHourly(records, filter);
    const days = cells.length / HOURS_OF_DAY.length;
    const totals = HOURS_OF_DAY.map(() => 0);
    cells.forEach(c => { totals[c.hour] += c.count; });

    return HOURS_OF_DAY.map(hour => ({
        hour,
        total: totals[hour],
        days,
        mean: days === 0 ? 0 : totals[hour] / days,
    }));
}

/**
 * Mean of the per-date aggregate (dates with at least one adoption).
 */
export function averageDailyVolume(records: Records, filter?: RecordFilter): number {
    const daily = dailyCounts(records, filter);
    if (daily.length === 0) {
        throw new DomainError("EmptyDataset", "No adoption records to derive a daily volume from", { filter });
    }
    return daily.reduce((sum, d) => sum + d.count, 0) / daily.length;
}

/**
 * Hour with the highest raw total; ties go to the earliest hour.
 */
export function peakHour(hourly: readonly AggregateEntry<number>[]): AggregateEntry<number> {
    if (hourly.length === 0) {
        throw new DomainError("EmptyDataset", "Hourly aggregate is empty");
    }
    return hourly.reduce((best, e) =>
        e.count > best.count || (e.count === best.count && e.key < best.key) ? e : best
    );
}

export function availableWeekdays(records: Records): Weekday[] {
    const seen = new Set(records.map(r => r.weekday));
    return WEEKDAY_ORDER.filter(day => seen.has(day));
}

export function availableMonths(records: Records): number[] {
    return Array.from(new Set(records.map(r => r.month))).sort((a, b) => a - b);
}
