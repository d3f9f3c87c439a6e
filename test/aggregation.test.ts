import { describe, expect, it } from "vitest";
import {
    aggregate,
    availableMonths,
    availableWeekdays,
    averageDailyVolume,
    dailyCounts,
    densifyHourly,
    hourlyAverages,
    hourlyTotals,
    monthlyCounts,
    peakHour,
    speciesDistribution,
    weekdayCounts,
    weekdayDistribution,
} from "../src/logic/aggregation.js";
import { DomainError } from "../src/errors.js";
import { DIMENSIONS } from "@shelter/shared";
import { recordSetOf, SAMPLE_ROWS } from "./fixtures.js";

const { records } = recordSetOf();

describe("aggregation", () => {
    it("counts per date in ascending order", () => {
        expect(dailyCounts(records)).toEqual([
            { key: "2024-03-04", count: 3 },
            { key: "2024-03-06", count: 1 },
            { key: "2024-04-01", count: 1 },
        ]);
    });

    it("totals per hour without densifying", () => {
        expect(hourlyTotals(records)).toEqual([
            { key: 9, count: 3 },
            { key: 10, count: 1 },
            { key: 14, count: 1 },
        ]);
    });

    it("orders weekdays by calendar, not by count", () => {
        expect(weekdayCounts(records)).toEqual([
            { key: "Monday", count: 4 },
            { key: "Wednesday", count: 1 },
        ]);
    });

    it("zero-fills the weekday distribution Monday through Sunday", () => {
        const dist = weekdayDistribution(records);
        expect(dist.map(e => e.key)).toEqual(["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"]);
        expect(dist.map(e => e.count)).toEqual([4, 0, 1, 0, 0, 0, 0]);
        expect(weekdayDistribution([]).every(e => e.count === 0)).toBe(true);
    });

    it("ranks species by count", () => {
        expect(speciesDistribution(records)).toEqual([
            { key: "Dog", count: 3 },
            { key: "Cat", count: 2 },
        ]);
    });

    it("groups by year and month", () => {
        expect(monthlyCounts(records)).toEqual([
            { key: { year: 2024, month: 3 }, count: 4 },
            { key: { year: 2024, month: 4 }, count: 1 },
        ]);
    });

    it("conserves the record count in every dimension", () => {
        for (const dimension of DIMENSIONS) {
            const total = aggregate(records, dimension).reduce((sum, e) => sum + e.count, 0);
            expect(total).toBe(records.length);
        }
        const filter = { species: "Dog" };
        for (const dimension of DIMENSIONS) {
            const total = aggregate(records, dimension, filter).reduce((sum, e) => sum + e.count, 0);
            expect(total).toBe(3);
        }
    });

    it("applies every filter criterion together", () => {
        expect(dailyCounts(records, { species: "Dog", weekday: "Monday" })).toEqual([
            { key: "2024-03-04", count: 2 },
            { key: "2024-04-01", count: 1 },
        ]);
        expect(dailyCounts(records, { species: "Cat", month: 4 })).toEqual([]);
    });

    it("selects rows logged without a species with an empty species filter", () => {
        const mixed = recordSetOf([...SAMPLE_ROWS, "Adoption,A6,,2024-03-06 15:00"]).records;
        expect(dailyCounts(mixed, { species: "" })).toEqual([{ key: "2024-03-06", count: 1 }]);
    });

    it("counts three records at 9, 9 and 14 on one date", () => {
        const one = recordSetOf([
            "Adoption,B1,Dog,2024-05-01 09:05",
            "Adoption,B2,Cat,2024-05-01 09:50",
            "Adoption,B3,Dog,2024-05-01 14:20",
        ]).records;
        expect(aggregate(one, "hour")).toEqual([
            { key: 9, count: 2 },
            { key: 14, count: 1 },
        ]);
        expect(aggregate(one, "date")).toEqual([{ key: "2024-05-01", count: 3 }]);
    });
});

describe("densification", () => {
    it("produces one cell per date and hour", () => {
        const cells = densifyHourly(records);
        expect(cells).toHaveLength(3 * 24);
        expect(cells.find(c => c.date === "2024-03-04" && c.hour === 9)?.count).toBe(2);
        expect(cells.find(c => c.date === "2024-03-06" && c.hour === 9)?.count).toBe(0);
        expect(cells.reduce((sum, c) => sum + c.count, 0)).toBe(records.length);
    });

    it("divides hourly averages by the number of days", () => {
        const averages = hourlyAverages(records);
        expect(averages).toHaveLength(24);
        expect(averages[9]).toEqual({ hour: 9, total: 3, days: 3, mean: 1 });
        expect(averages[14].mean).toBeCloseTo(1 / 3);
        expect(averages[0]).toEqual({ hour: 0, total: 0, days: 3, mean: 0 });
    });

    it("returns zero means for an empty subset", () => {
        const averages = hourlyAverages(records, { species: "Ferret" });
        expect(averages).toHaveLength(24);
        expect(averages.every(a => a.days === 0 && a.mean === 0)).toBe(true);
    });
});

describe("daily volume and peak hour", () => {
    it("averages over observed dates", () => {
        expect(averageDailyVolume(records)).toBeCloseTo(5 / 3);
    });

    it("fails on an empty dataset", () => {
        expect(() => averageDailyVolume([])).toThrow(DomainError);
        expect(() => peakHour([])).toThrow(DomainError);
    });

    it("breaks peak-hour ties toward the earliest hour", () => {
        expect(peakHour([{ key: 14, count: 2 }, { key: 9, count: 2 }, { key: 11, count: 1 }])).toEqual({ key: 9, count: 2 });
    });

    it("lists available weekdays and months", () => {
        expect(availableWeekdays(records)).toEqual(["Monday", "Wednesday"]);
        expect(availableMonths(records)).toEqual([3, 4]);
    });
});
