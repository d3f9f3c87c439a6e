import { describe, expect, it } from "vitest";
import { calculateDailyTrend, dailyStats, linearTrend, sampleStd } from "../src/logic/trendEngine.js";
import { DomainError } from "../src/errors.js";
import { recordSetOf } from "./fixtures.js";

describe("linearTrend", () => {
    it("fits a least-squares line over the index", () => {
        expect(linearTrend([2, 4, 6])).toEqual({ slope: 2, intercept: 2 });
    });

    it("gives a flat line through a single point", () => {
        expect(linearTrend([5])).toEqual({ slope: 0, intercept: 5 });
    });

    it("fails on an empty series", () => {
        expect(() => linearTrend([])).toThrow(DomainError);
    });
});

describe("daily statistics", () => {
    it("uses the sample standard deviation", () => {
        expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
        expect(sampleStd([4])).toBe(0);
    });

    it("summarizes daily counts", () => {
        const stats = dailyStats([3, 1, 1]);
        expect(stats.days).toBe(3);
        expect(stats.mean).toBeCloseTo(5 / 3, 10);
        expect(stats.max).toBe(3);
        expect(stats.min).toBe(1);
        expect(stats.std).toBeCloseTo(Math.sqrt(4 / 3), 10);
    });
});

describe("calculateDailyTrend", () => {
    it("fits the per-date series", () => {
        const trend = calculateDailyTrend(recordSetOf().records);
        expect(trend.slope).toBeCloseTo(-1, 10);
        expect(trend.intercept).toBeCloseTo(8 / 3, 10);
        expect(trend.series.map(p => p.date)).toEqual(["2024-03-04", "2024-03-06", "2024-04-01"]);
        expect(trend.series[2].trend).toBeCloseTo(2 / 3, 10);
        expect(trend.stats.days).toBe(3);
    });

    it("fails when the filter leaves nothing", () => {
        expect(() => calculateDailyTrend(recordSetOf().records, { species: "Ferret" })).toThrow(DomainError);
    });
});
