import { describe, expect, it } from "vitest";
import { summarizeDataset } from "../src/logic/overview.js";
import { recordSetOf } from "./fixtures.js";

describe("summarizeDataset", () => {
    it("reports range, species and calendar coverage", () => {
        const overview = summarizeDataset(recordSetOf());
        expect(overview).toMatchObject({
            source: "fixture.csv",
            totalRecords: 5,
            firstTimestamp: "2024-03-04T09:15:00",
            lastTimestamp: "2024-04-01T09:00:00",
            species: ["Dog", "Cat"],
            availableWeekdays: ["Monday", "Wednesday"],
            availableMonths: [3, 4],
        });
        expect(overview.averageDailyAdoptions).toBeCloseTo(5 / 3, 10);
        expect(overview.speciesCounts).toEqual([
            { key: "Dog", count: 3 },
            { key: "Cat", count: 2 },
        ]);
    });

    it("uses nulls for an empty set", () => {
        const overview = summarizeDataset(recordSetOf([]));
        expect(overview.totalRecords).toBe(0);
        expect(overview.firstTimestamp).toBeNull();
        expect(overview.lastTimestamp).toBeNull();
        expect(overview.averageDailyAdoptions).toBeNull();
        expect(overview.species).toEqual([]);
    });
});
