import { describe, expect, it } from "vitest";
import { calculateCounselorNeeds } from "../../src/logic/workload/counselorNeeds.js";
import { DomainError } from "../../src/errors.js";
import { recordSetOf } from "../fixtures.js";

const recordSet = recordSetOf();
const params = { minutesPerAdoption: 30, nonAdoptingPercent: 30, counselorCount: 3 };

describe("calculateCounselorNeeds", () => {
    it("derives the daily volume from observed dates", () => {
        const report = calculateCounselorNeeds(recordSet, params, { workdayHours: 8 });
        expect(report.recordCount).toBe(5);
        expect(report.daysObserved).toBe(3);
        expect(report.averageDailyAdoptions).toBeCloseTo(5 / 3, 10);
        expect(report.volumeOverridden).toBe(false);
        expect(report.daily.totalCounselorHours).toBeCloseTo(65 / 60, 10);
        expect(report.capacity.status).toBe("under-utilized");
    });

    it("uses the raw peak hour and the busiest day", () => {
        const report = calculateCounselorNeeds(recordSet, params, { workdayHours: 8 });
        expect(report.peakHour.peakHour).toBe(9);
        expect(report.peakHour.peakAdoptions).toBe(3);
        expect(report.peakDay.adoptions).toBe(3);
        expect(report.hourlyWorkload).toHaveLength(24);
        expect(report.hourlyWorkload[9].averageAdoptions).toBe(1);
    });

    it("honors a daily volume override and a peak-day volume", () => {
        const report = calculateCounselorNeeds(recordSet, params, {
            workdayHours: 8,
            dailyVolumeOverride: 20,
            peakDayAdoptions: 35,
        });
        expect(report.volumeOverridden).toBe(true);
        expect(report.daily.hoursPerCounselor).toBeCloseTo(13 / 3, 10);
        expect(report.guests.totalGuests).toBeCloseTo(26, 10);
        expect(report.peakDay.workload.totalCounselorHours).toBeCloseTo(22.75, 10);
    });

    it("narrows everything to the filtered subset", () => {
        const report = calculateCounselorNeeds(recordSet, params, { workdayHours: 8, filter: { species: "Dog" } });
        expect(report.recordCount).toBe(3);
        expect(report.daysObserved).toBe(2);
        expect(report.averageDailyAdoptions).toBe(1.5);
    });

    it("fails when no records match", () => {
        expect(() => calculateCounselorNeeds(recordSet, params, { workdayHours: 8, filter: { species: "Ferret" } })).toThrow(
            DomainError
        );
    });

    it("validates parameters before touching the data", () => {
        const empty = recordSetOf([]);
        try {
            calculateCounselorNeeds(empty, { ...params, counselorCount: 0 }, { workdayHours: 8 });
            expect.unreachable();
        } catch (error: unknown) {
            expect(error).toBeInstanceOf(DomainError);
            expect(error instanceof DomainError && error.code).toBe("NonPositiveCounselorCount");
        }
    });
});
