import type { CounselorNeedsReport, RecordFilter, RecordSet, WorkloadParams } from "@shelter/shared";
import { DomainError } from "../../errors.js";
import { applyFilter, dailyCounts, hourlyAverages, hourlyTotals } from "../aggregation.js";
import {
    assessCapacity,
    estimate,
    estimatePeak,
    guestBreakdown,
    hourlyWorkload,
    timeBreakdown,
    validateWorkloadParams,
} from "./workloadEstimator.js";

export interface CounselorNeedsOptions {
    filter?: RecordFilter;
    workdayHours: number;
    /** Replaces the observed average daily adoptions. */
    dailyVolumeOverride?: number;
    /** Defaults to the busiest observed day. */
    peakDayAdoptions?: number;
}

/**
 * Full counselor workload picture for a (filtered) record set.
 */
export function calculateCounselorNeeds(
    recordSet: RecordSet,
    params: WorkloadParams,
    options: CounselorNeedsOptions
): CounselorNeedsReport {
    validateWorkloadParams(params);
    const { minutesPerAdoption, nonAdoptingPercent, counselorCount } = params;
    const filter = options.filter ?? {};

    const subset = applyFilter(recordSet.records, filter);
    const daily = dailyCounts(subset);
    if (daily.length === 0) {
        throw new DomainError("EmptyDataset", "No adoption records match the selected filters", { filter });
    }

    const averageDailyAdoptions = daily.reduce((sum, d) => sum + d.count, 0) / daily.length;
    const volume = options.dailyVolumeOverride ?? averageDailyAdoptions;

    const dailyWorkload = estimate(volume, minutesPerAdoption, nonAdoptingPercent, counselorCount);
    const peakHourWorkload = estimatePeak(hourlyTotals(subset), minutesPerAdoption, nonAdoptingPercent, counselorCount);

    const peakDayAdoptions = options.peakDayAdoptions ?? Math.max(...daily.map(d => d.count));

    return {
        filter,
        recordCount: subset.length,
        daysObserved: daily.length,
        averageDailyAdoptions,
        volumeOverridden: options.dailyVolumeOverride !== undefined,
        daily: dailyWorkload,
        peakHour: peakHourWorkload,
        capacity: assessCapacity(dailyWorkload, options.workdayHours),
        guests: guestBreakdown(volume, nonAdoptingPercent),
        timeBreakdown: timeBreakdown(dailyWorkload, options.workdayHours),
        hourlyWorkload: hourlyWorkload(hourlyAverages(subset), minutesPerAdoption, nonAdoptingPercent),
        peakDay: {
            adoptions: peakDayAdoptions,
            workload: estimate(peakDayAdoptions, minutesPerAdoption, nonAdoptingPercent, counselorCount),
            guests: guestBreakdown(peakDayAdoptions, nonAdoptingPercent),
        },
    };
}
