/**
 * Counselor workload estimation
 *
 * Turns an adoption volume into counselor-hours:
 *   multiplier    = 1 + nonAdoptingPercent / 100
 *   adoption min  = volume * minutesPerAdoption
 *   counselor min = adoption min * multiplier
 *   counselor hrs = counselor min / 60
 *   per counselor = counselor hrs / counselorCount
 *
 * Operation order is part of the contract (results must match to the last bit).
 */

import { CAPACITY_THRESHOLDS } from "@shelter/shared";
import type {
    AggregateEntry,
    CapacityAssessment,
    CapacityStatus,
    GuestBreakdown,
    HourlyAverage,
    HourlyWorkload,
    PeakWorkloadResult,
    TimeBreakdown,
    WorkloadParams,
    WorkloadResult,
} from "@shelter/shared";
import { DomainError } from "../../errors.js";
import { peakHour } from "../aggregation.js";

export function validateWorkloadParams(params: WorkloadParams): void {
    const { minutesPerAdoption, nonAdoptingPercent, counselorCount } = params;

    if (!Number.isFinite(counselorCount) || counselorCount <= 0) {
        throw new DomainError("NonPositiveCounselorCount", `Counselor count must be greater than 0 (got ${counselorCount})`, {
            counselorCount,
        });
    }
    if (!Number.isFinite(nonAdoptingPercent) || nonAdoptingPercent < 0) {
        throw new DomainError("NegativeOrInvalidPercentage", `Non-adopting percentage must be 0 or more (got ${nonAdoptingPercent})`, {
            nonAdoptingPercent,
        });
    }
    if (!Number.isFinite(minutesPerAdoption) || minutesPerAdoption <= 0) {
        throw new DomainError("InvalidMinutesPerAdoption", `Minutes per adoption must be greater than 0 (got ${minutesPerAdoption})`, {
            minutesPerAdoption,
        });
    }
}

function validateWorkdayHours(workdayHours: number): void {
    if (!Number.isFinite(workdayHours) || workdayHours <= 0) {
        throw new DomainError("NonPositiveWorkdayHours", `Workday hours must be greater than 0 (got ${workdayHours})`, {
            workdayHours,
        });
    }
}

export function nonAdoptingMultiplier(nonAdoptingPercent: number): number {
    return 1 + nonAdoptingPercent / 100;
}

export function estimate(
    dailyAdoptionVolume: number,
    minutesPerAdoption: number,
    nonAdoptingPercent: number,
    counselorCount: number
): WorkloadResult {
    validateWorkloadParams({ minutesPerAdoption, nonAdoptingPercent, counselorCount });
    if (!Number.isFinite(dailyAdoptionVolume) || dailyAdoptionVolume < 0) {
        throw new DomainError("InvalidVolume", `Adoption volume must be 0 or more (got ${dailyAdoptionVolume})`, {
            dailyAdoptionVolume,
        });
    }

    const multiplier = nonAdoptingMultiplier(nonAdoptingPercent);
    const totalAdoptionMinutes = dailyAdoptionVolume * minutesPerAdoption;
    const totalCounselorMinutes = totalAdoptionMinutes * multiplier;
    const totalCounselorHours = totalCounselorMinutes / 60;
    const hoursPerCounselor = totalCounselorHours / counselorCount;

    return {
        dailyAdoptionVolume,
        minutesPerAdoption,
        nonAdoptingPercent,
        counselorCount,
        nonAdoptingMultiplier: multiplier,
        totalAdoptionMinutes,
        totalCounselorMinutes,
        totalCounselorHours,
        hoursPerCounselor,
    };
}

/**
 * Peak-hour variant: the busiest hour's raw total (whole dataset, not a daily mean)
 * stands in for the daily volume.
 */
export function estimatePeak(
    hourlyAggregate: readonly AggregateEntry<number>[],
    minutesPerAdoption: number,
    nonAdoptingPercent: number,
    counselorCount: number
): PeakWorkloadResult {
    validateWorkloadParams({ minutesPerAdoption, nonAdoptingPercent, counselorCount });
    const peak = peakHour(hourlyAggregate);
    const result = estimate(peak.count, minutesPerAdoption, nonAdoptingPercent, counselorCount);

    return {
        ...result,
        peakHour: peak.key,
        peakAdoptions: peak.count,
        peakHourTime: result.totalCounselorHours,
        peakHourPerCounselor: result.hoursPerCounselor,
    };
}

export function capacityUtilization(hoursPerCounselor: number, workdayHours: number): number {
    validateWorkdayHours(workdayHours);
    return (hoursPerCounselor / workdayHours) * 100;
}

export function classifyCapacity(utilizationPercent: number): CapacityStatus {
    if (utilizationPercent < CAPACITY_THRESHOLDS.optimalFrom) return "under-utilized";
    if (utilizationPercent < CAPACITY_THRESHOLDS.overCapacityFrom) return "optimal";
    return "over-capacity";
}

/**
 * Utilization against the workday, with the shortfall when over capacity.
 * The recommended extra headcount is the per-counselor overflow in workdays.
 */
export function assessCapacity(result: WorkloadResult, workdayHours: number): CapacityAssessment {
    const utilizationPercent = capacityUtilization(result.hoursPerCounselor, workdayHours);
    const status = classifyCapacity(utilizationPercent);
    const assessment: CapacityAssessment = { workdayHours, utilizationPercent, status };

    if (utilizationPercent > 100) {
        const additionalHoursPerCounselor = result.hoursPerCounselor - workdayHours;
        assessment.additionalHoursPerCounselor = additionalHoursPerCounselor;
        assessment.recommendedAdditionalCounselors = additionalHoursPerCounselor / workdayHours;
    }
    return assessment;
}

export function guestBreakdown(adoptionVolume: number, nonAdoptingPercent: number): GuestBreakdown {
    const adoptingGuests = adoptionVolume;
    const nonAdoptingGuests = adoptionVolume * (nonAdoptingPercent / 100);
    return {
        adoptingGuests,
        nonAdoptingGuests,
        totalGuests: adoptingGuests + nonAdoptingGuests,
    };
}

export function timeBreakdown(result: WorkloadResult, workdayHours: number): TimeBreakdown {
    validateWorkdayHours(workdayHours);
    return {
        adoptionHours: result.totalAdoptionMinutes / 60,
        nonAdoptionHours: (result.totalCounselorMinutes - result.totalAdoptionMinutes) / 60,
        availableHours: workdayHours * result.counselorCount - result.totalCounselorHours,
    };
}

/**
 * Counselor-hours needed per hour of day, from densified hourly means.
 */
export function hourlyWorkload(
    averages: readonly HourlyAverage[],
    minutesPerAdoption: number,
    nonAdoptingPercent: number
): HourlyWorkload[] {
    const multiplier = nonAdoptingMultiplier(nonAdoptingPercent);
    return averages.map(a => ({
        hour: a.hour,
        averageAdoptions: a.mean,
        workloadHours: (a.mean * minutesPerAdoption * multiplier) / 60,
    }));
}
