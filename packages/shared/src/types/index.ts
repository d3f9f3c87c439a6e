// Record, aggregate and workload types shared by the core and the API
import type { DIMENSIONS, WEEKDAY_ORDER } from "../constants/index";

export type Weekday = (typeof WEEKDAY_ORDER)[number];
export type Dimension = (typeof DIMENSIONS)[number];

export interface AdoptionRecord {
  outcome: string;
  animalId: string;
  species: string;
  timestamp: string; // YYYY-MM-DDTHH:mm:ss, wall clock as logged

  // Derived from timestamp at load
  date: string; // YYYY-MM-DD
  hour: number;
  weekday: Weekday;
  month: number; // 1-12
  year: number;
}

export interface RecordSet {
  readonly source: string;
  readonly loadedAt: string;
  readonly records: readonly Readonly<AdoptionRecord>[];
}

export interface YearMonth {
  year: number;
  month: number;
}

export interface DimensionKeyMap {
  date: string;
  hour: number;
  weekday: Weekday;
  species: string;
  month: YearMonth;
}

export interface AggregateEntry<K> {
  key: K;
  count: number;
}

export interface RecordFilter {
  weekday?: Weekday;
  species?: string;
  month?: number;
}

export interface DenseHourlyCell {
  date: string;
  hour: number;
  count: number;
}

export interface HourlyAverage {
  hour: number;
  total: number;
  days: number;
  mean: number;
}

export interface WorkloadParams {
  minutesPerAdoption: number;
  nonAdoptingPercent: number;
  counselorCount: number;
}

export interface WorkloadResult extends WorkloadParams {
  dailyAdoptionVolume: number;
  nonAdoptingMultiplier: number;
  totalAdoptionMinutes: number;
  totalCounselorMinutes: number;
  totalCounselorHours: number;
  hoursPerCounselor: number;
}

export interface PeakWorkloadResult extends WorkloadResult {
  peakHour: number;
  peakAdoptions: number;
  peakHourTime: number; // hours
  peakHourPerCounselor: number;
}

export type CapacityStatus = "under-utilized" | "optimal" | "over-capacity";

export interface CapacityAssessment {
  workdayHours: number;
  utilizationPercent: number;
  status: CapacityStatus;
  additionalHoursPerCounselor?: number;
  recommendedAdditionalCounselors?: number;
}

export interface GuestBreakdown {
  adoptingGuests: number;
  nonAdoptingGuests: number;
  totalGuests: number;
}

export interface TimeBreakdown {
  adoptionHours: number;
  nonAdoptionHours: number;
  availableHours: number;
}

export interface HourlyWorkload {
  hour: number;
  averageAdoptions: number;
  workloadHours: number;
}

export interface DailyStats {
  days: number;
  mean: number;
  max: number;
  min: number;
  std: number;
}

export interface TrendPoint {
  date: string;
  count: number;
  trend: number;
}

export interface LinearTrend {
  slope: number;
  intercept: number;
}

export interface DailyTrend extends LinearTrend {
  series: TrendPoint[];
  stats: DailyStats;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface CurvePoint {
  x: number;
  y: number;
}

export interface NormalFit {
  mean: number;
  std: number;
}

export interface DailyDistribution {
  histogram: HistogramBin[];
  fit: NormalFit | null;
  curve: CurvePoint[];
}

export interface HourlyDensity {
  bars: AggregateEntry<number>[];
  fit: NormalFit | null;
  curve: CurvePoint[];
}

export interface DatasetOverview {
  source: string;
  totalRecords: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  averageDailyAdoptions: number | null;
  species: string[];
  speciesCounts: AggregateEntry<string>[];
  availableWeekdays: Weekday[];
  availableMonths: number[];
}

export interface PeakDayScenario {
  adoptions: number;
  workload: WorkloadResult;
  guests: GuestBreakdown;
}

export interface CounselorNeedsReport {
  filter: RecordFilter;
  recordCount: number;
  daysObserved: number;
  averageDailyAdoptions: number;
  volumeOverridden: boolean;
  daily: WorkloadResult;
  peakHour: PeakWorkloadResult;
  capacity: CapacityAssessment;
  guests: GuestBreakdown;
  timeBreakdown: TimeBreakdown;
  hourlyWorkload: HourlyWorkload[];
  peakDay: PeakDayScenario;
}

export type LoadErrorCode = "MissingColumn" | "SourceNotFound" | "ParseFailure";

export type DomainErrorCode =
  | "NonPositiveCounselorCount"
  | "NegativeOrInvalidPercentage"
  | "EmptyDataset"
  | "InvalidMinutesPerAdoption"
  | "InvalidVolume"
  | "NonPositiveWorkdayHours";
