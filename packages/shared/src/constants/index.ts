export const WEEKDAY_ORDER = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export const HOURS_OF_DAY = Array.from({ length: 24 }, (_, hour) => hour);

export const REQUIRED_COLUMNS = ["Outcome", "AnimalNumber", "Species", "DateTime"] as const;

export const DIMENSIONS = ["date", "hour", "weekday", "species", "month"] as const;

export const CAPACITY_THRESHOLDS = {
  optimalFrom: 80,
  overCapacityFrom: 100,
} as const;

export const DEFAULT_WORKLOAD_PARAMS = {
  minutesPerAdoption: 30,
  nonAdoptingPercent: 30,
  counselorCount: 3,
  workdayHours: 8,
} as const;

export const DAILY_HISTOGRAM_BINS = 20;
export const CURVE_SAMPLE_POINTS = 100;
