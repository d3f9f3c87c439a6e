import { z } from "zod";
import { DIMENSIONS, WEEKDAY_ORDER } from "../constants/index";

// --- Adoption CSV Row (columns as exported by the shelter system) ---
export const AdoptionRowSchema = z.object({
  Outcome: z.string(),
  AnimalNumber: z.string(),
  Species: z.string(),
  DateTime: z.string().min(1, "DateTime is required"),
});

export type AdoptionRow = z.infer<typeof AdoptionRowSchema>;

// --- Query Schemas ---
export const WeekdaySchema = z.enum(WEEKDAY_ORDER);
export const DimensionSchema = z.enum(DIMENSIONS);

export const FilterQuerySchema = z.object({
  weekday: WeekdaySchema.optional(),
  // "" selects rows logged without a species
  species: z.string().trim().optional(),
  month: z.coerce.number().int().min(1).max(12).optional(),
});

export type FilterQuery = z.infer<typeof FilterQuerySchema>;

// Shape only; the estimator owns the domain rules (counselors > 0 etc.)
export const WorkloadQuerySchema = FilterQuerySchema.extend({
  minutesPerAdoption: z.coerce.number().optional(),
  nonAdoptingPercent: z.coerce.number().optional(),
  counselorCount: z.coerce.number().optional(),
  workdayHours: z.coerce.number().optional(),
  dailyVolume: z.coerce.number().optional(),
  peakDayAdoptions: z.coerce.number().optional(),
});

export type WorkloadQuery = z.infer<typeof WorkloadQuerySchema>;
