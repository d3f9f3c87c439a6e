import { z } from "zod";
import { DEFAULT_WORKLOAD_PARAMS } from "@shelter/shared";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  CORS_ORIGIN: z.string().default("*"),
  ADOPTION_DATA_PATH: z.string().min(1).default("data/AnimalOutcome.csv"),
  WORKDAY_HOURS: z.coerce.number().positive().default(DEFAULT_WORKLOAD_PARAMS.workdayHours),
  DEFAULT_MINUTES_PER_ADOPTION: z.coerce.number().positive().default(DEFAULT_WORKLOAD_PARAMS.minutesPerAdoption),
  DEFAULT_NON_ADOPTING_PERCENT: z.coerce.number().min(0).default(DEFAULT_WORKLOAD_PARAMS.nonAdoptingPercent),
  DEFAULT_COUNSELOR_COUNT: z.coerce.number().positive().default(DEFAULT_WORKLOAD_PARAMS.counselorCount),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  dataPath: string;
  workdayHours: number;
  defaults: {
    minutesPerAdoption: number;
    nonAdoptingPercent: number;
    counselorCount: number;
  };
  uploadMaxBytes: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Read settings from the environment. Unset variables fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const e = result.data;
  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    dataPath: e.ADOPTION_DATA_PATH,
    workdayHours: e.WORKDAY_HOURS,
    defaults: {
      minutesPerAdoption: e.DEFAULT_MINUTES_PER_ADOPTION,
      nonAdoptingPercent: e.DEFAULT_NON_ADOPTING_PERCENT,
      counselorCount: e.DEFAULT_COUNSELOR_COUNT,
    },
    uploadMaxBytes: e.UPLOAD_MAX_BYTES,
  };
}
