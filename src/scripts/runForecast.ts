import type { Readable } from "stream";
import { DEFAULT_WORKLOAD_PARAMS, WorkloadQuerySchema } from "@shelter/shared";
import type { RecordSet } from "@shelter/shared";
import { isDomainError, isLoadError } from "../errors.js";
import { loadAdoptionRecords, loadAdoptionRecordsFromStream } from "../data/csvLoader.js";
import { calculateCounselorNeeds } from "../logic/workload/counselorNeeds.js";
import { summarizeDataset } from "../logic/overview.js";
import { formatSummaryReport } from "../logic/report.js";

export const DEFAULT_DATA_PATH = "data/AnimalOutcome.csv";

const FLAGS = {
    minutesPerAdoption: "--minutes",
    nonAdoptingPercent: "--non-adopting",
    counselorCount: "--counselors",
    workdayHours: "--workday-hours",
    dailyVolume: "--daily-volume",
    weekday: "--weekday",
    species: "--species",
    month: "--month",
} as const;

// undefined: flag absent; null: flag given without a value
function getArg(argv: readonly string[], flag: string): string | null | undefined {
    const idx = argv.indexOf(flag);
    if (idx === -1) return undefined;
    const value = argv.at(idx + 1);
    if (value === undefined || value.startsWith("--")) return null;
    return value;
}

async function loadSource(file: string, stdin: Readable): Promise<RecordSet> {
    if (file === "-") return loadAdoptionRecordsFromStream(stdin, "stdin");
    return loadAdoptionRecords(file);
}

export interface ForecastIO {
    out: (line: string) => void;
    err: (line: string) => void;
    stdin: Readable;
}

/**
 * Runs the forecast for the given arguments and returns the process exit code.
 * `--file -` reads the CSV from stdin.
 */
export async function runForecast(argv: readonly string[], io: ForecastIO): Promise<number> {
    const raw: Record<string, string> = {};
    const missing: string[] = [];
    for (const [key, flag] of Object.entries({ ...FLAGS, file: "--file" })) {
        const value = getArg(argv, flag);
        if (value === null) missing.push(flag);
        else if (value !== undefined) raw[key] = value;
    }
    if (missing.length > 0) {
        io.err(`[Forecast] Invalid arguments: missing value for ${missing.join(", ")}`);
        return 1;
    }

    const parsed = WorkloadQuerySchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        io.err(`[Forecast] Invalid arguments: ${issues}`);
        return 1;
    }

    const query = parsed.data;
    const file = raw.file ?? process.env.ADOPTION_DATA_PATH ?? DEFAULT_DATA_PATH;

    try {
        const recordSet = await loadSource(file, io.stdin);
        const needs = calculateCounselorNeeds(
            recordSet,
            {
                minutesPerAdoption: query.minutesPerAdoption ?? DEFAULT_WORKLOAD_PARAMS.minutesPerAdoption,
                nonAdoptingPercent: query.nonAdoptingPercent ?? DEFAULT_WORKLOAD_PARAMS.nonAdoptingPercent,
                counselorCount: query.counselorCount ?? DEFAULT_WORKLOAD_PARAMS.counselorCount,
            },
            {
                filter: { weekday: query.weekday, species: query.species, month: query.month },
                workdayHours: query.workdayHours ?? DEFAULT_WORKLOAD_PARAMS.workdayHours,
                dailyVolumeOverride: query.dailyVolume,
            }
        );
        io.out(formatSummaryReport(summarizeDataset(recordSet), needs));
        return 0;
    } catch (error: unknown) {
        if (isLoadError(error) || isDomainError(error)) {
            io.err(`[Forecast] ${error.name} ${error.code}: ${error.message}`);
            return 1;
        }
        throw error;
    }
}
