import type { RecordSet } from "@shelter/shared";
import { parseAdoptionCsv } from "../src/data/csvLoader.js";

export const HEADER = "Outcome,AnimalNumber,Species,DateTime";

// Mon 2024-03-04 x3, Wed 2024-03-06 x1, Mon 2024-04-01 x1
export const SAMPLE_ROWS = [
    "Adoption,A1,Dog,2024-03-04 09:15:00",
    "Adoption,A2,Cat,2024-03-04 09:40:00",
    "Adoption,A3,Dog,2024-03-04 14:05:00",
    "Adoption,A4,Cat,2024-03-06 10:30:00",
    "Adoption,A5,Dog,2024-04-01 09:00:00",
];

export function csvOf(rows: readonly string[]): string {
    return [HEADER, ...rows].join("\n") + "\n";
}

export function recordSetOf(rows: readonly string[] = SAMPLE_ROWS, source = "fixture.csv"): RecordSet {
    return parseAdoptionCsv(csvOf(rows), source);
}
