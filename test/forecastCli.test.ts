import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { runForecast } from "../src/scripts/runForecast.js";
import { csvOf, SAMPLE_ROWS } from "./fixtures.js";

function capture(stdin: Readable = Readable.from([])) {
    const out: string[] = [];
    const err: string[] = [];
    return { out, err, io: { out: (l: string) => out.push(l), err: (l: string) => err.push(l), stdin } };
}

describe("runForecast", () => {
    let dir: string;
    let file: string;

    beforeAll(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        dir = mkdtempSync(join(tmpdir(), "forecast-"));
        file = join(dir, "outcomes.csv");
        writeFileSync(file, csvOf(SAMPLE_ROWS));
    });
    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it("prints the summary report", async () => {
        const { out, err, io } = capture();
        const code = await runForecast(["--file", file, "--counselors", "2", "--workday-hours", "7"], io);
        expect(code).toBe(0);
        expect(err).toEqual([]);
        const lines = out.join("\n").split("\n");
        expect(lines).toContain("   - Number of counselors: 2");
        expect(lines).toContain("   - Workday length: 7 hours");
    });

    it("applies filters", async () => {
        const { out, io } = capture();
        await runForecast(["--file", file, "--weekday", "Wednesday"], io);
        expect(out.join("\n").split("\n")).toContain("   - Filter: weekday=Wednesday (1 records)");
    });

    it("reads stdin when the file is -", async () => {
        const { out, io } = capture(Readable.from([csvOf(SAMPLE_ROWS.slice(0, 2))]));
        const code = await runForecast(["--file", "-"], io);
        expect(code).toBe(0);
        expect(out.join("\n").split("\n")).toContain("   - Total adoption records: 2");
    });

    it("exits with 1 on a load failure", async () => {
        const { err, io } = capture();
        const code = await runForecast(["--file", join(dir, "missing.csv")], io);
        expect(code).toBe(1);
        expect(err[0]).toMatch(/^\[Forecast\] LoadError SourceNotFound: /);
    });

    it("exits with 1 on invalid parameters", async () => {
        const { err, io } = capture();
        expect(await runForecast(["--file", file, "--counselors", "0"], io)).toBe(1);
        expect(err[0]).toBe("[Forecast] DomainError NonPositiveCounselorCount: Counselor count must be greater than 0 (got 0)");
    });

    it("rejects a flag given without a value", async () => {
        const trailing = capture();
        expect(await runForecast(["--file", file, "--counselors"], trailing.io)).toBe(1);
        expect(trailing.out).toEqual([]);
        expect(trailing.err).toEqual(["[Forecast] Invalid arguments: missing value for --counselors"]);

        const followed = capture();
        expect(await runForecast(["--file", "--counselors", "2"], followed.io)).toBe(1);
        expect(followed.err).toEqual(["[Forecast] Invalid arguments: missing value for --file"]);
    });

    it("rejects malformed flags", async () => {
        const { err, io } = capture();
        expect(await runForecast(["--file", file, "--month", "13"], io)).toBe(1);
        expect(err[0]).toMatch(/^\[Forecast\] Invalid arguments: month: /);
    });
});
