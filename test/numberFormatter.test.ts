import { describe, expect, it } from "vitest";
import { formatCount, formatHour, formatOneDecimal } from "../src/utils/numberFormatter.js";

describe("numberFormatter", () => {
    it("formats hours on a 12-hour clock", () => {
        expect([0, 9, 12, 15].map(formatHour)).toEqual(["12 AM", "9 AM", "12 PM", "3 PM"]);
    });

    it("rounds to one decimal", () => {
        expect(formatOneDecimal(13 / 3)).toBe("4.3");
        expect(formatOneDecimal(8)).toBe("8.0");
        expect(formatOneDecimal(Number.NaN)).toBe("--");
    });

    it("groups thousands", () => {
        expect(formatCount(1234)).toBe("1,234");
    });
});
