import { describe, expect, it } from "vitest";
import { formatDuration, maskSecret } from "./format";

describe("formatDuration", () => {
    describe("tiered style (default)", () => {
        it("formats sub-second as milliseconds", () => {
            expect(formatDuration(0)).toBe("0ms");
            expect(formatDuration(412)).toBe("412ms");
        });

        it("formats seconds with one decimal", () => {
            expect(formatDuration(1500)).toBe("1.5s");
        });

        it("formats minutes and hours", () => {
            expect(formatDuration(90000)).toBe("1m 30s");
            expect(formatDuration(5400000)).toBe("1h 30m");
        });
    });

    describe("clock style", () => {
        it("renders ninety minutes as 1:30", () => {
            expect(formatDuration(90 * 60000, "clock")).toBe("1:30");
        });

        it("pads minutes and floors seconds", () => {
            expect(formatDuration(5 * 60000 + 59000, "clock")).toBe("0:05");
            expect(formatDuration(0, "clock")).toBe("0:00");
        });

        it("keeps counting hours past a day", () => {
            expect(formatDuration((26 * 60 + 5) * 60000, "clock")).toBe("26:05");
        });

        it("clamps negative spans to zero", () => {
            expect(formatDuration(-60000, "clock")).toBe("0:00");
        });
    });

    describe("decimal-hours style", () => {
        it("rounds to two decimals", () => {
            expect(formatDuration(90 * 60000, "decimal-hours")).toBe("1.5h");
            expect(formatDuration(20 * 60000, "decimal-hours")).toBe("0.33h");
        });
    });
});

describe("maskSecret", () => {
    it("keeps the last four characters", () => {
        expect(maskSecret("test-secret")).toBe("*******cret");
    });

    it("caps the number of mask characters", () => {
        expect(maskSecret("abcdefghijklmnopqrstuvwxyz")).toBe("********wxyz");
    });

    it("fully masks short values", () => {
        expect(maskSecret("abc")).toBe("***");
    });
});
