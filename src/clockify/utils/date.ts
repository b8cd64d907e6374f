import * as chrono from "chrono-node";
import { UsageError } from "@app/clockify/errors";
import type { DateRange, TimeInput } from "@app/clockify/types";

const ISO_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Local midnight of the given instant
 */
export function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * Local calendar day as "YYYY-MM-DD"
 */
export function toDayString(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, "0");
    const day = String(date.getDate()).padStart(2, "0");
    return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Clockify wants UTC without fractional seconds: "2024-01-01T10:00:00Z"
 */
export function toApiTimestamp(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Parse a day: "YYYY-MM-DD" or a phrase such as "yesterday" or "3 days ago".
 * A phrase naming a time of day ("tomorrow 5pm") is rejected.
 * @returns Local midnight of that day
 */
export function parseDay(value: string, now: Date = new Date()): Date {
    const trimmed = value.trim();
    const iso = ISO_DAY_PATTERN.exec(trimmed);

    if (iso) {
        const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
        const date = new Date(year, month - 1, day);
        if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
            throw new UsageError(`Invalid date: ${value}`);
        }
        return date;
    }

    const [result] = chrono.parse(trimmed, now);
    if (!result) {
        throw new UsageError(`Couldn't parse date "${value}" (use YYYY-MM-DD or e.g. "yesterday")`);
    }
    if (result.start.isCertain("hour")) {
        throw new UsageError(`Date "${value}" contains an unexpected time`);
    }

    return startOfDay(result.start.date());
}

/**
 * Parse a time: "HH:MM", "now", or anything chrono understands ("2024-01-01 10:00", "2 hours ago").
 */
export function parseTimeInput(value: string, now: Date = new Date()): TimeInput {
    const trimmed = value.trim();

    if (trimmed.toLowerCase() === "now") {
        return { kind: "instant", date: now };
    }

    const clock = CLOCK_PATTERN.exec(trimmed);
    if (clock) {
        const hours = Number(clock[1]);
        const minutes = Number(clock[2]);
        if (hours > 23 || minutes > 59) {
            throw new UsageError(`Invalid time: ${value}`);
        }
        return { kind: "clock", hours, minutes };
    }

    const parsed = chrono.parseDate(trimmed, now);
    if (!parsed) {
        throw new UsageError(`Couldn't parse time "${value}" (use HH:MM, "now" or a full date and time)`);
    }

    return { kind: "instant", date: parsed };
}

/**
 * Place a time input on a day; instants are already absolute.
 */
export function resolveTimeInput(input: TimeInput, day: Date): Date {
    if (input.kind === "instant") {
        return input.date;
    }
    return new Date(day.getFullYear(), day.getMonth(), day.getDate(), input.hours, input.minutes);
}

export function dayRange(day: Date): DateRange {
    const start = startOfDay(day);
    return { start, end: addDays(start, 1), label: toDayString(start) };
}

/**
 * Inclusive day span: both the first and the last day are covered entirely.
 */
export function daySpanRange(from: Date, to: Date): DateRange {
    const start = startOfDay(from);
    const last = startOfDay(to);

    if (last < start) {
        throw new UsageError(`--to ${toDayString(last)} is before --from ${toDayString(start)}`);
    }

    const label = start.getTime() === last.getTime() ? toDayString(start) : `${toDayString(start)} to ${toDayString(last)}`;
    return { start, end: addDays(last, 1), label };
}

/**
 * A whole month given as "YYYY-MM"
 */
export function monthRange(value: string): DateRange {
    const match = MONTH_PATTERN.exec(value.trim());
    const year = match ? Number(match[1]) : NaN;
    const month = match ? Number(match[2]) : NaN;

    if (!match || month < 1 || month > 12) {
        throw new UsageError(`Unparseable month "${value}" (use YYYY-MM)`);
    }

    return {
        start: new Date(year, month - 1, 1),
        end: new Date(year, month, 1),
        label: `${year}-${String(month).padStart(2, "0")}`,
    };
}
