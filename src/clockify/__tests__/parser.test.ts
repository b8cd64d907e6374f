import { describe, expect, it } from "vitest";
import { parseArgs } from "@app/clockify/cli/parser";
import { UsageError } from "@app/clockify/errors";
import type { ClockifyCommand, ParseResult } from "@app/clockify/types";

const NOW = new Date("2024-01-01T12:00:00Z");

function capture() {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        context: { now: NOW, writeOut: (text: string) => out.push(text), writeErr: (text: string) => err.push(text) },
    };
}

function parse(...argv: string[]): ParseResult {
    return parseArgs(argv, capture().context);
}

function parseCommand(...argv: string[]): ClockifyCommand {
    const result = parse(...argv);
    if (result.type !== "command") {
        throw new Error(`expected a command, got exit ${result.exitCode}`);
    }
    return result.command;
}

describe("parseArgs", () => {
    describe("start", () => {
        it("joins the description and starts now", () => {
            expect(parseCommand("start", "writing spec", "--project", "X")).toEqual({
                name: "start",
                description: "writing spec",
                project: "X",
                tags: [],
                billable: false,
                start: NOW,
            });
        });

        it("collects words, repeated tags and billable", () => {
            expect(parseCommand("start", "code", "review", "-t", "review", "-t", "meeting", "-b")).toMatchObject({
                description: "code review",
                tags: ["review", "meeting"],
                billable: true,
            });
        });

        it("allows an empty description", () => {
            expect(parseCommand("start")).toMatchObject({ name: "start", description: "" });
        });

        it("starts retroactively with --at", () => {
            const command = parseCommand("start", "--at", "9:15", "Standup");
            expect(command.name === "start" && command.start.toISOString()).toBe("2024-01-01T09:15:00.000Z");
        });
    });

    describe("stop", () => {
        it("stops now", () => {
            expect(parseCommand("stop")).toEqual({ name: "stop", end: NOW });
        });

        it("stops at a clock time today", () => {
            const command = parseCommand("stop", "--at", "11:30");
            expect(command.name === "stop" && command.end.toISOString()).toBe("2024-01-01T11:30:00.000Z");
        });
    });

    describe("add", () => {
        it("places clock times on --date", () => {
            const command = parseCommand("add", "Planning", "-s", "13:00", "-e", "14:30", "-d", "2023-12-31", "-p", "Docs");
            expect(command).toEqual({
                name: "add",
                description: "Planning",
                project: "Docs",
                tags: [],
                billable: false,
                start: new Date("2023-12-31T13:00:00Z"),
                end: new Date("2023-12-31T14:30:00Z"),
            });
        });

        it("defaults to today", () => {
            const command = parseCommand("add", "Review", "-s", "8:00", "-e", "9:00");
            expect(command.name === "add" && command.start.toISOString()).toBe("2024-01-01T08:00:00.000Z");
        });

        it("requires --end", () => {
            expect(() => parse("add", "Planning", "-s", "13:00")).toThrow(
                new UsageError("required option '-e, --end <time>' not specified")
            );
        });

        it("requires a description", () => {
            expect(() => parse("add", "-s", "13:00", "-e", "14:00")).toThrow(/missing required argument 'description'/);
        });

        it("rejects an end before the start", () => {
            expect(() => parse("add", "Planning", "-s", "14:00", "-e", "13:00")).toThrow("End time must be after start time");
        });

        it("rejects unparseable times", () => {
            expect(() => parse("add", "Planning", "-s", "25:00", "-e", "13:00")).toThrow("Invalid time: 25:00");
        });
    });

    describe("list", () => {
        it("defaults to today as lines", () => {
            const command = parseCommand("list");
            expect(command).toEqual({
                name: "list",
                range: {
                    start: new Date("2024-01-01T00:00:00Z"),
                    end: new Date("2024-01-02T00:00:00Z"),
                    label: "2024-01-01",
                },
                format: "lines",
                showIds: false,
            });
        });

        it("takes an inclusive --from/--to span", () => {
            const command = parseCommand("list", "--from", "2024-01-01", "--to", "2024-01-02", "--ids");
            expect(command).toMatchObject({
                range: {
                    start: new Date("2024-01-01T00:00:00Z"),
                    end: new Date("2024-01-03T00:00:00Z"),
                    label: "2024-01-01 to 2024-01-02",
                },
                showIds: true,
            });
        });

        it("runs --from alone up to today", () => {
            const command = parseCommand("list", "--from", "2023-12-30");
            expect(command.name === "list" && command.range.label).toBe("2023-12-30 to 2024-01-01");
        });

        it("takes a month and a format", () => {
            const command = parseCommand("ls", "-m", "2023-12", "-f", "table");
            expect(command).toMatchObject({ name: "list", format: "table", range: { label: "2023-12" } });
        });

        it("rejects conflicting ranges", () => {
            expect(() => parse("list", "--to", "2024-01-02")).toThrow("--to requires --from");
            expect(() => parse("list", "-m", "2024-01", "-d", "2024-01-02")).toThrow(
                "--month cannot be combined with --date, --from or --to"
            );
            expect(() => parse("list", "-d", "2024-01-02", "--from", "2024-01-01")).toThrow(
                "--date cannot be combined with --from or --to"
            );
        });

        it("rejects an unknown format", () => {
            expect(() => parse("list", "-f", "xml")).toThrow(/Allowed choices are lines, table, json/);
        });
    });

    describe("edit", () => {
        it("clears project and tags and sets billable", () => {
            expect(parseCommand("edit", "entry-1", "--no-project", "--no-tags", "--billable")).toEqual({
                name: "edit",
                id: "entry-1",
                changes: { project: null, tags: [], billable: true },
            });
        });

        it("keeps clock times unresolved until the entry's day is known", () => {
            expect(parseCommand("edit", "entry-1", "-t", "a", "-t", "b", "-s", "9:00", "--description", "Fixed")).toEqual({
                name: "edit",
                id: "entry-1",
                changes: {
                    description: "Fixed",
                    tags: ["a", "b"],
                    start: { kind: "clock", hours: 9, minutes: 0 },
                },
            });
        });

        it("marks non-billable", () => {
            expect(parseCommand("edit", "entry-1", "--no-billable")).toMatchObject({ changes: { billable: false } });
        });

        it("requires at least one change", () => {
            expect(() => parse("edit", "entry-1")).toThrow(/^Nothing to change/);
        });

        it("rejects --tag with --no-tags", () => {
            expect(() => parse("edit", "entry-1", "-t", "a", "--no-tags")).toThrow("--tag cannot be combined with --no-tags");
        });
    });

    describe("other commands", () => {
        it("delete and its alias", () => {
            expect(parseCommand("delete", "entry-9")).toEqual({ name: "delete", id: "entry-9" });
            expect(parseCommand("rm", "entry-9")).toEqual({ name: "delete", id: "entry-9" });
        });

        it("projects and tags", () => {
            expect(parseCommand("projects")).toEqual({ name: "projects", format: "table", archived: false });
            expect(parseCommand("tags", "--archived", "-f", "json")).toEqual({ name: "tags", format: "json", archived: true });
        });

        it("workspaces", () => {
            expect(parseCommand("workspaces", "--use", "Acme")).toEqual({
                name: "workspaces",
                format: "table",
                use: "Acme",
                select: false,
            });
            expect(() => parse("workspaces", "--use", "Acme", "--select")).toThrow("--use cannot be combined with --select");
        });

        it("status", () => {
            expect(parseCommand("status")).toEqual({ name: "status" });
        });
    });

    describe("globals", () => {
        it("reads global options before the command", () => {
            const result = parse("-w", "Acme", "--no-color", "-v", "status");
            expect(result).toEqual({
                type: "command",
                command: { name: "status" },
                globals: { workspace: "Acme", verbose: true, color: false },
            });
        });

        it("defaults", () => {
            const result = parse("status");
            expect(result.type === "command" && result.globals).toEqual({
                workspace: undefined,
                verbose: false,
                color: true,
            });
        });
    });

    describe("help and failures", () => {
        it("prints help without arguments", () => {
            const { out, context } = capture();
            expect(parseArgs([], context)).toEqual({ type: "exit", exitCode: 0 });
            expect(out.join("")).toContain("Usage: clockify");
        });

        it("lists environment variables under --help", () => {
            const { out, context } = capture();
            expect(parseArgs(["--help"], context)).toEqual({ type: "exit", exitCode: 0 });
            const help = out.join("");
            expect(help).toContain("Environment Variables:");
            expect(help).toContain("CLOCKIFY_API_KEY");
        });

        it("prints the version", () => {
            const { out, context } = capture();
            expect(parseArgs(["--version"], context)).toEqual({ type: "exit", exitCode: 0 });
            expect(out).toEqual(["1.0.0\n"]);
        });

        it("turns unknown commands into UsageError without printing", () => {
            const { err, context } = capture();
            expect(() => parseArgs(["frobnicate"], context)).toThrow(UsageError);
            expect(() => parseArgs(["frobnicate"], context)).toThrow(/^unknown command 'frobnicate'/);
            expect(err).toEqual([]);
        });
    });
});
