import { Command, CommanderError, InvalidArgumentError } from "commander";
import { ENVIRONMENT_VARIABLES } from "@app/clockify/config";
import { EXIT_CODES, UsageError } from "@app/clockify/errors";
import type {
    CatalogFormat,
    ClockifyCommand,
    DateRange,
    EntryChanges,
    GlobalOptions,
    ListFormat,
    ParseResult,
} from "@app/clockify/types";
import {
    dayRange,
    daySpanRange,
    monthRange,
    parseDay,
    parseTimeInput,
    resolveTimeInput,
    startOfDay,
} from "@app/clockify/utils/date";
import { enhanceHelp } from "@app/utils/cli";

export const VERSION = "1.0.0";

const LIST_FORMATS = ["lines", "table", "json"] as const satisfies readonly ListFormat[];
const CATALOG_FORMATS = ["table", "json"] as const satisfies readonly CatalogFormat[];

export interface ParseContext {
    /** Reference instant for "now", relative dates and HH:MM times */
    now: Date;
    writeOut?: (text: string) => void;
    writeErr?: (text: string) => void;
}

// ============================================
// Option shapes as commander hands them over
// ============================================

type GlobalFlags = {
    workspace?: string;
    verbose?: boolean;
    color: boolean;
};

interface EntryFlags {
    project?: string;
    tag: string[];
    billable?: boolean;
}

interface StartFlags extends EntryFlags {
    at?: string;
}

interface StopFlags {
    at?: string;
}

interface AddFlags extends EntryFlags {
    start: string;
    end: string;
    date?: string;
}

interface ListFlags {
    date?: string;
    from?: string;
    to?: string;
    month?: string;
    format: ListFormat;
    ids?: boolean;
}

interface EditFlags {
    description?: string;
    project?: string | false;
    tag?: string[];
    tags: boolean; // false with --no-tags
    billable?: boolean;
    start?: string;
    end?: string;
}

interface CatalogFlags {
    format: CatalogFormat;
    archived?: boolean;
}

interface WorkspacesFlags {
    format: CatalogFormat;
    use?: string;
    select?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}

function choice<T extends string>(choices: readonly T[]): (value: string) => T {
    return (value) => {
        const match = choices.find((candidate) => candidate === value);
        if (!match) {
            throw new InvalidArgumentError(`Allowed choices are ${choices.join(", ")}.`);
        }
        return match;
    };
}

function joinWords(words: string[]): string {
    return words.join(" ").trim();
}

// ============================================
// Ranges
// ============================================

function resolveListRange(flags: ListFlags, now: Date): DateRange {
    if (flags.month) {
        if (flags.date || flags.from || flags.to) {
            throw new UsageError("--month cannot be combined with --date, --from or --to");
        }
        return monthRange(flags.month);
    }

    if (flags.date) {
        if (flags.from || flags.to) {
            throw new UsageError("--date cannot be combined with --from or --to");
        }
        return dayRange(parseDay(flags.date, now));
    }

    if (flags.to && !flags.from) {
        throw new UsageError("--to requires --from");
    }

    if (flags.from) {
        const from = parseDay(flags.from, now);
        const to = flags.to ? parseDay(flags.to, now) : startOfDay(now);
        return daySpanRange(from, to);
    }

    return dayRange(now);
}

function resolveEditChanges(flags: EditFlags, now: Date): EntryChanges {
    const changes: EntryChanges = {};

    if (flags.description !== undefined) {
        changes.description = flags.description;
    }

    if (flags.project === false) {
        changes.project = null;
    } else if (flags.project !== undefined) {
        changes.project = flags.project;
    }

    if (flags.tags === false) {
        if (flags.tag) {
            throw new UsageError("--tag cannot be combined with --no-tags");
        }
        changes.tags = [];
    } else if (flags.tag) {
        changes.tags = flags.tag;
    }

    if (flags.billable !== undefined) {
        changes.billable = flags.billable;
    }

    if (flags.start) {
        changes.start = parseTimeInput(flags.start, now);
    }

    if (flags.end) {
        changes.end = parseTimeInput(flags.end, now);
    }

    if (Object.keys(changes).length === 0) {
        throw new UsageError(
            "Nothing to change: pass at least one of --description, --project, --tag, --billable, --start or --end"
        );
    }

    return changes;
}

// ============================================
// Program
// ============================================

/**
 * Build the commander program. Each action hands its typed record to `onCommand`
 * instead of doing any work, so parsing stays free of I/O.
 */
export function createProgram(context: ParseContext, onCommand: (command: ClockifyCommand) => void): Command {
    const { now } = context;
    const program = new Command();

    program
        .name("clockify")
        .description("Track time in Clockify from the terminal")
        .version(VERSION)
        .option("-w, --workspace <workspace>", "Workspace name or id")
        .option("-v, --verbose", "Enable debug logging")
        .option("--no-color", "Disable colored output")
        .exitOverride()
        .configureOutput({
            writeOut: context.writeOut ?? ((text) => process.stdout.write(text)),
            writeErr: context.writeErr ?? ((text) => process.stderr.write(text)),
            // Errors surface as UsageError and are printed once by the caller
            outputError: () => {},
        });

    program
        .command("start")
        .description("Start a running time entry")
        .argument("[description...]", "What you are working on")
        .option("-p, --project <project>", "Project name or id")
        .option("-t, --tag <tag>", "Tag name or id (repeatable)", collect, [])
        .option("-b, --billable", "Mark the entry billable")
        .option("--at <time>", "Start time instead of now (HH:MM, \"10 minutes ago\")")
        .action((description: string[], flags: StartFlags) => {
            const start = flags.at ? resolveTimeInput(parseTimeInput(flags.at, now), now) : now;
            onCommand({
                name: "start",
                description: joinWords(description),
                project: flags.project,
                tags: flags.tag,
                billable: flags.billable ?? false,
                start,
            });
        });

    program
        .command("stop")
        .description("Stop the running time entry")
        .option("--at <time>", "End time instead of now (HH:MM, \"10 minutes ago\")")
        .action((flags: StopFlags) => {
            const end = flags.at ? resolveTimeInput(parseTimeInput(flags.at, now), now) : now;
            onCommand({ name: "stop", end });
        });

    program
        .command("add")
        .description("Add a finished time entry")
        .argument("<description...>", "What you worked on")
        .requiredOption("-s, --start <time>", "Start time (HH:MM or a date and time)")
        .requiredOption("-e, --end <time>", "End time (HH:MM or a date and time)")
        .option("-d, --date <date>", "Day for HH:MM times (YYYY-MM-DD, \"yesterday\")")
        .option("-p, --project <project>", "Project name or id")
        .option("-t, --tag <tag>", "Tag name or id (repeatable)", collect, [])
        .option("-b, --billable", "Mark the entry billable")
        .action((description: string[], flags: AddFlags) => {
            const day = flags.date ? parseDay(flags.date, now) : startOfDay(now);
            const start = resolveTimeInput(parseTimeInput(flags.start, now), day);
            const end = resolveTimeInput(parseTimeInput(flags.end, now), day);

            if (end.getTime() <= start.getTime()) {
                throw new UsageError("End time must be after start time");
            }

            onCommand({
                name: "add",
                description: joinWords(description),
                project: flags.project,
                tags: flags.tag,
                billable: flags.billable ?? false,
                start,
                end,
            });
        });

    program
        .command("list")
        .alias("ls")
        .description("List time entries (default: today)")
        .option("-d, --date <date>", "A single day (YYYY-MM-DD, \"yesterday\")")
        .option("--from <date>", "First day of a range")
        .option("--to <date>", "Last day of a range, inclusive")
        .option("-m, --month <month>", "A whole month (YYYY-MM)")
        .option("-f, --format <format>", "Output format: lines, table, json", choice(LIST_FORMATS), "lines")
        .option("--ids", "Show entry ids")
        .action((flags: ListFlags) => {
            onCommand({
                name: "list",
                range: resolveListRange(flags, now),
                format: flags.format,
                showIds: flags.ids ?? false,
            });
        });

    program
        .command("edit")
        .description("Change an existing time entry")
        .argument("<id>", "Time entry id (see list --ids)")
        .option("--description <text>", "New description")
        .option("-p, --project <project>", "New project name or id")
        .option("--no-project", "Remove the project")
        .option("-t, --tag <tag>", "Replace tags (repeatable)", collect)
        .option("--no-tags", "Remove all tags")
        .option("--billable", "Mark billable")
        .option("--no-billable", "Mark non-billable")
        .option("-s, --start <time>", "New start (HH:MM on the entry's day, or a date and time)")
        .option("-e, --end <time>", "New end (HH:MM on the entry's day, or a date and time)")
        .action((id: string, flags: EditFlags) => {
            onCommand({ name: "edit", id, changes: resolveEditChanges(flags, now) });
        });

    program
        .command("delete")
        .alias("rm")
        .description("Delete a time entry")
        .argument("<id>", "Time entry id (see list --ids)")
        .action((id: string) => {
            onCommand({ name: "delete", id });
        });

    program
        .command("projects")
        .description("List projects of the workspace")
        .option("-f, --format <format>", "Output format: table, json", choice(CATALOG_FORMATS), "table")
        .option("--archived", "Include archived projects")
        .action((flags: CatalogFlags) => {
            onCommand({ name: "projects", format: flags.format, archived: flags.archived ?? false });
        });

    program
        .command("tags")
        .description("List tags of the workspace")
        .option("-f, --format <format>", "Output format: table, json", choice(CATALOG_FORMATS), "table")
        .option("--archived", "Include archived tags")
        .action((flags: CatalogFlags) => {
            onCommand({ name: "tags", format: flags.format, archived: flags.archived ?? false });
        });

    program
        .command("workspaces")
        .description("List workspaces, or choose the default one")
        .option("--use <workspace>", "Store a default workspace (name or id)")
        .option("--select", "Choose the default workspace interactively")
        .option("-f, --format <format>", "Output format: table, json", choice(CATALOG_FORMATS), "table")
        .action((flags: WorkspacesFlags) => {
            if (flags.use && flags.select) {
                throw new UsageError("--use cannot be combined with --select");
            }
            onCommand({ name: "workspaces", format: flags.format, use: flags.use, select: flags.select ?? false });
        });

    program
        .command("status")
        .description("Show the configuration and the running entry")
        .action(() => {
            onCommand({ name: "status" });
        });

    enhanceHelp(program, [
        { title: "Environment Variables", rows: ENVIRONMENT_VARIABLES },
        {
            title: "Examples",
            rows: [
                ['clockify start "Code review" -p Backend -t review', "Start tracking now"],
                ["clockify start --at 9:15 Standup", "Start retroactively"],
                ["clockify stop", "Stop the running entry"],
                ['clockify add "Planning" -s 13:00 -e 14:30 -d yesterday', "Add a finished entry"],
                ["clockify list --from 2024-01-01 --to 2024-01-07", "List a week"],
                ["clockify list -m 2024-01 -f table", "A month, one table per day"],
                ["clockify edit <id> --end 17:00", "Fix an entry"],
            ],
        },
    ]);

    return program;
}

/**
 * Parse the arguments (without the node and script entries) into a command record.
 * Help and version output yields `{ type: "exit" }`; every other failure is a UsageError.
 */
export function parseArgs(argv: string[], context: ParseContext): ParseResult {
    const captured: { command?: ClockifyCommand } = {};
    const program = createProgram(context, (parsed) => {
        captured.command = parsed;
    });

    if (argv.length === 0) {
        program.outputHelp();
        return { type: "exit", exitCode: EXIT_CODES.success };
    }

    try {
        program.parse(argv, { from: "user" });
    } catch (error) {
        if (error instanceof CommanderError) {
            if (error.exitCode === 0) {
                return { type: "exit", exitCode: EXIT_CODES.success };
            }
            if (error.code === "commander.help") {
                // Global flags alone: help was printed in place of a command
                return { type: "exit", exitCode: EXIT_CODES.usage };
            }
            throw new UsageError(error.message.replace(/^error: /, ""));
        }
        throw error;
    }

    const { command } = captured;
    if (!command) {
        throw new UsageError("No command given");
    }

    const flags = program.opts<GlobalFlags>();
    const globals: GlobalOptions = {
        workspace: flags.workspace,
        verbose: flags.verbose ?? false,
        color: flags.color,
    };

    return { type: "command", command, globals };
}
