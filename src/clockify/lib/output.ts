import chalk, { Chalk, type ChalkInstance } from "chalk";
import Table from "cli-table3";
import type {
    CatalogFormat,
    ClockifyProject,
    ClockifyTag,
    ClockifyWorkspace,
    DateRange,
} from "@app/clockify/types";
import { formatDuration } from "@app/utils/format";
import { formatTable } from "@app/utils/table";
import type { ProjectRef, TimeEntryView } from "./entries";

export interface OutputOptions {
    color: boolean;
    /** Running entries are measured up to this instant */
    now: Date;
}

export interface EntryLineOptions {
    showIds?: boolean;
}

export interface EntryListOptions extends EntryLineOptions {
    /** Ids to mark with ">"; every other entry is dimmed */
    highlight?: ReadonlySet<string>;
}

const HEX_COLOR = /^#[0-9a-f]{6}$/i;
const DURATION_WIDTH = 7; // "running", "100:00"
const OPEN_END = "     ";

export function createPalette(color: boolean): ChalkInstance {
    return new Chalk({ level: color ? (chalk.level > 0 ? chalk.level : 1) : 0 });
}

// ============================================
// Time
// ============================================

export function formatClock(date: Date): string {
    return new Intl.DateTimeFormat("en-GB", {
        hour: "2-digit",
        minute: "2-digit",
        hourCycle: "h23",
    }).format(date);
}

/**
 * Local calendar day as "YYYY-MM-DD"
 */
export function formatDayKey(date: Date): string {
    return new Intl.DateTimeFormat("en-CA", {
        year: "numeric",
        month: "2-digit",
        day: "2-digit",
    }).format(date);
}

/** "Mon, 2024-01-01" */
export function formatDayLabel(date: Date): string {
    const weekday = new Intl.DateTimeFormat("en-GB", { weekday: "short" }).format(date);
    return `${weekday}, ${formatDayKey(date)}`;
}

export function entryDurationMs(entry: TimeEntryView, now: Date): number {
    return (entry.end ?? now).getTime() - entry.start.getTime();
}

export function formatTotal(entries: TimeEntryView[], now: Date): string {
    const totalMs = entries.reduce((sum, entry) => sum + Math.max(0, entryDurationMs(entry, now)), 0);
    return `${formatDuration(totalMs, "clock")} (${formatDuration(totalMs, "decimal-hours")})`;
}

// ============================================
// Entries
// ============================================

function formatProject(project: ProjectRef, c: ChalkInstance): string {
    const label = `@${project.name}`;
    return project.color && HEX_COLOR.test(project.color) ? c.hex(project.color)(label) : c.magenta(label);
}

/**
 * One entry on one line:
 * `10:00-11:30     1:30  description  @Project  +tag  $`
 * A running entry shows an open end and `running` instead of a duration.
 */
export function formatEntryLine(entry: TimeEntryView, options: OutputOptions, lineOptions: EntryLineOptions = {}): string {
    const c = createPalette(options.color);
    const parts: string[] = [];

    if (lineOptions.showIds) {
        parts.push(c.gray(entry.id));
    }

    const start = c.cyan(formatClock(entry.start));
    const end = entry.end ? c.cyan(formatClock(entry.end)) : OPEN_END;
    parts.push(`${start}-${end}`);

    if (entry.end) {
        const duration = formatDuration(entryDurationMs(entry, options.now), "clock");
        parts.push(duration.padStart(DURATION_WIDTH));
    } else {
        parts.push(c.green("running".padStart(DURATION_WIDTH)));
    }

    parts.push(entry.description ? c.yellow(entry.description) : c.gray("(no description)"));

    if (entry.project) {
        parts.push(formatProject(entry.project, c));
    }

    if (entry.tags.length > 0) {
        parts.push(entry.tags.map((tag) => c.blue(`+${tag.name}`)).join(" "));
    }

    if (entry.billable) {
        parts.push(c.green("$"));
    }

    return parts.join("  ");
}

/**
 * "Started", "Stopped", "Added" followed by the entry line
 */
export function formatEntryAction(action: string, entry: TimeEntryView, options: OutputOptions): string {
    const c = createPalette(options.color);
    return `${c.green(action)}  ${formatEntryLine(entry, options)}`;
}

/**
 * Entries in the order given, with a day header whenever the day changes
 * and a total underneath
 */
export function formatEntryList(
    entries: TimeEntryView[],
    range: DateRange,
    options: OutputOptions,
    listOptions: EntryListOptions = {}
): string {
    const c = createPalette(options.color);

    if (entries.length === 0) {
        return c.gray(`No time entries for ${range.label}`);
    }

    const lines: string[] = [];
    let currentDay: string | null = null;

    for (const entry of entries) {
        const day = formatDayKey(entry.start);
        if (day !== currentDay) {
            lines.push(c.bold(formatDayLabel(entry.start)));
            currentDay = day;
        }
        lines.push(markLine(formatEntryLine(entry, options, listOptions), entry, listOptions.highlight, c));
    }

    lines.push(`${c.bold("Total:")} ${formatTotal(entries, options.now)}`);
    return lines.join("\n");
}

function markLine(line: string, entry: TimeEntryView, highlight: ReadonlySet<string> | undefined, c: ChalkInstance): string {
    if (!highlight) {
        return line;
    }
    return highlight.has(entry.id) ? `${c.green(">")} ${line}` : c.dim(`  ${line}`);
}

/**
 * The action line for a changed entry, then its whole day with that entry marked
 */
export function formatChangedDay(
    action: string,
    changed: TimeEntryView,
    day: TimeEntryView[],
    range: DateRange,
    options: OutputOptions
): string {
    const list = formatEntryList(day, range, options, { highlight: new Set([changed.id]) });
    return `${formatEntryAction(action, changed, options)}\n\n${list}`;
}

/**
 * One cli-table3 table per day, days in order of first appearance
 */
export function formatEntryTables(
    entries: TimeEntryView[],
    range: DateRange,
    options: OutputOptions,
    lineOptions: EntryLineOptions = {}
): string {
    const c = createPalette(options.color);

    if (entries.length === 0) {
        return c.gray(`No time entries for ${range.label}`);
    }

    const byDay = new Map<string, TimeEntryView[]>();
    for (const entry of entries) {
        const day = formatDayLabel(entry.start);
        const dayEntries = byDay.get(day) ?? [];
        dayEntries.push(entry);
        byDay.set(day, dayEntries);
    }

    const head = [
        ...(lineOptions.showIds ? ["ID"] : []),
        "Start",
        "End",
        "Duration",
        "Description",
        "Project",
        "Tags",
    ];

    const sections: string[] = [];
    for (const [day, dayEntries] of byDay) {
        const table = new Table({
            head,
            style: { head: options.color ? ["cyan"] : [], border: options.color ? ["grey"] : [] },
        });

        for (const entry of dayEntries) {
            table.push([
                ...(lineOptions.showIds ? [entry.id] : []),
                formatClock(entry.start),
                entry.end ? formatClock(entry.end) : c.green("running"),
                entry.end ? formatDuration(entryDurationMs(entry, options.now), "clock") : "",
                entry.description || c.gray("(no description)"),
                entry.project ? formatProject(entry.project, c) : "",
                entry.tags.map((tag) => tag.name).join(", "),
            ]);
        }

        sections.push(`${c.bold(day)}  ${c.gray(formatTotal(dayEntries, options.now))}\n${table.toString()}`);
    }

    sections.push(`${c.bold("Total:")} ${formatTotal(entries, options.now)}`);
    return sections.join("\n\n");
}

export function formatEntriesJson(entries: TimeEntryView[], now: Date): string {
    const rows = entries.map((entry) => ({
        id: entry.id,
        description: entry.description,
        start: entry.start.toISOString(),
        end: entry.end ? entry.end.toISOString() : null,
        durationMinutes: Math.floor(Math.max(0, entryDurationMs(entry, now)) / 60000),
        running: entry.end === null,
        billable: entry.billable,
        project: entry.project,
        tags: entry.tags,
    }));
    return JSON.stringify(rows, null, 2);
}

// ============================================
// Projects, tags, workspaces
// ============================================

export function formatProjects(projects: ClockifyProject[], format: CatalogFormat, options: OutputOptions): string {
    if (format === "json") {
        return JSON.stringify(projects, null, 2);
    }

    const c = createPalette(options.color);
    if (projects.length === 0) {
        return c.gray("No projects found");
    }

    const rows = projects.map((project) => [
        formatProject({ id: project.id, name: project.name, color: project.color ?? null }, c),
        project.clientName ?? "",
        project.billable ? "$" : "",
        project.archived ? c.gray("archived") : "",
        c.gray(project.id),
    ]);

    return formatTable(rows, ["Project", "Client", "Billable", "Status", "ID"], { headerStyle: c.bold });
}

export function formatTags(tags: ClockifyTag[], format: CatalogFormat, options: OutputOptions): string {
    if (format === "json") {
        return JSON.stringify(tags, null, 2);
    }

    const c = createPalette(options.color);
    if (tags.length === 0) {
        return c.gray("No tags found");
    }

    const rows = tags.map((tag) => [c.blue(`+${tag.name}`), tag.archived ? c.gray("archived") : "", c.gray(tag.id)]);
    return formatTable(rows, ["Tag", "Status", "ID"], { headerStyle: c.bold });
}

export function formatWorkspaces(
    workspaces: ClockifyWorkspace[],
    currentId: string | undefined,
    format: CatalogFormat,
    options: OutputOptions
): string {
    if (format === "json") {
        return JSON.stringify(
            workspaces.map((workspace) => ({ ...workspace, current: workspace.id === currentId })),
            null,
            2
        );
    }

    const c = createPalette(options.color);
    if (workspaces.length === 0) {
        return c.gray("No workspaces found");
    }

    const rows = workspaces.map((workspace) => [
        workspace.id === currentId ? c.green("*") : "",
        workspace.name,
        c.gray(workspace.id),
    ]);
    return formatTable(rows, ["", "Workspace", "ID"], { headerStyle: c.bold });
}
