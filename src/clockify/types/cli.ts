export type ListFormat = "lines" | "table" | "json";
export type CatalogFormat = "table" | "json";

/** Half-open interval [start, end) in absolute time */
export interface DateRange {
    start: Date;
    end: Date;
    label: string; // "2024-01-01", "2024-01-01 to 2024-01-02", "2024-01"
}

/**
 * A time given on the command line. "HH:MM" stays a clock time until the
 * handler knows which day it belongs to (edit resolves it against the entry).
 */
export type TimeInput = { kind: "clock"; hours: number; minutes: number } | { kind: "instant"; date: Date };

export interface EntryDraft {
    description: string;
    project?: string; // name or id
    tags: string[]; // names or ids
    billable: boolean;
}

export interface EntryChanges {
    description?: string;
    project?: string | null; // null clears the project
    tags?: string[]; // replaces the tag set; [] clears it
    billable?: boolean;
    start?: TimeInput;
    end?: TimeInput;
}

export type ClockifyCommand =
    | ({ name: "start"; start: Date } & EntryDraft)
    | { name: "stop"; end: Date }
    | ({ name: "add"; start: Date; end: Date } & EntryDraft)
    | { name: "list"; range: DateRange; format: ListFormat; showIds: boolean }
    | { name: "edit"; id: string; changes: EntryChanges }
    | { name: "delete"; id: string }
    | { name: "projects"; format: CatalogFormat; archived: boolean }
    | { name: "tags"; format: CatalogFormat; archived: boolean }
    | { name: "workspaces"; format: CatalogFormat; use?: string; select: boolean }
    | { name: "status" };

export type CommandName = ClockifyCommand["name"];

export interface GlobalOptions {
    workspace?: string;
    verbose: boolean;
    color: boolean;
}

export type ParseResult =
    | { type: "command"; command: ClockifyCommand; globals: GlobalOptions }
    | { type: "exit"; exitCode: number };
