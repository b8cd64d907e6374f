import { UsageError } from "@app/clockify/errors";
import type {
    ClockifyApi,
    ClockifyProject,
    ClockifyTag,
    ClockifyTimeEntry,
    DateRange,
    EntryChanges,
    EntryDraft,
    Session,
    TimeEntryPayload,
} from "@app/clockify/types";
import { dayRange, resolveTimeInput, startOfDay, toApiTimestamp } from "@app/clockify/utils/date";

export interface ProjectRef {
    id: string;
    name: string;
    color: string | null;
}

export interface TagRef {
    id: string;
    name: string;
}

/**
 * A time entry with dates parsed and project/tag ids resolved to names
 */
export interface TimeEntryView {
    id: string;
    description: string;
    start: Date;
    end: Date | null; // null while running
    billable: boolean;
    project: ProjectRef | null;
    tags: TagRef[];
}

/**
 * Projects and tags of one workspace, indexed both ways.
 * Archived ones resolve by id only, so names never pick them for new entries.
 */
export class Lookups {
    private projectsById = new Map<string, ClockifyProject>();
    private projectsByName = new Map<string, ClockifyProject>();
    private tagsById = new Map<string, ClockifyTag>();
    private tagsByName = new Map<string, ClockifyTag>();

    constructor(projects: ClockifyProject[], tags: ClockifyTag[]) {
        for (const project of projects) {
            this.projectsById.set(project.id, project);
            if (!project.archived) {
                this.projectsByName.set(project.name, project);
            }
        }
        for (const tag of tags) {
            this.tagsById.set(tag.id, tag);
            if (!tag.archived) {
                this.tagsByName.set(tag.name, tag);
            }
        }
    }

    /**
     * Archived projects and tags are included: old entries still point at them
     */
    static async load(api: ClockifyApi, workspaceId: string): Promise<Lookups> {
        const projects = await api.getProjects(workspaceId, { archived: true });
        const tags = await api.getTags(workspaceId, { archived: true });
        return new Lookups(projects, tags);
    }

    /**
     * Project id for a name or id given on the command line
     */
    projectId(ref: string): string {
        const project = this.projectsByName.get(ref) ?? this.projectsById.get(ref) ?? findByLowerName(this.projectsByName, ref);
        if (!project) {
            throw new UsageError(`Unknown project "${ref}"`);
        }
        return project.id;
    }

    tagIds(refs: string[]): string[] {
        const unknown: string[] = [];
        const ids: string[] = [];

        for (const ref of refs) {
            const tag = this.tagsByName.get(ref) ?? this.tagsById.get(ref) ?? findByLowerName(this.tagsByName, ref);
            if (tag) {
                ids.push(tag.id);
            } else {
                unknown.push(ref);
            }
        }

        if (unknown.length > 0) {
            throw new UsageError(`Unknown tag${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`);
        }

        return [...new Set(ids)];
    }

    /**
     * Ids the workspace no longer knows (deleted, archived past the lookup) render as their raw id
     */
    hydrate(entry: ClockifyTimeEntry): TimeEntryView {
        const project = entry.projectId ? this.projectsById.get(entry.projectId) : undefined;

        return {
            id: entry.id,
            description: entry.description ?? "",
            start: new Date(entry.timeInterval.start),
            end: entry.timeInterval.end ? new Date(entry.timeInterval.end) : null,
            billable: entry.billable ?? false,
            project: entry.projectId
                ? { id: entry.projectId, name: project?.name ?? entry.projectId, color: project?.color ?? null }
                : null,
            tags: (entry.tagIds ?? []).map((id) => ({ id, name: this.tagsById.get(id)?.name ?? id })),
        };
    }
}

function findByLowerName<T extends { name: string }>(byName: Map<string, T>, ref: string): T | undefined {
    const lower = ref.toLowerCase();
    for (const [name, value] of byName) {
        if (name.toLowerCase() === lower) {
            return value;
        }
    }
    return undefined;
}

/**
 * Body for a new entry; `end` omitted starts a running entry
 */
export function buildNewEntryPayload(draft: EntryDraft, lookups: Lookups, start: Date, end?: Date): TimeEntryPayload {
    return {
        start: toApiTimestamp(start),
        end: end ? toApiTimestamp(end) : undefined,
        description: draft.description,
        billable: draft.billable,
        projectId: draft.project ? lookups.projectId(draft.project) : undefined,
        tagIds: lookups.tagIds(draft.tags),
    };
}

/**
 * Merge command-line changes into an existing entry, producing a full PUT body.
 * Clock times ("HH:MM") land on the entry's own start day.
 */
export function buildUpdatePayload(entry: ClockifyTimeEntry, changes: EntryChanges, lookups: Lookups): TimeEntryPayload {
    const currentStart = new Date(entry.timeInterval.start);
    const day = startOfDay(currentStart);

    const start = changes.start ? resolveTimeInput(changes.start, day) : currentStart;
    const currentEnd = entry.timeInterval.end ? new Date(entry.timeInterval.end) : undefined;
    const end = changes.end ? resolveTimeInput(changes.end, day) : currentEnd;

    if (end && end.getTime() <= start.getTime()) {
        throw new UsageError("End time must be after start time");
    }

    let projectId: string | undefined;
    if (changes.project === null) {
        projectId = undefined;
    } else if (changes.project !== undefined) {
        projectId = lookups.projectId(changes.project);
    } else {
        projectId = entry.projectId ?? undefined;
    }

    return {
        start: toApiTimestamp(start),
        end: end ? toApiTimestamp(end) : undefined,
        description: changes.description ?? entry.description ?? "",
        billable: changes.billable ?? entry.billable ?? false,
        projectId,
        tagIds: changes.tags ? lookups.tagIds(changes.tags) : (entry.tagIds ?? []),
    };
}

export interface DayEntries {
    range: DateRange;
    entries: ClockifyTimeEntry[];
}

/**
 * Entries of the local day containing `day`, fetched before a change is written
 */
export async function loadDay(api: ClockifyApi, session: Session, day: Date): Promise<DayEntries> {
    const range = dayRange(day);
    const entries = await api.getTimeEntries(session.workspaceId, session.userId, { start: range.start, end: range.end });
    return { range, entries };
}

/**
 * The day as it stands after `changed` was written, newest first like the service lists it.
 * An entry that moved to another day drops out.
 */
export function withChangedEntry(day: DayEntries, changed: ClockifyTimeEntry): ClockifyTimeEntry[] {
    const start = new Date(changed.timeInterval.start);
    const others = day.entries.filter((entry) => entry.id !== changed.id);
    const merged = start >= day.range.start && start < day.range.end ? [...others, changed] : others;
    return merged.sort((a, b) => Date.parse(b.timeInterval.start) - Date.parse(a.timeInterval.start));
}
