import { describe, expect, it } from "vitest";
import { UsageError } from "@app/clockify/errors";
import { buildNewEntryPayload, buildUpdatePayload, loadDay, Lookups, withChangedEntry } from "@app/clockify/lib/entries";
import { ClockifyTimeEntrySchema } from "@app/clockify/types";
import { dayRange } from "@app/clockify/utils/date";
import { archivedProject, FakeClockifyApi, makeEntry, projects, tags } from "./test-utils";

const lookups = new Lookups(projects, tags);

describe("Lookups", () => {
    it("loads projects and tags of a workspace including archived ones", async () => {
        const api = new FakeClockifyApi();
        const loaded = await Lookups.load(api, "ws-1");

        expect(api.calls).toEqual(["getProjects(archived)", "getTags(archived)"]);
        expect(loaded.projectId("X")).toBe("proj-x");
        expect(loaded.hydrate(makeEntry({ projectId: "proj-old" })).project).toEqual({
            id: "proj-old",
            name: "Legacy",
            color: "#9E9E9E",
        });
    });

    it("resolves archived projects by id only", () => {
        const withArchived = new Lookups([...projects, archivedProject], tags);

        expect(withArchived.projectId("proj-old")).toBe("proj-old");
        expect(() => withArchived.projectId("Legacy")).toThrow(new UsageError('Unknown project "Legacy"'));
    });

    it("resolves projects by name, id or case-insensitive name", () => {
        expect(lookups.projectId("X")).toBe("proj-x");
        expect(lookups.projectId("proj-docs")).toBe("proj-docs");
        expect(lookups.projectId("docs")).toBe("proj-docs");
    });

    it("rejects unknown projects", () => {
        expect(() => lookups.projectId("Nope")).toThrow(new UsageError('Unknown project "Nope"'));
    });

    it("resolves and de-duplicates tags", () => {
        expect(lookups.tagIds(["review", "MEETING", "tag-review"])).toEqual(["tag-review", "tag-meeting"]);
        expect(lookups.tagIds([])).toEqual([]);
    });

    it("names every unknown tag", () => {
        expect(() => lookups.tagIds(["review", "a"])).toThrow("Unknown tag: a");
        expect(() => lookups.tagIds(["a", "b"])).toThrow("Unknown tags: a, b");
    });

    it("hydrates entries with names", () => {
        const view = lookups.hydrate(makeEntry({ tagIds: ["tag-review"], billable: true }));

        expect(view).toEqual({
            id: "entry-1",
            description: "writing spec",
            start: new Date("2024-01-01T10:00:00Z"),
            end: new Date("2024-01-01T11:30:00Z"),
            billable: true,
            project: { id: "proj-x", name: "X", color: "#FF5722" },
            tags: [{ id: "tag-review", name: "review" }],
        });
    });

    it("falls back to raw ids and tolerates missing fields", () => {
        const view = lookups.hydrate(
            makeEntry({
                description: null,
                billable: null,
                projectId: "proj-gone",
                tagIds: ["tag-gone"],
                timeInterval: { start: "2024-01-01T10:00:00Z", end: null },
            })
        );

        expect(view.description).toBe("");
        expect(view.billable).toBe(false);
        expect(view.end).toBeNull();
        expect(view.project).toEqual({ id: "proj-gone", name: "proj-gone", color: null });
        expect(view.tags).toEqual([{ id: "tag-gone", name: "tag-gone" }]);
    });

    it("hydrates entries without a project", () => {
        expect(lookups.hydrate(makeEntry({ projectId: null, tagIds: null })).project).toBeNull();
    });
});

describe("buildNewEntryPayload", () => {
    const draft = { description: "writing spec", project: "X", tags: ["review"], billable: true };

    it("builds a running entry without an end", () => {
        expect(buildNewEntryPayload(draft, lookups, new Date("2024-01-01T10:00:00.500Z"))).toEqual({
            start: "2024-01-01T10:00:00Z",
            end: undefined,
            description: "writing spec",
            billable: true,
            projectId: "proj-x",
            tagIds: ["tag-review"],
        });
    });

    it("builds a finished entry", () => {
        const payload = buildNewEntryPayload(
            { description: "Planning", tags: [], billable: false },
            lookups,
            new Date("2024-01-01T13:00:00Z"),
            new Date("2024-01-01T14:30:00Z")
        );

        expect(payload.end).toBe("2024-01-01T14:30:00Z");
        expect(payload.projectId).toBeUndefined();
    });

    it("validates names before anything is sent", () => {
        expect(() => buildNewEntryPayload({ ...draft, project: "Nope" }, lookups, new Date())).toThrow(UsageError);
    });
});

describe("buildUpdatePayload", () => {
    const entry = makeEntry({ tagIds: ["tag-review"], billable: true });

    it("keeps every field that is not changed", () => {
        expect(buildUpdatePayload(entry, { end: { kind: "clock", hours: 12, minutes: 0 } }, lookups)).toEqual({
            start: "2024-01-01T10:00:00Z",
            end: "2024-01-01T12:00:00Z",
            description: "writing spec",
            billable: true,
            projectId: "proj-x",
            tagIds: ["tag-review"],
        });
    });

    it("clears project and tags", () => {
        const payload = buildUpdatePayload(entry, { project: null, tags: [] }, lookups);

        expect(payload.projectId).toBeUndefined();
        expect(payload.tagIds).toEqual([]);
    });

    it("swaps project, tags, description and billable", () => {
        const payload = buildUpdatePayload(
            entry,
            { project: "Docs", tags: ["meeting"], description: "Sync", billable: false },
            lookups
        );

        expect(payload).toMatchObject({ projectId: "proj-docs", tagIds: ["tag-meeting"], description: "Sync", billable: false });
    });

    it("keeps a running entry running", () => {
        const running = makeEntry({ timeInterval: { start: "2024-01-01T10:00:00Z", end: null } });

        expect(buildUpdatePayload(running, { description: "renamed" }, lookups).end).toBeUndefined();
    });

    it("rejects a start after the end", () => {
        expect(() => buildUpdatePayload(entry, { start: { kind: "clock", hours: 12, minutes: 0 } }, lookups)).toThrow(
            "End time must be after start time"
        );
    });
});

describe("day of a change", () => {
    const range = dayRange(new Date("2024-01-01T12:00:00Z"));
    const morning = makeEntry({ id: "entry-2", timeInterval: { start: "2024-01-01T08:00:00Z", end: "2024-01-01T09:00:00Z" } });

    it("loads the local day around an instant", async () => {
        const api = new FakeClockifyApi([morning]);

        const day = await loadDay(api, { userId: "user-1", workspaceId: "ws-1" }, new Date("2024-01-01T15:00:00Z"));

        expect(day.range).toEqual(range);
        expect(api.lastQuery).toEqual({ start: range.start, end: range.end });
        expect(day.entries).toEqual([morning]);
    });

    it("adds a new entry newest first", () => {
        const created = makeEntry({ id: "entry-3", timeInterval: { start: "2024-01-01T13:00:00Z", end: null } });

        expect(withChangedEntry({ range, entries: [makeEntry(), morning] }, created).map((e) => e.id)).toEqual([
            "entry-3",
            "entry-1",
            "entry-2",
        ]);
    });

    it("replaces a changed entry and drops one moved to another day", () => {
        const edited = makeEntry({ description: "edited" });
        const moved = makeEntry({ timeInterval: { start: "2024-01-02T10:00:00Z", end: "2024-01-02T11:00:00Z" } });
        const day = { range, entries: [makeEntry(), morning] };

        expect(withChangedEntry(day, edited).map((e) => e.description)).toEqual(["edited", "writing spec"]);
        expect(withChangedEntry(day, moved).map((e) => e.id)).toEqual(["entry-2"]);
    });
});

describe("ClockifyTimeEntrySchema", () => {
    it("accepts UTC and offset timestamps", () => {
        const entry = makeEntry({ timeInterval: { start: "2024-01-01T10:00:00+01:00", end: "2024-01-01T11:30:00.000Z" } });

        expect(ClockifyTimeEntrySchema.safeParse(entry).success).toBe(true);
    });

    it("rejects malformed timestamps", () => {
        const entry = makeEntry({ timeInterval: { start: "yesterday-ish", end: null } });

        expect(ClockifyTimeEntrySchema.safeParse(entry).success).toBe(false);
    });
});
