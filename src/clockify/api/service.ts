import { z } from "zod";
import {
    type ClockifyApi,
    type ClockifyProject,
    ClockifyProjectSchema,
    type ClockifyTag,
    ClockifyTagSchema,
    type ClockifyTimeEntry,
    ClockifyTimeEntrySchema,
    type ClockifyUser,
    ClockifyUserSchema,
    type ClockifyWorkspace,
    ClockifyWorkspaceSchema,
    type ListOptions,
    type TimeEntryPayload,
    type TimeEntryQuery,
} from "@app/clockify/types";
import { toApiTimestamp } from "@app/clockify/utils/date";
import logger from "@app/logger";
import type { ClockifyApiClient } from "./client";

/**
 * Every listing is fetched as a single page; Clockify caps page-size at 5000.
 */
export const PAGE_SIZE = 5000;

/**
 * ClockifyService provides one method per remote operation the CLI performs.
 * Wraps ClockifyApiClient with typed endpoints for users, workspaces, projects, tags and time entries.
 */
export class ClockifyService implements ClockifyApi {
    constructor(private client: ClockifyApiClient) {}

    // ============================================
    // Users & Workspaces
    // ============================================

    async getCurrentUser(): Promise<ClockifyUser> {
        return this.client.get("/user", ClockifyUserSchema);
    }

    async getWorkspaces(): Promise<ClockifyWorkspace[]> {
        return this.client.get("/workspaces", z.array(ClockifyWorkspaceSchema));
    }

    // ============================================
    // Projects & Tags
    // ============================================

    async getProjects(workspaceId: string, options: ListOptions = {}): Promise<ClockifyProject[]> {
        return this.client.get(`/workspaces/${workspaceId}/projects`, z.array(ClockifyProjectSchema), {
            "page-size": PAGE_SIZE,
            archived: options.archived ? undefined : false,
        });
    }

    async getTags(workspaceId: string, options: ListOptions = {}): Promise<ClockifyTag[]> {
        return this.client.get(`/workspaces/${workspaceId}/tags`, z.array(ClockifyTagSchema), {
            "page-size": PAGE_SIZE,
            archived: options.archived ? undefined : false,
        });
    }

    // ============================================
    // Time Entries
    // ============================================

    /**
     * Entries of one user, newest first, as the service orders them
     */
    async getTimeEntries(workspaceId: string, userId: string, query: TimeEntryQuery): Promise<ClockifyTimeEntry[]> {
        const entries = await this.client.get(
            `/workspaces/${workspaceId}/user/${userId}/time-entries`,
            z.array(ClockifyTimeEntrySchema),
            {
                start: query.start ? toApiTimestamp(query.start) : undefined,
                end: query.end ? toApiTimestamp(query.end) : undefined,
                "in-progress": query.inProgress ? true : undefined,
                "page-size": PAGE_SIZE,
            }
        );
        logger.debug(`[clockify] Found ${entries.length} time entries`);
        return entries;
    }

    async getRunningEntry(workspaceId: string, userId: string): Promise<ClockifyTimeEntry | null> {
        const entries = await this.getTimeEntries(workspaceId, userId, { inProgress: true });
        return entries[0] ?? null;
    }

    async getTimeEntry(workspaceId: string, entryId: string): Promise<ClockifyTimeEntry> {
        return this.client.get(`/workspaces/${workspaceId}/time-entries/${entryId}`, ClockifyTimeEntrySchema);
    }

    /**
     * Create an entry; without `end` it starts running
     */
    async createTimeEntry(workspaceId: string, payload: TimeEntryPayload): Promise<ClockifyTimeEntry> {
        return this.client.post(`/workspaces/${workspaceId}/time-entries`, ClockifyTimeEntrySchema, payload);
    }

    /**
     * Replace an entry (PUT semantics: omitted optional fields are cleared)
     */
    async updateTimeEntry(workspaceId: string, entryId: string, payload: TimeEntryPayload): Promise<ClockifyTimeEntry> {
        return this.client.put(`/workspaces/${workspaceId}/time-entries/${entryId}`, ClockifyTimeEntrySchema, payload);
    }

    /**
     * Stop the user's running entry at `end`. Clockify answers 404 when nothing is running.
     */
    async stopRunningEntry(workspaceId: string, userId: string, end: Date): Promise<ClockifyTimeEntry> {
        return this.client.patch(`/workspaces/${workspaceId}/user/${userId}/time-entries`, ClockifyTimeEntrySchema, {
            end: toApiTimestamp(end),
        });
    }

    async deleteTimeEntry(workspaceId: string, entryId: string): Promise<void> {
        await this.client.delete(`/workspaces/${workspaceId}/time-entries/${entryId}`);
    }
}
