import { z } from "zod";

// ============================================
// Wire schemas (Clockify REST API v1)
// ============================================

export const ClockifyUserSchema = z.object({
    id: z.string(),
    name: z.string().nullish(),
    email: z.string().nullish(),
    activeWorkspace: z.string().nullish(),
    defaultWorkspace: z.string().nullish(),
});

export const ClockifyWorkspaceSchema = z.object({
    id: z.string(),
    name: z.string(),
});

export const ClockifyProjectSchema = z.object({
    id: z.string(),
    name: z.string(),
    color: z.string().nullish(),
    archived: z.boolean().nullish(),
    billable: z.boolean().nullish(),
    clientName: z.string().nullish(),
});

export const ClockifyTagSchema = z.object({
    id: z.string(),
    name: z.string(),
    archived: z.boolean().nullish(),
});

export const TimeIntervalSchema = z.object({
    start: z.string().datetime({ offset: true }),
    end: z.string().datetime({ offset: true }).nullish(),
    duration: z.string().nullish(), // ISO-8601, e.g. "PT1H30M"
});

export const ClockifyTimeEntrySchema = z.object({
    id: z.string(),
    description: z.string().nullish(),
    billable: z.boolean().nullish(),
    projectId: z.string().nullish(),
    tagIds: z.array(z.string()).nullish(),
    userId: z.string().nullish(),
    workspaceId: z.string().nullish(),
    timeInterval: TimeIntervalSchema,
});

export type ClockifyUser = z.infer<typeof ClockifyUserSchema>;
export type ClockifyWorkspace = z.infer<typeof ClockifyWorkspaceSchema>;
export type ClockifyProject = z.infer<typeof ClockifyProjectSchema>;
export type ClockifyTag = z.infer<typeof ClockifyTagSchema>;
export type ClockifyTimeEntry = z.infer<typeof ClockifyTimeEntrySchema>;

// ============================================
// Request bodies
// ============================================

/**
 * Body of POST/PUT /workspaces/{workspaceId}/time-entries.
 * PUT replaces the entry, so every field that should survive must be sent.
 */
export interface TimeEntryPayload {
    start: string;
    end?: string;
    description: string;
    billable: boolean;
    projectId?: string;
    tagIds: string[];
}

export interface TimeEntryQuery {
    start?: Date;
    end?: Date;
    inProgress?: boolean;
}

export interface ListOptions {
    archived?: boolean;
}

// ============================================
// The remote operations the CLI performs
// ============================================

export interface ClockifyApi {
    getCurrentUser(): Promise<ClockifyUser>;
    getWorkspaces(): Promise<ClockifyWorkspace[]>;
    getProjects(workspaceId: string, options?: ListOptions): Promise<ClockifyProject[]>;
    getTags(workspaceId: string, options?: ListOptions): Promise<ClockifyTag[]>;
    getTimeEntries(workspaceId: string, userId: string, query: TimeEntryQuery): Promise<ClockifyTimeEntry[]>;
    getRunningEntry(workspaceId: string, userId: string): Promise<ClockifyTimeEntry | null>;
    getTimeEntry(workspaceId: string, entryId: string): Promise<ClockifyTimeEntry>;
    createTimeEntry(workspaceId: string, payload: TimeEntryPayload): Promise<ClockifyTimeEntry>;
    updateTimeEntry(workspaceId: string, entryId: string, payload: TimeEntryPayload): Promise<ClockifyTimeEntry>;
    stopRunningEntry(workspaceId: string, userId: string, end: Date): Promise<ClockifyTimeEntry>;
    deleteTimeEntry(workspaceId: string, entryId: string): Promise<void>;
}
