/**
 * Settings resolved from the environment, the stored config and CLI overrides
 */
export interface ClockifyConfig {
    apiKey: string;
    baseUrl: string;
    /** Workspace id or name; the user's active workspace when absent */
    workspace?: string;
    /** Skips the GET /user lookup when set together with a workspace */
    userId?: string;
    timeoutMs: number;
}

/**
 * Stored in ~/.clockify/config.json
 */
export interface StoredConfig {
    workspaceId?: string;
    workspaceName?: string;
}

/**
 * The user/workspace pair every request is scoped to
 */
export interface Session {
    userId: string;
    workspaceId: string;
}
