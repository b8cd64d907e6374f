import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { ClockifyConfig, StoredConfig } from "./types";

export const DEFAULT_BASE_URL = "https://api.clockify.me/api/v1";
export const DEFAULT_TIMEOUT_MS = 10_000;

export const ENVIRONMENT_VARIABLES: Array<[string, string]> = [
    ["CLOCKIFY_API_KEY", "API key from Profile settings (required)"],
    ["CLOCKIFY_WORKSPACE", "Workspace name or id (default: your active workspace)"],
    ["CLOCKIFY_USER_ID", "User id, skips the user lookup when a workspace is set"],
    ["CLOCKIFY_API_URL", `API base URL for regional hosts (default: ${DEFAULT_BASE_URL})`],
    ["CLOCKIFY_TIMEOUT_MS", `Request timeout in milliseconds (default: ${DEFAULT_TIMEOUT_MS})`],
];

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const EnvSchema = z.object({
    CLOCKIFY_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
    CLOCKIFY_WORKSPACE: z.preprocess(blankToUndefined, z.string().trim().optional()),
    CLOCKIFY_USER_ID: z.preprocess(blankToUndefined, z.string().trim().optional()),
    CLOCKIFY_API_URL: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
    CLOCKIFY_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
});

export const StoredConfigSchema = z.object({
    workspaceId: z.string().optional(),
    workspaceName: z.string().optional(),
});

export interface ConfigOverrides {
    workspace?: string;
}

/**
 * Read the stored config leniently: unknown keys and wrong types are dropped.
 */
export function parseStoredConfig(raw: unknown): StoredConfig | null {
    const parsed = StoredConfigSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

/**
 * Resolve settings from the environment, the stored config and command-line overrides.
 * Precedence for the workspace: --workspace, CLOCKIFY_WORKSPACE, stored default.
 */
export function resolveConfig(
    env: NodeJS.ProcessEnv,
    stored: StoredConfig | null = null,
    overrides: ConfigOverrides = {}
): ClockifyConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigurationError(`Invalid ${issue.path.join(".")}: ${issue.message}`);
    }

    const vars = parsed.data;
    if (!vars.CLOCKIFY_API_KEY) {
        throw new ConfigurationError(
            "CLOCKIFY_API_KEY is not set. Create an API key in your Clockify profile settings and export it as CLOCKIFY_API_KEY."
        );
    }

    return {
        apiKey: vars.CLOCKIFY_API_KEY,
        baseUrl: vars.CLOCKIFY_API_URL ?? DEFAULT_BASE_URL,
        workspace: overrides.workspace ?? vars.CLOCKIFY_WORKSPACE ?? stored?.workspaceId,
        userId: vars.CLOCKIFY_USER_ID,
        timeoutMs: vars.CLOCKIFY_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    };
}
