import { ConfigurationError, UsageError } from "@app/clockify/errors";
import type { ClockifyApi, ClockifyConfig, ClockifyUser, ClockifyWorkspace, Session } from "@app/clockify/types";
import logger from "@app/logger";

/**
 * Match a workspace by id first, then by name (exact, then case-insensitive)
 */
export function findWorkspace(workspaces: ClockifyWorkspace[], ref: string): ClockifyWorkspace | undefined {
    const lower = ref.toLowerCase();
    return (
        workspaces.find((w) => w.id === ref) ??
        workspaces.find((w) => w.name === ref) ??
        workspaces.find((w) => w.name.toLowerCase() === lower)
    );
}

/** Answers the caller already has, so they are not fetched again */
export interface KnownAccount {
    user?: ClockifyUser;
    workspaces?: ClockifyWorkspace[];
}

/**
 * Resolve the user/workspace pair every later request is scoped to.
 * Costs at most two requests: GET /user and GET /workspaces.
 */
export async function resolveSession(api: ClockifyApi, config: ClockifyConfig, known: KnownAccount = {}): Promise<Session> {
    const user = known.user ?? (config.userId && config.workspace ? null : await api.getCurrentUser());
    const userId = config.userId ?? user?.id;

    if (!userId) {
        throw new ConfigurationError("Could not determine the Clockify user id");
    }

    if (config.workspace) {
        const workspaces = known.workspaces ?? (await api.getWorkspaces());
        const workspace = findWorkspace(workspaces, config.workspace);
        if (!workspace) {
            const known = workspaces.map((w) => w.name).join(", ") || "none";
            throw new UsageError(`No workspace "${config.workspace}" found (available: ${known})`);
        }
        logger.debug(`[session] Using workspace ${workspace.name} (${workspace.id})`);
        return { userId, workspaceId: workspace.id };
    }

    const workspaceId = user?.activeWorkspace ?? user?.defaultWorkspace;
    if (!workspaceId) {
        throw new ConfigurationError(
            "No active workspace on this account; pass --workspace or set CLOCKIFY_WORKSPACE"
        );
    }

    logger.debug(`[session] Using active workspace ${workspaceId}`);
    return { userId, workspaceId };
}
