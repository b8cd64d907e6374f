import { select } from "@inquirer/prompts";
import chalk from "chalk";
import { UsageError } from "@app/clockify/errors";
import { createPalette, formatWorkspaces } from "@app/clockify/lib/output";
import { findWorkspace } from "@app/clockify/lib/session";
import type { ClockifyWorkspace } from "@app/clockify/types";
import logger from "@app/logger";
import type { CommandContext, CommandOf } from "./context";

async function storeDefault(workspace: ClockifyWorkspace, context: CommandContext): Promise<void> {
    await context.storage.setConfigValue("workspaceId", workspace.id);
    await context.storage.setConfigValue("workspaceName", workspace.name);
    logger.debug(`[workspaces] Stored default workspace in ${context.storage.getConfigPath()}`);

    const c = createPalette(context.output.color);
    console.log(`Default workspace set to ${c.bold(workspace.name)} ${c.gray(`(${workspace.id})`)}`);
}

/**
 * Workspace the other commands would use: the configured one, else the user's active one
 */
async function currentWorkspaceId(workspaces: ClockifyWorkspace[], context: CommandContext): Promise<string | undefined> {
    if (context.config.workspace) {
        return findWorkspace(workspaces, context.config.workspace)?.id;
    }
    const user = await context.api.getCurrentUser();
    return user.activeWorkspace ?? user.defaultWorkspace ?? undefined;
}

export async function workspacesCommand(command: CommandOf<"workspaces">, context: CommandContext): Promise<void> {
    const workspaces = await context.api.getWorkspaces();

    if (command.use) {
        const workspace = findWorkspace(workspaces, command.use);
        if (!workspace) {
            const known = workspaces.map((w) => w.name).join(", ") || "none";
            throw new UsageError(`No workspace "${command.use}" found (available: ${known})`);
        }
        await storeDefault(workspace, context);
        return;
    }

    const currentId = await currentWorkspaceId(workspaces, context);

    if (command.select) {
        if (workspaces.length === 0) {
            throw new UsageError("No workspaces to choose from");
        }

        const selectedId = await select({
            message: "Select default workspace:",
            choices: workspaces.map((w) => ({
                value: w.id,
                name: w.name + (w.id === currentId ? chalk.green(" (current)") : ""),
            })),
            default: currentId,
        });

        const workspace = workspaces.find((w) => w.id === selectedId);
        if (workspace) {
            await storeDefault(workspace, context);
        }
        return;
    }

    console.log(formatWorkspaces(workspaces, currentId, command.format, context.output));
}
