import { Lookups } from "@app/clockify/lib/entries";
import { createPalette, formatEntryLine } from "@app/clockify/lib/output";
import { resolveSession } from "@app/clockify/lib/session";
import { maskSecret } from "@app/utils/format";
import type { CommandContext, CommandOf } from "./context";

export async function statusCommand(_command: CommandOf<"status">, context: CommandContext): Promise<void> {
    const c = createPalette(context.output.color);
    const { api, config } = context;

    const user = await api.getCurrentUser();
    const workspaces = await api.getWorkspaces();
    const { userId, workspaceId } = await resolveSession(api, config, { user, workspaces });
    const workspace = workspaces.find((w) => w.id === workspaceId);

    console.log(c.cyan("Clockify CLI Status"));
    console.log();
    console.log(`User:      ${user.name ?? user.id}${user.email ? ` (${user.email})` : ""}`);
    console.log(`Workspace: ${workspace ? workspace.name : workspaceId} ${c.gray(`(${workspaceId})`)}`);
    console.log(`API key:   ${maskSecret(config.apiKey)}`);
    console.log(`API URL:   ${config.baseUrl}`);

    const running = await api.getRunningEntry(workspaceId, userId);
    if (running) {
        const lookups = await Lookups.load(api, workspaceId);
        console.log(`Running:   ${formatEntryLine(lookups.hydrate(running), context.output)}`);
    } else {
        console.log(`Running:   ${c.gray("(none)")}`);
    }

    console.log();
    console.log(c.gray(`Config: ${context.storage.getConfigPath()}`));
}
