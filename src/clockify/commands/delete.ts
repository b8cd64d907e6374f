import { Lookups } from "@app/clockify/lib/entries";
import { formatEntryAction } from "@app/clockify/lib/output";
import logger from "@app/logger";
import type { CommandContext, CommandOf } from "./context";

export async function deleteCommand(command: CommandOf<"delete">, context: CommandContext): Promise<void> {
    const { workspaceId } = await context.session();

    const entry = await context.api.getTimeEntry(workspaceId, command.id);
    const lookups = await Lookups.load(context.api, workspaceId);

    await context.api.deleteTimeEntry(workspaceId, command.id);
    logger.debug(`[delete] Deleted time entry ${command.id}`);

    console.log(formatEntryAction("Deleted", lookups.hydrate(entry), context.output));
}
