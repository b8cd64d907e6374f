import { buildUpdatePayload, loadDay, Lookups, withChangedEntry } from "@app/clockify/lib/entries";
import { formatChangedDay } from "@app/clockify/lib/output";
import logger from "@app/logger";
import type { CommandContext, CommandOf } from "./context";

/**
 * Read the entry, merge the changes, write it back whole (PUT replaces)
 */
export async function editCommand(command: CommandOf<"edit">, context: CommandContext): Promise<void> {
    const session = await context.session();

    const current = await context.api.getTimeEntry(session.workspaceId, command.id);
    const lookups = await Lookups.load(context.api, session.workspaceId);

    const payload = buildUpdatePayload(current, command.changes, lookups);
    const day = await loadDay(context.api, session, new Date(payload.start));

    logger.debug({ payload }, `[edit] Updating time entry ${command.id}`);
    const updated = await context.api.updateTimeEntry(session.workspaceId, command.id, payload);

    const views = withChangedEntry(day, updated).map((e) => lookups.hydrate(e));
    console.log(formatChangedDay("Updated", lookups.hydrate(updated), views, day.range, context.output));
}
