import { buildNewEntryPayload, loadDay, Lookups, withChangedEntry } from "@app/clockify/lib/entries";
import { formatChangedDay } from "@app/clockify/lib/output";
import logger from "@app/logger";
import type { CommandContext, CommandOf } from "./context";

export async function addCommand(command: CommandOf<"add">, context: CommandContext): Promise<void> {
    const session = await context.session();
    const lookups = await Lookups.load(context.api, session.workspaceId);
    const payload = buildNewEntryPayload(command, lookups, command.start, command.end);
    const day = await loadDay(context.api, session, command.start);

    const entry = await context.api.createTimeEntry(session.workspaceId, payload);
    logger.debug(`[add] Created time entry ${entry.id}`);

    const views = withChangedEntry(day, entry).map((e) => lookups.hydrate(e));
    console.log(formatChangedDay("Added", lookups.hydrate(entry), views, day.range, context.output));
}
