import { Lookups } from "@app/clockify/lib/entries";
import { formatEntriesJson, formatEntryList, formatEntryTables } from "@app/clockify/lib/output";
import logger from "@app/logger";
import type { CommandContext, CommandOf } from "./context";

/**
 * Entries of the range in the order the service returns them
 */
export async function listCommand(command: CommandOf<"list">, context: CommandContext): Promise<void> {
    const { userId, workspaceId } = await context.session();
    const { range } = command;

    logger.debug(`[list] ${range.label}: ${range.start.toISOString()} - ${range.end.toISOString()}`);
    const entries = await context.api.getTimeEntries(workspaceId, userId, { start: range.start, end: range.end });

    const lookups = entries.length > 0 ? await Lookups.load(context.api, workspaceId) : new Lookups([], []);
    const views = entries.map((entry) => lookups.hydrate(entry));
    const lineOptions = { showIds: command.showIds };

    switch (command.format) {
        case "json":
            console.log(formatEntriesJson(views, context.output.now));
            break;
        case "table":
            console.log(formatEntryTables(views, range, context.output, lineOptions));
            break;
        case "lines":
            console.log(formatEntryList(views, range, context.output, lineOptions));
            break;
    }
}
