import { ApiError, UsageError } from "@app/clockify/errors";
import { loadDay, Lookups, withChangedEntry } from "@app/clockify/lib/entries";
import { formatChangedDay } from "@app/clockify/lib/output";
import type { ClockifyTimeEntry } from "@app/clockify/types";
import logger from "@app/logger";
import type { CommandContext, CommandOf } from "./context";

const NOTHING_RUNNING = "No running time entry to stop";

/**
 * Stop the running entry. Every read happens before the PATCH.
 */
export async function stopCommand(command: CommandOf<"stop">, context: CommandContext): Promise<void> {
    const session = await context.session();

    const running = await context.api.getRunningEntry(session.workspaceId, session.userId);
    if (!running) {
        throw new UsageError(NOTHING_RUNNING);
    }

    const lookups = await Lookups.load(context.api, session.workspaceId);
    const day = await loadDay(context.api, session, new Date(running.timeInterval.start));

    let entry: ClockifyTimeEntry;
    try {
        entry = await context.api.stopRunningEntry(session.workspaceId, session.userId, command.end);
    } catch (error) {
        // Stopped elsewhere in the meantime
        if (error instanceof ApiError && error.status === 404) {
            throw new UsageError(NOTHING_RUNNING);
        }
        throw error;
    }
    logger.debug(`[stop] Stopped time entry ${entry.id}`);

    const views = withChangedEntry(day, entry).map((e) => lookups.hydrate(e));
    console.log(formatChangedDay("Stopped", lookups.hydrate(entry), views, day.range, context.output));
}
