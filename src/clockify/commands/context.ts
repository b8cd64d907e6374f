import type { OutputOptions } from "@app/clockify/lib/output";
import type { ClockifyApi, ClockifyCommand, ClockifyConfig, CommandName, Session } from "@app/clockify/types";
import type { Storage } from "@app/utils/storage/storage";

/**
 * What every handler gets: the API, resolved settings and output options.
 * The session is resolved on first use; `workspaces` never needs it.
 */
export interface CommandContext {
    api: ClockifyApi;
    config: ClockifyConfig;
    storage: Storage;
    output: OutputOptions;
    session(): Promise<Session>;
}

export type CommandOf<N extends CommandName> = Extract<ClockifyCommand, { name: N }>;
