#!/usr/bin/env tsx

/**
 * Clockify CLI
 *
 * Start, stop, add, list and edit Clockify time entries from the terminal.
 *
 * Usage:
 *   clockify start "Code review" -p Backend
 *   clockify stop
 *   clockify list --from 2024-01-01 --to 2024-01-07
 */

import logger from "@app/logger";
import { Storage } from "@app/utils/storage/storage";
import { ClockifyApiClient } from "./api/client";
import { ClockifyService } from "./api/service";
import { run } from "./run";

async function main(): Promise<void> {
    const exitCode = await run(process.argv.slice(2), {
        env: process.env,
        storage: new Storage("clockify"),
        createApi: (config) =>
            new ClockifyService(
                new ClockifyApiClient({ apiKey: config.apiKey, baseUrl: config.baseUrl, timeoutMs: config.timeoutMs })
            ),
        now: () => new Date(),
    });
    process.exitCode = exitCode;
}

main().catch((err) => {
    logger.error(`Unexpected error: ${err}`);
    process.exit(1);
});
