import { ExitPromptError } from "@inquirer/core";
import chalk from "chalk";
import { parseArgs } from "@app/clockify/cli/parser";
import { addCommand } from "@app/clockify/commands/add";
import type { CommandContext } from "@app/clockify/commands/context";
import { deleteCommand } from "@app/clockify/commands/delete";
import { editCommand } from "@app/clockify/commands/edit";
import { listCommand } from "@app/clockify/commands/list";
import { projectsCommand } from "@app/clockify/commands/projects";
import { startCommand } from "@app/clockify/commands/start";
import { statusCommand } from "@app/clockify/commands/status";
import { stopCommand } from "@app/clockify/commands/stop";
import { tagsCommand } from "@app/clockify/commands/tags";
import { workspacesCommand } from "@app/clockify/commands/workspaces";
import { parseStoredConfig, resolveConfig } from "@app/clockify/config";
import { ClockifyError, EXIT_CODES } from "@app/clockify/errors";
import { resolveSession } from "@app/clockify/lib/session";
import type { ClockifyApi, ClockifyCommand, ClockifyConfig, Session } from "@app/clockify/types";
import logger, { setLogLevel } from "@app/logger";
import type { Storage } from "@app/utils/storage/storage";

export interface RunDependencies {
    env: NodeJS.ProcessEnv;
    storage: Storage;
    createApi: (config: ClockifyConfig) => ClockifyApi;
    now: () => Date;
}

async function dispatch(command: ClockifyCommand, context: CommandContext): Promise<void> {
    switch (command.name) {
        case "start":
            return startCommand(command, context);
        case "stop":
            return stopCommand(command, context);
        case "add":
            return addCommand(command, context);
        case "list":
            return listCommand(command, context);
        case "edit":
            return editCommand(command, context);
        case "delete":
            return deleteCommand(command, context);
        case "projects":
            return projectsCommand(command, context);
        case "tags":
            return tagsCommand(command, context);
        case "workspaces":
            return workspacesCommand(command, context);
        case "status":
            return statusCommand(command, context);
        default: {
            const _exhaustive: never = command;
            throw new Error(`Unhandled command ${JSON.stringify(_exhaustive)}`);
        }
    }
}

/**
 * One line on stderr per failure; the stack only with --verbose
 */
function reportError(error: unknown, verbose: boolean): number {
    if (error instanceof ExitPromptError) {
        logger.debug("[clockify] Prompt cancelled");
        return EXIT_CODES.success;
    }

    if (error instanceof ClockifyError) {
        console.error(`${chalk.red("Error:")} ${error.message}`);
        logger.debug({ err: error }, `[clockify] ${error.name}`);
        if (verbose && error.stack) {
            console.error(chalk.gray(error.stack));
        }
        return error.exitCode;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`${chalk.red("Unexpected error:")} ${message}`);
    if (verbose && error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
    }
    return EXIT_CODES.unexpected;
}

/**
 * Run one invocation and return its exit code. Never throws.
 */
export async function run(argv: string[], deps: RunDependencies): Promise<number> {
    const now = deps.now();
    let verbose = argv.includes("-v") || argv.includes("--verbose");

    try {
        const parsed = parseArgs(argv, { now });
        if (parsed.type === "exit") {
            return parsed.exitCode;
        }

        const { command, globals } = parsed;
        verbose = globals.verbose;
        if (!globals.color) {
            chalk.level = 0;
        }
        if (verbose && !logger.isLevelEnabled("debug")) {
            setLogLevel("debug");
        }

        const stored = parseStoredConfig(await deps.storage.getConfig());
        const config = resolveConfig(deps.env, stored, { workspace: globals.workspace });
        const api = deps.createApi(config);

        let session: Promise<Session> | undefined;
        const context: CommandContext = {
            api,
            config,
            storage: deps.storage,
            output: { color: globals.color && chalk.level > 0, now },
            session: () => {
                session ??= resolveSession(api, config);
                return session;
            },
        };

        logger.debug(`[clockify] Running ${command.name}`);
        await dispatch(command, context);
        return EXIT_CODES.success;
    } catch (error) {
        return reportError(error, verbose);
    }
}
