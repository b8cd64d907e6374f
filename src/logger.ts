import minimist from "minimist";
import pino from "pino";
import pretty from "pino-pretty";

const args = minimist(process.argv.slice(2), {
    alias: {
        v: "verbose",
    },
    boolean: ["verbose"],
    default: {
        verbose: false,
    },
});

const getLogLevel = (): pino.LevelWithSilent => {
    if (process.env.LOG_TRACE === "1") return "trace";
    if (process.env.LOG_DEBUG === "1") return "debug";
    if (process.env.LOG_SILENT === "1") return "silent";
    if (args.verbose) {
        return "debug";
    }

    return "info";
};

export interface LoggerOptions {
    level: pino.LevelWithSilent;
    includeTimestamp?: boolean;
    prefixPid?: boolean;
}

/**
 * Logs go to stderr so they never mix with command output on stdout.
 * A terminal gets pino-pretty, anything else gets one JSON object per line.
 */
export const createLogger = (options: LoggerOptions): pino.Logger => {
    const { level, includeTimestamp = true, prefixPid = false } = options;

    const stream = process.stderr.isTTY
        ? pretty({
              colorize: true,
              destination: 2,
              sync: true,
              translateTime: includeTimestamp ? "SYS:HH:MM:ss" : false,
              ignore: prefixPid ? "hostname" : "pid,hostname",
          })
        : pino.destination({ dest: 2, sync: true });

    const baseConfig: pino.LoggerOptions = {
        level,
        timestamp: includeTimestamp ? pino.stdTimeFunctions.isoTime : false,
    };

    if (prefixPid) {
        baseConfig.base = {
            pid: process.pid,
        };
    }

    return pino(baseConfig, stream);
};

const prefixPid = process.env.LOG_PID === "1";

const logger = createLogger({
    level: getLogLevel(),
    includeTimestamp: true,
    prefixPid,
});

/**
 * Raise or lower the level after startup, e.g. once commander has seen `--verbose`.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
    logger.level = level;
}

export default logger;
