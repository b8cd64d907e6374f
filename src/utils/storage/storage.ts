import { existsSync, mkdirSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import logger from "@app/logger";

export interface StorageOptions {
    /** Override the base directory (defaults to ~/.<toolName>) */
    baseDir?: string;
}

export class Storage {
    private toolName: string;
    private baseDir: string;
    private configPath: string;

    /**
     * Create a Storage instance for a tool
     * @param toolName - Name of the tool (e.g., "clockify")
     */
    constructor(toolName: string, options: StorageOptions = {}) {
        this.toolName = toolName;
        this.baseDir = options.baseDir ?? join(homedir(), `.${toolName}`);
        this.configPath = join(this.baseDir, "config.json");
    }

    // ============================================
    // Directory Management
    // ============================================

    getConfigPath(): string {
        return this.configPath;
    }

    async ensureDirs(): Promise<void> {
        if (!existsSync(this.baseDir)) {
            mkdirSync(this.baseDir, { recursive: true });
            logger.debug(`[${this.toolName}] Created directory: ${this.baseDir}`);
        }
    }

    // ============================================
    // Config Management
    // ============================================

    /**
     * Read the entire config object
     * @returns The config object, or null if the file is missing or unreadable
     */
    async getConfig(): Promise<Record<string, unknown> | null> {
        if (!existsSync(this.configPath)) {
            return null;
        }

        try {
            const parsed: unknown = JSON.parse(await readFile(this.configPath, "utf8"));
            if (!isRecord(parsed)) {
                logger.warn(`Ignoring config at ${this.configPath}: not a JSON object`);
                return null;
            }
            return parsed;
        } catch (error) {
            logger.warn(`Failed to read config ${this.configPath}: ${error}`);
            return null;
        }
    }

    /**
     * Set a value in config (merges with existing config)
     * @param key - The config key (supports dot notation)
     */
    async setConfigValue(key: string, value: unknown): Promise<void> {
        await this.ensureDirs();
        const config = (await this.getConfig()) ?? {};

        const keys = key.split(".");
        let current = config;
        for (const k of keys.slice(0, -1)) {
            const next = current[k];
            if (isRecord(next)) {
                current = next;
            } else {
                const created: Record<string, unknown> = {};
                current[k] = created;
                current = created;
            }
        }
        current[keys[keys.length - 1]] = value;

        await writeFile(this.configPath, JSON.stringify(config, null, 2));
        logger.debug(`Config updated: ${key}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
