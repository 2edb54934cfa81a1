/**
 * Runtime configuration
 * Read from the environment only; there are no configuration files
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

export interface CattoConfig {
    /** Directory holding catto.txt and heart.txt */
    assetDir?: string;
    /** Default seed for random pattern draws */
    seed?: number;
    /** Version reported by --version and the health tool */
    version?: string;
}

const envSchema = z.object({
    CATTO_ASSET_DIR: z.string().min(1).optional(),
    CATTO_SEED: z
        .string()
        .regex(/^-?\d+$/, "CATTO_SEED must be an integer")
        .transform(Number)
        .optional(),
    VERSION: z.string().min(1).optional(),
});

export class ConfigError extends Error {
    constructor(detail: string) {
        super(`ERROR-CF-01: Invalid environment: ${detail}`);
        this.name = "ConfigError";
    }
}

/**
 * Parses catto settings out of the environment
 * @throws ConfigError when a variable is set to something unusable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CattoConfig {
    const parseResult = envSchema.safeParse(env);
    if (!parseResult.success) {
        const issue = parseResult.error.issues[0];
        throw new ConfigError(
            issue ? `${issue.path.join(".")}: ${issue.message}` : "unreadable"
        );
    }

    const { CATTO_ASSET_DIR, CATTO_SEED, VERSION } = parseResult.data;
    return {
        assetDir: CATTO_ASSET_DIR,
        seed: CATTO_SEED,
        version: VERSION,
    };
}

const packageJsonSchema = z.object({
    version: z.string(),
});

/**
 * Get version from the environment or package.json
 */
export function resolveVersion(config: CattoConfig = {}): string {
    if (config.version) {
        return config.version;
    }

    try {
        const packagePath = fileURLToPath(new URL("../../package.json", import.meta.url));
        const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packagePath, "utf-8")));
        return parsed.success ? parsed.data.version : "unknown";
    } catch {
        return "unknown";
    }
}
