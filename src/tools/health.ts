/**
 * Health check tool - Returns server status
 */

import { isAssetAvailable } from "../lib/asset.js";
import { loadConfig, resolveVersion, type CattoConfig } from "../lib/config.js";
import { PROFILES, RANDOM_PATTERNS } from "../engine/registry.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    patternCount: number;
    profileCount: number;
    assets: {
        catto: boolean;
        heart: boolean;
    };
}

// Track server start time
const startTime = Date.now();

/**
 * Health check handler
 * @param toolCount - Number of tools the server exposes
 */
export function healthHandler(toolCount: number, config: CattoConfig = loadConfig()): HealthOutput {
    const uptimeSec = Math.floor((Date.now() - startTime) / 1000);

    return {
        ok: true,
        version: resolveVersion(config),
        uptimeSec,
        toolCount,
        patternCount: RANDOM_PATTERNS.length,
        profileCount: PROFILES.length,
        assets: {
            catto: isAssetAvailable("catto", config.assetDir),
            heart: isAssetAvailable("heart", config.assetDir),
        },
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count, pattern count and asset availability",
    inputSchema: {
        type: "object" as const,
        properties: {},
    },
};
