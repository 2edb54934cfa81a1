/**
 * Bundled ASCII art loader
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";

export type AssetName = "catto" | "heart";

const ASSET_FILES: Readonly<Record<AssetName, string>> = {
    catto: "catto.txt",
    heart: "heart.txt",
};

/**
 * assets/ at the package root, from both src/lib and dist/lib
 */
export const DEFAULT_ASSET_DIR = fileURLToPath(new URL("../../assets/", import.meta.url));

export class AssetLoadError extends Error {
    constructor(readonly assetPath: string, cause?: unknown) {
        super(
            `ERROR-AS-01: Cannot read ASCII art at ${assetPath}` +
                (cause instanceof Error ? ` (${cause.message})` : ""),
            { cause }
        );
        this.name = "AssetLoadError";
    }
}

// Keyed by absolute path
const assetCache = new Map<string, string>();

export function assetPath(name: AssetName, dir: string = DEFAULT_ASSET_DIR): string {
    return join(dir, ASSET_FILES[name]);
}

export function isAssetAvailable(name: AssetName, dir: string = DEFAULT_ASSET_DIR): boolean {
    return existsSync(assetPath(name, dir));
}

/**
 * Reads an asset exactly as stored, minus the file's final line break.
 * CRLF line endings are read as LF.
 * @throws AssetLoadError when the file is missing or unreadable
 */
export function loadAsset(name: AssetName, dir: string = DEFAULT_ASSET_DIR): string {
    const path = assetPath(name, dir);
    const cached = assetCache.get(path);
    if (cached !== undefined) {
        return cached;
    }

    let content: string;
    try {
        content = readFileSync(path, "utf-8");
    } catch (error) {
        throw new AssetLoadError(path, error);
    }

    const normalized = content.replace(/\r\n/g, "\n");
    const art = normalized.endsWith("\n") ? normalized.slice(0, -1) : normalized;
    assetCache.set(path, art);
    return art;
}

export function clearAssetCache(): void {
    assetCache.clear();
}
