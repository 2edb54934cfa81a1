/**
 * list_patterns tool - Names everything render_cat can draw
 */

import { PATTERN_KINDS, type PatternKind } from "../engine/pattern.js";
import { listPatternNames, PROFILES } from "../engine/registry.js";

export interface ProfileSummary {
    name: string;
    aliases: string[];
    caption: string;
}

export interface ListPatternsOutput {
    ok: true;
    patterns: string[];
    profiles: ProfileSummary[];
    kinds: PatternKind[];
}

export function listPatternsHandler(): ListPatternsOutput {
    return {
        ok: true,
        patterns: listPatternNames(),
        profiles: PROFILES.map((profile) => ({
            name: profile.name,
            aliases: [...profile.aliases],
            caption: profile.caption,
        })),
        kinds: [...PATTERN_KINDS],
    };
}

/**
 * list_patterns tool definition for MCP
 */
export const listPatternsTool = {
    name: "list_patterns",
    description: "Lists the random pattern names, the cat profiles and the pattern kinds accepted by render_cat",
    inputSchema: {
        type: "object" as const,
        properties: {},
    },
};
