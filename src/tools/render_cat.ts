/**
 * render_cat tool - Colors the cat and returns it with its caption
 */

import { z } from "zod";
import { COLOR_NAMES, defaultColorTable, type ColorTable } from "../lib/color/ansi.js";
import { loadAsset, type AssetName } from "../lib/asset.js";
import { createRandomSource, type RandomSource } from "../lib/rng.js";
import { plainText, renderColorized, toArt } from "../engine/colorize.js";
import { applyPattern, PATTERN_KINDS, type PatternSpec } from "../engine/pattern.js";
import { findPattern, findProfile, randomPattern } from "../engine/registry.js";

const colorNameSchema = z.enum(COLOR_NAMES);

export const patternSpecSchema: z.ZodType<PatternSpec> = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("solid"), color: colorNameSchema }),
    z.object({ kind: z.literal("bicolor"), primary: colorNameSchema, secondary: colorNameSchema }),
    z.object({ kind: z.literal("tabby"), base: colorNameSchema, stripe: colorNameSchema }),
    z.object({ kind: z.literal("calico") }),
    z.object({ kind: z.literal("tortoiseshell") }),
    z.object({ kind: z.literal("colorpoint"), body: colorNameSchema, points: colorNameSchema }),
    z.object({ kind: z.literal("smoke"), base: colorNameSchema }),
    z.object({ kind: z.literal("tuxedo") }),
    z.object({ kind: z.literal("portrait_bicolor"), back: colorNameSchema, chest: colorNameSchema }),
    z.object({ kind: z.literal("portrait_gradient") }),
    z.object({ kind: z.literal("portrait_silver_tabby") }),
    z.object({ kind: z.literal("portrait_silver_white") }),
    z.object({ kind: z.literal("heart_overlay") }),
]);

export const renderCatInputSchema = z
    .object({
        profile: z.string().min(1).optional(),
        pattern: z.string().min(1).optional(),
        spec: patternSpecSchema.optional(),
        seed: z.number().int().optional(),
        plain: z.boolean().optional(),
    })
    .refine(
        (data) => [data.profile, data.pattern, data.spec].filter((value) => value !== undefined).length <= 1,
        { message: "Only one of 'profile', 'pattern' or 'spec' may be provided" }
    );

export type RenderCatInput = z.infer<typeof renderCatInputSchema>;

export interface RenderCatOutput {
    ok: true;
    name: string;
    caption: string;
    lines: number;
    text: string;
}

export interface RenderCatOptions {
    assetDir?: string;
    /** Used for the random draw when no seed is given */
    random?: RandomSource;
    table?: ColorTable;
}

/**
 * What a request resolved to, before any art is read
 */
export interface Selection {
    name: string;
    caption: string;
    asset: AssetName;
    spec: PatternSpec;
}

export class SelectionConflictError extends Error {
    constructor(readonly selections: string[]) {
        super(`ERROR-PT-02: Only one cat can be shown at a time (got ${selections.join(", ")})`);
        this.name = "SelectionConflictError";
    }
}

/**
 * Resolves a request to a pattern. Random when nothing is selected.
 * @throws UnknownPatternError for an unknown profile or pattern name
 * @throws SelectionConflictError when more than one selection is given
 */
export function selectPattern(input: RenderCatInput, random: RandomSource): Selection {
    const chosen = (["profile", "pattern", "spec"] as const).filter((key) => input[key] !== undefined);
    if (chosen.length > 1) {
        throw new SelectionConflictError(chosen);
    }

    if (input.profile !== undefined) {
        const profile = findProfile(input.profile);
        return { name: profile.name, caption: profile.caption, asset: profile.asset, spec: profile.spec };
    }

    if (input.spec !== undefined) {
        const asset = input.spec.kind === "heart_overlay" ? "heart" : "catto";
        return { name: input.spec.kind, caption: input.spec.kind, asset, spec: input.spec };
    }

    const { name, spec } = input.pattern !== undefined ? findPattern(input.pattern) : randomPattern(random);
    return { name, caption: name, asset: "catto", spec };
}

/**
 * Render handler - Colors the selected cat
 * @throws AssetLoadError when the art cannot be read
 */
export function renderCatHandler(input: RenderCatInput = {}, options: RenderCatOptions = {}): RenderCatOutput {
    const random = input.seed !== undefined ? createRandomSource(input.seed) : options.random ?? Math.random;
    const selection = selectPattern(input, random);

    const art = toArt(loadAsset(selection.asset, options.assetDir));
    const colorized = applyPattern(selection.spec, art);

    return {
        ok: true,
        name: selection.name,
        caption: selection.caption,
        lines: art.length,
        text: input.plain ? plainText(colorized) : renderColorized(colorized, options.table ?? defaultColorTable),
    };
}

/**
 * render_cat tool definition for MCP
 */
export const renderCatTool = {
    name: "render_cat",
    description:
        "Colors the ASCII cat. Pick a cat profile, a named pattern, or a pattern spec; with none of them a random pattern is used.",
    inputSchema: {
        type: "object" as const,
        properties: {
            profile: {
                type: "string",
                description: "Cat profile name or alias (e.g. 'iggy', 'jenny')",
            },
            pattern: {
                type: "string",
                description: "Named pattern from list_patterns (e.g. 'tabby_brown')",
            },
            spec: {
                type: "object",
                description: "Pattern spec with its colors, e.g. { kind: 'tabby', base: 'brown', stripe: 'chocolate' }",
                properties: {
                    kind: { type: "string", enum: [...PATTERN_KINDS] },
                },
                required: ["kind"],
            },
            seed: {
                type: "number",
                description: "Seed for the random draw",
            },
            plain: {
                type: "boolean",
                description: "Return the art without color escape sequences (default: false)",
                default: false,
            },
        },
    },
};
