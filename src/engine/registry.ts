/**
 * Named patterns
 * Random candidates and the cat profiles shown by name
 */

import type { AssetName } from "../lib/asset.js";
import { pickIndex, type RandomSource } from "../lib/rng.js";
import type { PatternSpec } from "./pattern.js";

export interface NamedPattern {
    name: string;
    spec: PatternSpec;
}

/**
 * A real cat with a hand-tuned portrait pattern
 */
export interface CatProfile {
    name: string;
    /** Single-letter flag */
    short: string;
    aliases: readonly string[];
    asset: AssetName;
    spec: PatternSpec;
    caption: string;
}

export class UnknownPatternError extends Error {
    constructor(readonly patternName: string, kind: "pattern" | "profile" = "pattern") {
        super(`ERROR-PT-01: Unknown ${kind}: ${patternName}`);
        this.name = "UnknownPatternError";
    }
}

/**
 * Every name starts with one of these
 */
export const PATTERN_FAMILIES = [
    "solid_",
    "bicolor_",
    "tabby_",
    "calico",
    "tortoiseshell",
    "tuxedo",
    "colorpoint_",
    "smoke_",
] as const;

/**
 * Candidates for a random draw, in a fixed order. Portraits are not here.
 */
export const RANDOM_PATTERNS: readonly NamedPattern[] = [
    { name: "solid_black", spec: { kind: "solid", color: "black" } },
    { name: "solid_white", spec: { kind: "solid", color: "white" } },
    { name: "solid_orange", spec: { kind: "solid", color: "orange" } },
    { name: "solid_gray", spec: { kind: "solid", color: "gray" } },
    { name: "solid_cream", spec: { kind: "solid", color: "cream" } },
    { name: "solid_blue_gray", spec: { kind: "solid", color: "blue_gray" } },
    { name: "solid_chocolate", spec: { kind: "solid", color: "chocolate" } },
    { name: "solid_cinnamon", spec: { kind: "solid", color: "cinnamon" } },
    { name: "solid_lilac", spec: { kind: "solid", color: "lilac" } },
    { name: "solid_fawn", spec: { kind: "solid", color: "fawn" } },
    { name: "bicolor_black_white", spec: { kind: "bicolor", primary: "black", secondary: "white" } },
    { name: "bicolor_orange_white", spec: { kind: "bicolor", primary: "orange", secondary: "white" } },
    { name: "bicolor_gray_white", spec: { kind: "bicolor", primary: "gray", secondary: "white" } },
    { name: "bicolor_blue_gray_cream", spec: { kind: "bicolor", primary: "blue_gray", secondary: "cream" } },
    { name: "bicolor_ginger_cream", spec: { kind: "bicolor", primary: "ginger", secondary: "cream" } },
    { name: "tabby_brown", spec: { kind: "tabby", base: "brown", stripe: "chocolate" } },
    { name: "tabby_orange", spec: { kind: "tabby", base: "orange", stripe: "dark_orange" } },
    { name: "tabby_silver", spec: { kind: "tabby", base: "silver", stripe: "dark_gray" } },
    { name: "tabby_cream", spec: { kind: "tabby", base: "cream", stripe: "ginger" } },
    { name: "tabby_auburn", spec: { kind: "tabby", base: "auburn", stripe: "chocolate" } },
    { name: "calico", spec: { kind: "calico" } },
    { name: "tortoiseshell", spec: { kind: "tortoiseshell" } },
    { name: "tuxedo", spec: { kind: "tuxedo" } },
    { name: "colorpoint_seal", spec: { kind: "colorpoint", body: "cream", points: "chocolate" } },
    { name: "colorpoint_blue", spec: { kind: "colorpoint", body: "cream", points: "blue_gray" } },
    { name: "colorpoint_lilac", spec: { kind: "colorpoint", body: "white", points: "lilac" } },
    { name: "colorpoint_flame", spec: { kind: "colorpoint", body: "cream", points: "orange" } },
    { name: "smoke_black", spec: { kind: "smoke", base: "black" } },
    { name: "smoke_gray", spec: { kind: "smoke", base: "gray" } },
    { name: "smoke_blue_gray", spec: { kind: "smoke", base: "blue_gray" } },
];

export const PROFILES: readonly CatProfile[] = [
    {
        name: "iggy",
        short: "i",
        aliases: [],
        asset: "catto",
        spec: { kind: "portrait_bicolor", back: "black", chest: "white" },
        caption: "This is Iggy.",
    },
    {
        name: "lucy",
        short: "l",
        aliases: [],
        asset: "catto",
        spec: { kind: "portrait_gradient" },
        caption: "This is Lucy.",
    },
    {
        name: "cassandra",
        short: "c",
        aliases: ["cassie"],
        asset: "catto",
        spec: { kind: "portrait_silver_tabby" },
        caption: "This is Cassandra.",
    },
    {
        name: "persephone",
        short: "p",
        aliases: ["percy"],
        asset: "catto",
        spec: { kind: "portrait_silver_white" },
        caption: "This is Persephone.",
    },
    {
        name: "jennycatto",
        short: "j",
        aliases: ["jenny"],
        asset: "heart",
        spec: { kind: "heart_overlay" },
        caption: "Jennycatto loves you.",
    },
];

/**
 * Uniform draw over RANDOM_PATTERNS
 */
export function randomPattern(random: RandomSource = Math.random): NamedPattern {
    return RANDOM_PATTERNS[pickIndex(RANDOM_PATTERNS.length, random)];
}

export function listPatternNames(): string[] {
    return RANDOM_PATTERNS.map((pattern) => pattern.name);
}

/**
 * @throws UnknownPatternError
 */
export function findPattern(name: string): NamedPattern {
    const pattern = RANDOM_PATTERNS.find((candidate) => candidate.name === name);
    if (!pattern) {
        throw new UnknownPatternError(name);
    }
    return pattern;
}

/**
 * Looks a profile up by name or alias
 * @throws UnknownPatternError
 */
export function findProfile(nameOrAlias: string): CatProfile {
    const wanted = nameOrAlias.toLowerCase();
    const profile = PROFILES.find(
        (candidate) => candidate.name === wanted || candidate.aliases.includes(wanted)
    );
    if (!profile) {
        throw new UnknownPatternError(nameOrAlias, "profile");
    }
    return profile;
}
