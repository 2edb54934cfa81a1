/**
 * Coat color table
 * Maps semantic cat coat colors to 256-color terminal escape sequences
 */

/**
 * Every coat color a pattern may reference, in palette order
 */
export const COLOR_NAMES = [
    "black",
    "white",
    "orange",
    "ginger",
    "cream",
    "brown",
    "chocolate",
    "gray",
    "blue_gray",
    "lilac",
    "cinnamon",
    "fawn",
    "silver",
    "dark_orange",
    "light_gray",
    "dark_gray",
    "golden",
    "auburn",
    "forest_green",
    "pink_red",
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

/**
 * Terminal escape sequence that switches the foreground color
 */
export type ColorCode = string;

/**
 * xterm 256-color palette index for each coat color
 */
const PALETTE_INDEX: Readonly<Record<ColorName, number>> = {
    black: 16,
    white: 231,
    orange: 208,
    ginger: 166,
    cream: 223,
    brown: 94,
    chocolate: 52,
    gray: 244,
    blue_gray: 67,
    lilac: 183,
    cinnamon: 130,
    fawn: 180,
    silver: 250,
    dark_orange: 202,
    light_gray: 252,
    dark_gray: 238,
    golden: 178,
    auburn: 124,
    forest_green: 28,
    pink_red: 204,
};

export const RESET: ColorCode = "\x1b[0m";

export class UnknownColorError extends Error {
    constructor(readonly colorName: string) {
        super(`ERROR-CT-01: Unknown color: ${colorName}`);
        this.name = "UnknownColorError";
    }
}

/**
 * Builds the foreground escape sequence for a palette index (0-255)
 */
export function ansi256(index: number): ColorCode {
    return `\x1b[38;5;${index}m`;
}

export function isColorName(value: string): value is ColorName {
    return Object.hasOwn(PALETTE_INDEX, value);
}

export interface ColorTable {
    readonly names: readonly ColorName[];
    /**
     * Resolves a color name to its escape sequence
     * @throws UnknownColorError when the name is not a coat color
     */
    codeFor(name: string): ColorCode;
    has(name: string): boolean;
}

/**
 * Builds the immutable color table. Codes depend only on the palette index,
 * so two tables always agree.
 */
export function createColorTable(): ColorTable {
    const codes = new Map<string, ColorCode>(
        COLOR_NAMES.map((name) => [name, ansi256(PALETTE_INDEX[name])])
    );

    return Object.freeze({
        names: COLOR_NAMES,
        codeFor(name: string): ColorCode {
            const code = codes.get(name);
            if (code === undefined) {
                throw new UnknownColorError(name);
            }
            return code;
        },
        has(name: string): boolean {
            return codes.has(name);
        },
    });
}

export const defaultColorTable: ColorTable = createColorTable();
