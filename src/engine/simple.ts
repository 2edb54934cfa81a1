/**
 * Geometric coat patterns
 * Each rule looks only at the row and column of a character
 */

import type { ColorName } from "../lib/color/ansi.js";
import { colorize, type AsciiArt, type ColorizedText } from "./colorize.js";

/**
 * Lighter shade used for the pale columns of a smoke coat
 */
const SMOKE_HIGHLIGHT: Partial<Record<ColorName, ColorName>> = {
    black: "dark_gray",
    gray: "light_gray",
    blue_gray: "silver",
};

const CALICO_PATCHES: readonly ColorName[] = ["white", "orange", "black"];

export function solid(art: AsciiArt, color: ColorName): ColorizedText {
    return colorize(art, () => color);
}

/**
 * Diagonal bands, four characters of primary to three of secondary
 */
export function bicolor(art: AsciiArt, primary: ColorName, secondary: ColorName): ColorizedText {
    return colorize(art, (row, col) => ((row + col) % 7 < 4 ? primary : secondary));
}

/**
 * Every third row is a stripe
 */
export function tabby(art: AsciiArt, base: ColorName, stripe: ColorName): ColorizedText {
    return colorize(art, (row) => (row % 3 === 0 ? stripe : base));
}

/**
 * White and orange columns every 11 characters, with a patch column whose
 * color changes every 5 rows
 */
export function calico(art: AsciiArt): ColorizedText {
    return colorize(art, (row, col) => {
        const phase = col % 11;
        if (phase < 4) {
            return "white";
        }
        if (phase < 7) {
            return "orange";
        }
        return CALICO_PATCHES[Math.floor(row / 5) % CALICO_PATCHES.length];
    });
}

export function tortoiseshell(art: AsciiArt): ColorizedText {
    return colorize(art, (row, col) => {
        const mix = (row * 3 + col * 7) % 5;
        if (mix < 2) {
            return "orange";
        }
        return mix < 4 ? "black" : "ginger";
    });
}

/**
 * Points color on the top and bottom fifth of the art (ears and paws)
 */
export function colorpoint(art: AsciiArt, body: ColorName, points: ColorName): ColorizedText {
    const total = art.length;
    return colorize(art, (row) =>
        row < total / 5 || row >= (total * 4) / 5 ? points : body
    );
}

export function smoke(art: AsciiArt, base: ColorName): ColorizedText {
    const highlight = SMOKE_HIGHLIGHT[base] ?? "silver";
    return colorize(art, (_row, col) => (col % 4 === 0 ? highlight : base));
}

/**
 * Black coat with a white shirt front: the middle half of the rows and the
 * middle third of each of those lines
 */
export function tuxedo(art: AsciiArt): ColorizedText {
    const total = art.length;
    return colorize(art, (row, col, chars) => {
        const width = chars.length;
        const inChestRows = row >= total / 4 && row < (total * 3) / 4;
        const inChestCols = col >= width / 3 && col < (width * 2) / 3;
        return inChestRows && inChestCols ? "white" : "black";
    });
}
