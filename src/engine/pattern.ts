/**
 * Pattern variants and the interpreter that runs them
 */

import type { ColorName } from "../lib/color/ansi.js";
import type { AsciiArt, ColorizedText } from "./colorize.js";
import {
    bicolor,
    calico,
    colorpoint,
    smoke,
    solid,
    tabby,
    tortoiseshell,
    tuxedo,
} from "./simple.js";
import {
    capAndChest,
    heartOverlay,
    silverAndWhite,
    silverTabby,
    warmGradient,
} from "./portrait.js";

/**
 * A pattern and the colors bound to it
 */
export type PatternSpec =
    | { kind: "solid"; color: ColorName }
    | { kind: "bicolor"; primary: ColorName; secondary: ColorName }
    | { kind: "tabby"; base: ColorName; stripe: ColorName }
    | { kind: "calico" }
    | { kind: "tortoiseshell" }
    | { kind: "colorpoint"; body: ColorName; points: ColorName }
    | { kind: "smoke"; base: ColorName }
    | { kind: "tuxedo" }
    | { kind: "portrait_bicolor"; back: ColorName; chest: ColorName }
    | { kind: "portrait_gradient" }
    | { kind: "portrait_silver_tabby" }
    | { kind: "portrait_silver_white" }
    | { kind: "heart_overlay" };

export type PatternKind = PatternSpec["kind"];

export const PATTERN_KINDS: readonly PatternKind[] = [
    "solid",
    "bicolor",
    "tabby",
    "calico",
    "tortoiseshell",
    "colorpoint",
    "smoke",
    "tuxedo",
    "portrait_bicolor",
    "portrait_gradient",
    "portrait_silver_tabby",
    "portrait_silver_white",
    "heart_overlay",
];

export function applyPattern(spec: PatternSpec, art: AsciiArt): ColorizedText {
    switch (spec.kind) {
        case "solid":
            return solid(art, spec.color);
        case "bicolor":
            return bicolor(art, spec.primary, spec.secondary);
        case "tabby":
            return tabby(art, spec.base, spec.stripe);
        case "calico":
            return calico(art);
        case "tortoiseshell":
            return tortoiseshell(art);
        case "colorpoint":
            return colorpoint(art, spec.body, spec.points);
        case "smoke":
            return smoke(art, spec.base);
        case "tuxedo":
            return tuxedo(art);
        case "portrait_bicolor":
            return capAndChest(art, spec.back, spec.chest);
        case "portrait_gradient":
            return warmGradient(art);
        case "portrait_silver_tabby":
            return silverTabby(art);
        case "portrait_silver_white":
            return silverAndWhite(art);
        case "heart_overlay":
            return heartOverlay(art);
        default: {
            const unhandled: never = spec;
            throw new Error(`Unhandled pattern: ${JSON.stringify(unhandled)}`);
        }
    }
}
