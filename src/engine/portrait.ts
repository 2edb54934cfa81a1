/**
 * Portrait patterns
 * Hand-tuned zone maps that approximate the markings of particular cats.
 * Zones are bands of rows by relative height; inside a zone, the distance of
 * a character from the middle of its line picks the color.
 */

import type { ColorName } from "../lib/color/ansi.js";
import { colorize, isBlank, type AsciiArt, type ColorizedText } from "./colorize.js";

/**
 * Where a character sits relative to the silhouette
 */
export interface PortraitPoint {
    row: number;
    col: number;
    /** row / line count, in [0, 1) */
    rel: number;
    /** Length of the line once its leading whitespace is removed */
    contentLen: number;
    /** Middle column of that content, in line coordinates */
    center: number;
    dist: number;
}

/**
 * Band of rows ending (exclusive) at `until`. `bands` are checked outermost
 * first: the first threshold the point lies beyond picks its color, and
 * points inside every threshold get `inner`.
 */
export interface Zone {
    until: number;
    bands: ReadonlyArray<readonly [threshold: number, color: ColorName]>;
    inner: ColorName;
}

/**
 * Blank filler used by the heart art. Never colored.
 */
export const BLANK_FILLER = "\u2800";

/**
 * First heart column on each row of assets/heart.txt. Measured from that
 * file; it does not describe any other art.
 */
export const HEART_BOUNDARIES: ReadonlyMap<number, number> = new Map([
    [3, 23],
    [4, 22],
    [5, 22],
    [6, 22],
    [7, 23],
    [8, 24],
    [9, 25],
    [10, 26],
    [11, 27],
]);

const GRADIENT_ZONES: readonly Zone[] = [
    { until: 0.15, bands: [[0.3, "chocolate"]], inner: "brown" },
    { until: 0.35, bands: [[0.35, "chocolate"], [0.2, "brown"]], inner: "ginger" },
    { until: 0.65, bands: [[0.4, "brown"], [0.2, "ginger"]], inner: "golden" },
    { until: 0.85, bands: [[0.38, "brown"], [0.18, "orange"]], inner: "golden" },
    { until: Infinity, bands: [[0.35, "chocolate"], [0.2, "brown"]], inner: "ginger" },
];

const SILVER_WHITE_ZONES: readonly Zone[] = [
    { until: 0.12, bands: [[0.25, "dark_gray"]], inner: "gray" },
    { until: 0.3, bands: [[0.3, "gray"], [0.12, "silver"]], inner: "white" },
    { until: 0.45, bands: [[0.3, "dark_gray"], [0.15, "light_gray"]], inner: "white" },
    { until: 0.65, bands: [[0.35, "gray"], [0.2, "silver"]], inner: "white" },
    { until: 0.85, bands: [[0.4, "gray"], [0.25, "light_gray"]], inner: "white" },
    { until: Infinity, bands: [[0.35, "silver"]], inner: "white" },
];

/**
 * Chest width per zone for the two-color portrait. `null` is the cap: all
 * back color. The blaze opens through the face and widens down the body.
 */
const CAP_AND_CHEST: ReadonlyArray<{ until: number; threshold: number | null }> = [
    { until: 0.08, threshold: null },
    { until: 0.16, threshold: 0.05 },
    { until: 0.25, threshold: 0.1 },
    { until: 0.34, threshold: 0.18 },
    { until: 0.5, threshold: 0.25 },
    { until: 0.65, threshold: 0.3 },
    { until: 0.8, threshold: 0.4 },
    { until: Infinity, threshold: 0.45 },
];

function beyond(point: PortraitPoint, threshold: number): boolean {
    return point.dist > point.contentLen * threshold;
}

function leadingBlanks(chars: readonly string[]): number {
    let count = 0;
    while (count < chars.length && isBlank(chars[count])) {
        count++;
    }
    return count;
}

/**
 * Colors each character from its portrait coordinates. Lines that are only
 * whitespace come back uncolored.
 */
export function portrait(
    art: AsciiArt,
    pick: (point: PortraitPoint) => ColorName
): ColorizedText {
    const total = art.length;
    return colorize(art, (row, col, chars) => {
        const leading = leadingBlanks(chars);
        const contentLen = chars.length - leading;
        const center = leading + contentLen / 2;
        return pick({
            row,
            col,
            rel: row / total,
            contentLen,
            center,
            dist: Math.abs(col - center),
        });
    });
}

export function pickFromZones(zones: readonly Zone[], point: PortraitPoint): ColorName {
    const zone = zones.find((candidate) => point.rel < candidate.until) ?? zones[zones.length - 1];
    const band = zone.bands.find(([threshold]) => beyond(point, threshold));
    return band ? band[1] : zone.inner;
}

/**
 * Cap, saddle and blaze over a solid chest, in any two colors
 */
export function capAndChest(art: AsciiArt, back: ColorName, chest: ColorName): ColorizedText {
    return portrait(art, (point) => {
        const zone =
            CAP_AND_CHEST.find((candidate) => point.rel < candidate.until) ??
            CAP_AND_CHEST[CAP_AND_CHEST.length - 1];
        if (zone.threshold === null) {
            return back;
        }
        return beyond(point, zone.threshold) ? back : chest;
    });
}

/**
 * Warm brown coat, darkest at the edges and golden down the middle
 */
export function warmGradient(art: AsciiArt): ColorizedText {
    return portrait(art, (point) => pickFromZones(GRADIENT_ZONES, point));
}

/**
 * Silver mackerel tabby with tan flecks and a white tail tip
 */
export function silverTabby(art: AsciiArt): ColorizedText {
    return portrait(art, (point) => {
        const { row, col, rel, dist, contentLen, center } = point;
        const isStripeLine = row % 4 < 2;

        if (rel < 0.15) {
            if (beyond(point, 0.3)) {
                return "dark_gray";
            }
            return isStripeLine ? "dark_gray" : "silver";
        }

        if (rel < 0.4) {
            if (beyond(point, 0.35)) {
                return "gray";
            }
            if (row % 6 === 0 && dist < contentLen * 0.1) {
                return "fawn";
            }
            return isStripeLine ? "dark_gray" : "silver";
        }

        if (rel < 0.75) {
            if (beyond(point, 0.4)) {
                return isStripeLine ? "dark_gray" : "gray";
            }
            if (row % 7 === 0 && dist < contentLen * 0.2) {
                return "fawn";
            }
            return isStripeLine ? "gray" : "silver";
        }

        // Tail curls up on the right
        if (col >= center) {
            if (dist < contentLen * 0.15) {
                return "white";
            }
            return isStripeLine ? "dark_gray" : "silver";
        }
        return isStripeLine ? "gray" : "silver";
    });
}

/**
 * Gray back and cap over a white chest and belly
 */
export function silverAndWhite(art: AsciiArt): ColorizedText {
    return portrait(art, (point) => pickFromZones(SILVER_WHITE_ZONES, point));
}

/**
 * Green cat holding a pink heart. Only meaningful on assets/heart.txt.
 */
export function heartOverlay(art: AsciiArt): ColorizedText {
    return colorize(art, (row, col, chars) => {
        if (chars[col] === BLANK_FILLER) {
            return null;
        }
        const heartStart = HEART_BOUNDARIES.get(row);
        return heartStart !== undefined && col >= heartStart ? "pink_red" : "forest_green";
    });
}
