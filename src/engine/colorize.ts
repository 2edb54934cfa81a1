/**
 * Colorized text model shared by every pattern
 */

import { defaultColorTable, RESET, type ColorName, type ColorTable } from "../lib/color/ansi.js";

/**
 * Lines of art, top to bottom. Never mutated.
 */
export type AsciiArt = readonly string[];

export interface ColoredCell {
    char: string;
    /** null means the character is printed without an escape sequence */
    color: ColorName | null;
}

export type ColorizedText = ColoredCell[][];

/**
 * Chooses the color of one non-whitespace character.
 * `chars` is the whole line split into characters.
 */
export type ColorPicker = (
    row: number,
    col: number,
    chars: readonly string[]
) => ColorName | null;

const ESCAPE_SEQUENCE = /\x1b\[[0-9;]*m/g;

export function isBlank(char: string): boolean {
    return char === " " || char === "\t";
}

export function toArt(text: string): AsciiArt {
    return text.split("\n");
}

/**
 * Applies a picker to every non-whitespace character. Whitespace is never
 * offered to the picker and stays uncolored.
 */
export function colorize(art: AsciiArt, pick: ColorPicker): ColorizedText {
    return art.map((line, row) => {
        const chars = Array.from(line);
        return chars.map((char, col) => ({
            char,
            color: isBlank(char) ? null : pick(row, col, chars),
        }));
    });
}

/**
 * Renders to a printable string, one escape sequence and reset per colored
 * character
 */
export function renderColorized(text: ColorizedText, table: ColorTable = defaultColorTable): string {
    return text
        .map((cells) =>
            cells
                .map((cell) =>
                    cell.color === null ? cell.char : `${table.codeFor(cell.color)}${cell.char}${RESET}`
                )
                .join("")
        )
        .join("\n");
}

export function plainText(text: ColorizedText): string {
    return text.map((cells) => cells.map((cell) => cell.char).join("")).join("\n");
}

/**
 * Removes SGR color sequences from rendered output
 */
export function stripColor(rendered: string): string {
    return rendered.replace(ESCAPE_SEQUENCE, "");
}
