/**
 * Unit tests for the portrait patterns
 */

import { describe, it, expect } from 'vitest';
import type { ColorName } from '../../lib/color/ansi.js';
import { loadAsset } from '../../lib/asset.js';
import { toArt, type ColorizedText } from '../colorize.js';
import {
    BLANK_FILLER,
    capAndChest,
    heartOverlay,
    HEART_BOUNDARIES,
    silverAndWhite,
    silverTabby,
    warmGradient,
} from '../portrait.js';

function block(rows: number, cols: number): string[] {
    return Array.from({ length: rows }, () => '#'.repeat(cols));
}

/**
 * One letter per cell so a whole row reads as a string
 */
function rowCode(text: ColorizedText, row: number, letters: Partial<Record<ColorName, string>>): string {
    return text[row].map((cell) => (cell.color === null ? ' ' : letters[cell.color] ?? '?')).join('');
}

describe('portrait patterns', () => {
    describe('capAndChest', () => {
        const letters = { black: 'B', white: 'W' };

        it('should widen the chest down a 10-line block', () => {
            const text = capAndChest(block(10, 20), 'black', 'white');
            const rows = text.map((_, row) => rowCode(text, row, letters));

            expect(rows).toEqual([
                'BBBBBBBBBBBBBBBBBBBB',
                'BBBBBBBBBWWWBBBBBBBB',
                'BBBBBBBBWWWWWBBBBBBB',
                'BBBBBBBWWWWWWWBBBBBB',
                'BBBBBWWWWWWWWWWWBBBB',
                'BBBBWWWWWWWWWWWWWBBB',
                'BBBBWWWWWWWWWWWWWBBB',
                'BBWWWWWWWWWWWWWWWWWB',
                'BWWWWWWWWWWWWWWWWWWW',
                'BWWWWWWWWWWWWWWWWWWW',
            ]);
        });

        it('should keep the silhouette whatever the two colors are', () => {
            const tuxedo = capAndChest(block(10, 20), 'black', 'white');
            const ginger = capAndChest(block(10, 20), 'ginger', 'cream');
            const swap = (color: ColorName | null) => (color === 'black' ? 'ginger' : 'cream');

            expect(ginger.map((cells) => cells.map((cell) => cell.color))).toEqual(
                tuxedo.map((cells) => cells.map((cell) => swap(cell.color)))
            );
        });

        it('should measure from the content after leading whitespace', () => {
            const text = capAndChest(['  ####', '', '   ', '\t##  #'], 'black', 'white');

            expect(text[0].map((cell) => cell.color)).toEqual([null, null, 'black', 'black', 'black', 'black']);
            expect(text[1]).toEqual([]);
            expect(text[2].map((cell) => cell.color)).toEqual([null, null, null]);
            expect(text[3].map((cell) => cell.color)).toEqual([null, 'black', 'white', null, null, 'white']);
        });
    });

    describe('warmGradient', () => {
        const letters = { chocolate: 'C', brown: 'B', ginger: 'G', golden: 'Y', orange: 'O' };

        it('should run darker at the edges and warmer in the middle', () => {
            const text = warmGradient(block(20, 20));

            expect(rowCode(text, 0, letters)).toBe('CCCCBBBBBBBBBBBBBCCC');
            expect(rowCode(text, 3, letters)).toBe('CCCBBBGGGGGGGGGBBBCC');
            expect(rowCode(text, 7, letters)).toBe('BBGGGGYYYYYYYYYGGGGB');
            expect(rowCode(text, 13, letters)).toBe('BBBOOOOYYYYYYYOOOOBB');
            expect(rowCode(text, 19, letters)).toBe('CCCBBBGGGGGGGGGBBBCC');
        });
    });

    describe('silverTabby', () => {
        const letters = { dark_gray: 'D', silver: 'S', gray: 'g', fawn: 'F', white: 'W' };

        it('should stripe the head and flank', () => {
            const text = silverTabby(block(20, 20));

            expect(rowCode(text, 0, letters)).toBe('DDDDDDDDDDDDDDDDDDDD');
            expect(rowCode(text, 2, letters)).toBe('DDDDSSSSSSSSSSSSSDDD');
            expect(rowCode(text, 4, letters)).toBe('gggDDDDDDDDDDDDDDDgg');
            expect(rowCode(text, 8, letters)).toBe('DDgggggggggggggggggD');
            expect(rowCode(text, 10, letters)).toBe('ggSSSSSSSSSSSSSSSSSg');
        });

        it('should add tan flecks on rows divisible by 6 and 7', () => {
            const text = silverTabby(block(20, 20));

            expect(rowCode(text, 6, letters)).toBe('gggSSSSSSFFFSSSSSSgg');
            expect(rowCode(text, 14, letters)).toBe('ggSSSSSFFFFFFFSSSSSg');
        });

        it('should put a white tail tip right of center in the bottom zone', () => {
            const text = silverTabby(block(20, 20));

            expect(rowCode(text, 15, letters)).toBe('SSSSSSSSSSWWWSSSSSSS');
            expect(rowCode(text, 16, letters)).toBe('ggggggggggWWWDDDDDDD');
        });
    });

    describe('silverAndWhite', () => {
        const letters = { dark_gray: 'D', gray: 'g', silver: 'S', light_gray: 'L', white: 'W' };

        it('should keep a gray back over a white chest and belly', () => {
            const text = silverAndWhite(block(20, 20));

            expect(rowCode(text, 0, letters)).toBe('DDDDDgggggggggggDDDD');
            expect(rowCode(text, 3, letters)).toBe('ggggSSSSWWWWWSSSSggg');
            expect(rowCode(text, 6, letters)).toBe('DDDDLLLWWWWWWWLLLDDD');
            expect(rowCode(text, 9, letters)).toBe('gggSSSWWWWWWWWWSSSgg');
            expect(rowCode(text, 13, letters)).toBe('ggLLLWWWWWWWWWWWLLLg');
            expect(rowCode(text, 17, letters)).toBe('SSSWWWWWWWWWWWWWWWSS');
        });
    });

    describe('heartOverlay', () => {
        const art = toArt(loadAsset('heart'));
        const text = heartOverlay(art);

        it('should color row 0 entirely forest green', () => {
            const colored = text[0].filter((cell) => cell.color !== null);

            expect(colored.length).toBeGreaterThan(0);
            expect(colored.every((cell) => cell.color === 'forest_green')).toBe(true);
        });

        it('should put pink red on each of rows 4 through 8', () => {
            for (let row = 4; row <= 8; row++) {
                expect(text[row].some((cell) => cell.color === 'pink_red'), `row ${row}`).toBe(true);
            }
        });

        it('should color the heart from its boundary column onward', () => {
            const pinkCols = text[5].flatMap((cell, col) => (cell.color === 'pink_red' ? [col] : []));

            expect(HEART_BOUNDARIES.get(5)).toBe(22);
            expect(pinkCols).toEqual([22, 23, 24, 25, 26, 27, 28, 29, 30, 31, 32]);
            expect(text[5][12].color).toBe('forest_green');
        });

        it('should never color the blank filler', () => {
            for (const cell of text.flat()) {
                if (cell.char === BLANK_FILLER) {
                    expect(cell.color).toBeNull();
                }
            }
            expect(text[4][2].char).toBe(BLANK_FILLER);
        });

        it('should only use green and pink', () => {
            const colors = new Set(text.flat().map((cell) => cell.color));
            expect(colors).toEqual(new Set([null, 'forest_green', 'pink_red']));
        });
    });
});
