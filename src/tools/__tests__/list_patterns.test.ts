/**
 * Unit tests for the list_patterns tool
 */

import { describe, it, expect } from 'vitest';
import { listPatternsHandler } from '../list_patterns.js';

describe('list_patterns', () => {
    it('should list the random patterns in registry order', () => {
        const result = listPatternsHandler();

        expect(result.ok).toBe(true);
        expect(result.patterns).toHaveLength(30);
        expect(result.patterns[0]).toBe('solid_black');
        expect(result.patterns[29]).toBe('smoke_blue_gray');
    });

    it('should list the cats with aliases and captions', () => {
        const { profiles } = listPatternsHandler();

        expect(profiles.map((profile) => profile.name)).toEqual(['iggy', 'lucy', 'cassandra', 'persephone', 'jennycatto']);
        expect(profiles[4]).toEqual({ name: 'jennycatto', aliases: ['jenny'], caption: 'Jennycatto loves you.' });
    });

    it('should list the pattern kinds a spec may use', () => {
        const { kinds } = listPatternsHandler();

        expect(kinds).toContain('heart_overlay');
        expect(kinds).toHaveLength(13);
    });
});
