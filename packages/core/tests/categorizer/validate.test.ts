import { describe, it, expect } from 'vitest';
import { validateKeyword, checkKeywordCollision } from '../../src/categorizer/validate.js';
import type { CategoryRule } from '../../src/types/index.js';

describe('validateKeyword', () => {
    it('rejects empty keywords', () => {
        expect(validateKeyword('  ')).toEqual({ valid: false, errors: ['Keyword cannot be empty'], warnings: [] });
    });

    it('rejects short keywords', () => {
        const result = validateKeyword('ab');
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['Keyword must be at least 3 characters (got 2)']);
    });

    it('accepts a keyword without a sample', () => {
        expect(validateKeyword('cafe')).toEqual({ valid: true, errors: [], warnings: [] });
    });

    describe('breadth check', () => {
        const names = [
            'Mart One', 'Mart Two', 'Smart Shop', 'Walmart',
            'Cafe Luna', 'Blue Bottle', 'Shell', 'Uber', 'Lyft', 'Netflix',
        ];

        it('warns when a keyword matches >20% and >3 records', () => {
            const result = validateKeyword('mart', names);
            expect(result.valid).toBe(true);
            expect(result.matchCount).toBe(4);
            expect(result.matchPercent).toBeCloseTo(0.4);
            expect(result.warnings).toHaveLength(1);
            expect(result.warnings[0]).toContain('too broad');
        });

        it('does not warn at 3 matches', () => {
            const result = validateKeyword('mart', names.slice(1));
            expect(result.matchCount).toBe(3);
            expect(result.warnings).toEqual([]);
        });
    });
});

describe('checkKeywordCollision', () => {
    const rules: CategoryRule[] = [
        { category: 'Food', keywords: ['cafe', 'diner'], is_system: true, active: true },
        { category: 'Old', keywords: ['luna'], is_system: false, active: false },
    ];

    it('reports keywords contained in the new one and vice versa', () => {
        expect(checkKeywordCollision('Cafe Luna', rules)).toEqual({
            hasCollision: true,
            collisions: [
                { category: 'Food', keyword: 'cafe' },
                { category: 'Old', keyword: 'luna' },
            ],
        });
        expect(checkKeywordCollision('din', rules).collisions).toEqual([{ category: 'Food', keyword: 'diner' }]);
    });

    it('reports nothing for unrelated keywords', () => {
        expect(checkKeywordCollision('bistro', rules)).toEqual({ hasCollision: false, collisions: [] });
    });
});
