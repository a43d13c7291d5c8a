import { describe, it, expect } from 'vitest';
import { amountsMatch } from '../../src/utils/amount.js';

describe('amountsMatch', () => {
    it('matches equal amounts', () => {
        expect(amountsMatch(-32, -32)).toBe(true);
    });

    it('is not fooled by binary float error', () => {
        expect(amountsMatch(0.1 + 0.2, 0.3)).toBe(true);
    });

    it('uses a strict bound', () => {
        expect(amountsMatch(10.01, 10)).toBe(false);
        expect(amountsMatch(10.009, 10)).toBe(true);
    });

    it('compares signed amounts', () => {
        expect(amountsMatch(-5, 5)).toBe(false);
    });
});
