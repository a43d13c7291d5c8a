import { Decimal } from 'decimal.js';
import { AMOUNT_TOLERANCE } from '../types/index.js';

/**
 * Compare two amounts within the history tolerance (strictly less than 0.01 apart).
 * Uses Decimal so float noise like 32.1 - 32.09 doesn't decide the outcome.
 */
export function amountsMatch(a: number, b: number, tolerance: string = AMOUNT_TOLERANCE): boolean {
    return new Decimal(a).minus(new Decimal(b)).abs().lessThan(tolerance);
}
