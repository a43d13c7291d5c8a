/**
 * Prefix index for fuzzy merchant lookup.
 *
 * Buckets merchants by the lowercase form of their first three characters.
 * Buckets may hold duplicates or merchants that have since been evicted;
 * lookups always resolve categories through the RuleStore, so stale entries
 * can only be skipped, never contradict it.
 */

import { PREFIX_INDEX } from '../types/index.js';
import { merchantChars } from '../utils/normalize.js';

/**
 * Index key for a merchant, or null when the name is too short to index.
 */
export function indexKey(merchant: string): string | null {
    const chars = merchantChars(merchant);
    if (chars.length < PREFIX_INDEX.KEY_LENGTH) return null;
    return chars.slice(0, PREFIX_INDEX.KEY_LENGTH).join('').toLowerCase();
}

export class PrefixIndex {
    private readonly buckets = new Map<string, string[]>();

    static build(merchants: Iterable<string>): PrefixIndex {
        const index = new PrefixIndex();
        for (const merchant of merchants) {
            index.register(merchant);
        }
        return index;
    }

    register(merchant: string): void {
        const key = indexKey(merchant);
        if (key === null) return;

        const bucket = this.buckets.get(key);
        if (bucket) {
            bucket.push(merchant);
        } else {
            this.buckets.set(key, [merchant]);
        }
    }

    /**
     * Remove every occurrence of a merchant from its bucket.
     */
    unregister(merchant: string): void {
        const key = indexKey(merchant);
        if (key === null) return;

        const bucket = this.buckets.get(key);
        if (!bucket) return;

        const remaining = bucket.filter(m => m !== merchant);
        if (remaining.length === 0) {
            this.buckets.delete(key);
        } else {
            this.buckets.set(key, remaining);
        }
    }

    /**
     * Candidates sharing the merchant's index key, in registration order.
     */
    lookup(merchant: string): readonly string[] {
        const key = indexKey(merchant);
        if (key === null) return [];
        return this.buckets.get(key) ?? [];
    }

    get bucketCount(): number {
        return this.buckets.size;
    }
}
