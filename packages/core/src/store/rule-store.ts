/**
 * Bounded merchant -> category rule store.
 *
 * Rules are keyed by the exact merchant string. Map insertion order doubles
 * as recency: every upsert moves the merchant to the end, so among rules with
 * the same usage_count the least recently touched one is evicted first.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Callers report evictions.
 */

import type { Rule } from '../types/index.js';

/**
 * Stored value for a merchant.
 */
export interface RuleEntry {
    category: string;
    usage_count: number;
}

/**
 * What upsert() did to the stored rule.
 * - inserted: merchant was unknown
 * - incremented: same category confirmed again
 * - replaced: category changed, usage_count reset to 1
 * - protected: category change refused because of a manual edit
 */
export type UpsertOutcome = 'inserted' | 'incremented' | 'replaced' | 'protected';

/**
 * Order rules by retention priority: usage_count descending, then later
 * position first. Input order is treated as oldest-to-newest.
 */
function rankByUsage(rules: Rule[]): { rule: Rule; position: number }[] {
    return rules
        .map((rule, position) => ({ rule, position }))
        .sort((a, b) => b.rule.usage_count - a.rule.usage_count || b.position - a.position);
}

/**
 * Split rules into those kept under a capacity and those dropped.
 * Both lists retain their input order.
 */
export function rankForRetention(rules: Rule[], maxRules: number): { kept: Rule[]; dropped: Rule[] } {
    if (rules.length <= maxRules) {
        return { kept: [...rules], dropped: [] };
    }

    const survivors = new Set(rankByUsage(rules).slice(0, maxRules).map(r => r.position));

    const kept: Rule[] = [];
    const dropped: Rule[] = [];
    rules.forEach((rule, position) => {
        (survivors.has(position) ? kept : dropped).push(rule);
    });
    return { kept, dropped };
}

export class RuleStore {
    private readonly rules = new Map<string, RuleEntry>();
    private readonly manualEdits = new Set<string>();

    constructor(readonly maxRules: number) {}

    /**
     * Build a store from persisted rules (oldest first) and manual-edit merchants.
     * Manual edits are taken as given, with or without a stored rule.
     */
    static from(rules: Rule[], manualEdits: Iterable<string>, maxRules: number): RuleStore {
        const store = new RuleStore(maxRules);
        for (const rule of rules) {
            store.rules.delete(rule.merchant);
            store.rules.set(rule.merchant, { category: rule.category, usage_count: rule.usage_count });
        }
        for (const merchant of manualEdits) {
            store.manualEdits.add(merchant);
        }
        return store;
    }

    get size(): number {
        return this.rules.size;
    }

    get manualEditCount(): number {
        return this.manualEdits.size;
    }

    get(merchant: string): RuleEntry | undefined {
        const entry = this.rules.get(merchant);
        return entry ? { ...entry } : undefined;
    }

    has(merchant: string): boolean {
        return this.rules.has(merchant);
    }

    isManuallyEdited(merchant: string): boolean {
        return this.manualEdits.has(merchant);
    }

    /**
     * Flag a merchant as human-corrected. Sticky: the flag outlives eviction
     * of the rule and protects it again if the merchant is learned anew.
     */
    markManualEdit(merchant: string): void {
        this.manualEdits.add(merchant);
    }

    /**
     * Learn one decision for a merchant.
     *
     * A manually edited merchant keeps its category against automatic
     * decisions; only the usage count moves.
     */
    upsert(merchant: string, category: string, isManualCorrection = false): UpsertOutcome {
        const existing = this.rules.get(merchant);
        this.rules.delete(merchant);

        if (!existing) {
            this.rules.set(merchant, { category, usage_count: 1 });
            return 'inserted';
        }

        if (existing.category === category) {
            this.rules.set(merchant, { category, usage_count: existing.usage_count + 1 });
            return 'incremented';
        }

        if (this.manualEdits.has(merchant) && !isManualCorrection) {
            this.rules.set(merchant, { category: existing.category, usage_count: existing.usage_count + 1 });
            return 'protected';
        }

        this.rules.set(merchant, { category, usage_count: 1 });
        return 'replaced';
    }

    /**
     * Drop least-used rules until the store fits maxRules.
     *
     * @returns merchants that were evicted, in store order
     */
    evictIfOverCapacity(): string[] {
        const overflow = this.rules.size - this.maxRules;
        if (overflow <= 0) return [];

        const victims = overflow === 1
            ? [this.findLeastUsed()]
            : rankForRetention(this.toArray(), this.maxRules).dropped.map(r => r.merchant);

        for (const merchant of victims) {
            this.rules.delete(merchant);
        }
        return victims;
    }

    /**
     * Single-victim path of evictIfOverCapacity: lowest usage_count,
     * earliest (least recently touched) on ties. Same pick as rankForRetention.
     */
    private findLeastUsed(): string {
        let victim = '';
        let lowest = Infinity;
        for (const [merchant, entry] of this.rules) {
            if (entry.usage_count < lowest) {
                lowest = entry.usage_count;
                victim = merchant;
            }
        }
        return victim;
    }

    merchants(): string[] {
        return [...this.rules.keys()];
    }

    manualEditMerchants(): string[] {
        return [...this.manualEdits];
    }

    /**
     * All rules, least recently touched first.
     */
    toArray(): Rule[] {
        return [...this.rules].map(([merchant, entry]) => ({ merchant, ...entry }));
    }

    /**
     * Rules ordered by usage_count descending; recent first on ties.
     */
    byUsage(): Rule[] {
        return rankByUsage(this.toArray()).map(r => r.rule);
    }
}
