/**
 * Category suggestions for a merchant, in priority order:
 * 1. special transaction type (stops here)
 * 2. exact merchant match
 * 3. fuzzy match on the prefix index (first hit wins)
 *
 * Categories are unique in the result; the first source to propose a
 * category keeps its reason.
 */

import { SUGGESTION_REASON } from '../types/index.js';
import type { Suggestion, SuggestionSource } from '../types/index.js';
import type { RuleStore } from '../store/rule-store.js';
import type { PrefixIndex } from '../store/prefix-index.js';
import { isBlankMerchant } from '../utils/normalize.js';
import type { SpecialTypeMap } from './types.js';

export interface SuggestContext {
    rules: RuleStore;
    index: PrefixIndex;
    specialTypes: SpecialTypeMap;
}

/**
 * First configured keyword contained in the transaction type, if any.
 */
export function matchSpecialType(
    transactionType: string,
    specialTypes: SpecialTypeMap
): { keyword: string; category: string } | null {
    for (const [keyword, category] of Object.entries(specialTypes)) {
        if (keyword && transactionType.includes(keyword)) {
            return { keyword, category };
        }
    }
    return null;
}

/**
 * Suggest categories for a merchant.
 *
 * An empty result means nothing was learned for this merchant; the caller
 * falls back to its configured base categories.
 */
export function suggest(merchant: string, transactionType: string, ctx: SuggestContext): Suggestion[] {
    const special = matchSpecialType(transactionType, ctx.specialTypes);
    if (special) {
        return [{
            category: special.category,
            reason: `${SUGGESTION_REASON.special}: ${special.keyword}`,
            source: 'special',
        }];
    }

    const suggestions: Suggestion[] = [];
    if (isBlankMerchant(merchant)) return suggestions;

    function add(category: string, source: SuggestionSource, subject: string): void {
        if (suggestions.some(s => s.category === category)) return;
        suggestions.push({ category, reason: `${SUGGESTION_REASON[source]}: ${subject}`, source });
    }

    const exact = ctx.rules.get(merchant);
    if (exact) {
        add(exact.category, 'exact', merchant);
    }

    for (const candidate of ctx.index.lookup(merchant)) {
        const rule = ctx.rules.get(candidate);
        if (!rule) continue;
        if (candidate.includes(merchant) || merchant.includes(candidate)) {
            add(rule.category, 'fuzzy', candidate);
            break;
        }
    }

    return suggestions;
}
