/**
 * Persistence codec: pure conversion between the on-disk JSON documents and
 * the learning state. File access lives behind LearningStore (see types.ts).
 *
 * Decoding never throws. Anything unusable becomes a warning and is left out;
 * a document with the wrong overall shape decodes to an empty store.
 */

import {
    HistoryEntrySchema,
    PersistedRuleValueSchema,
    RulesDocumentSchema,
    RULES_FORMAT_VERSION,
} from '../types/index.js';
import type { HistoryEntry, Rule } from '../types/index.js';
import type { PersistedRulesDocument } from './types.js';

export interface DecodedRules {
    rules: Rule[];
    manualEdits: string[];
    warnings: string[];
}

export interface DecodedHistory {
    history: HistoryEntry[];
    warnings: string[];
}

/**
 * Decode a parsed rules document. `undefined` means there was no file.
 * Rules come back in document order; capacity is applied by the caller.
 */
export function decodeRulesDocument(raw: unknown): DecodedRules {
    const empty: DecodedRules = { rules: [], manualEdits: [], warnings: [] };
    if (raw === undefined) return empty;

    const parsed = RulesDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        return {
            ...empty,
            warnings: [`Rules document has an unexpected shape, starting fresh: ${parsed.error.issues[0]?.message ?? 'invalid'}`],
        };
    }

    const warnings: string[] = [];
    const rules: Rule[] = [];
    const invalid: string[] = [];

    for (const [merchant, value] of Object.entries(parsed.data.rules)) {
        const rule = PersistedRuleValueSchema.safeParse(value);
        if (rule.success) {
            rules.push({ merchant, ...rule.data });
        } else {
            invalid.push(merchant);
        }
    }

    if (invalid.length > 0) {
        warnings.push(`Skipped ${invalid.length} unreadable rule(s): ${invalid.slice(0, 5).join(', ')}${invalid.length > 5 ? ', ...' : ''}`);
    }

    return { rules, manualEdits: [...new Set(parsed.data.manual_edited_rules)], warnings };
}

/**
 * Decode a parsed history document (array, newest last).
 */
export function decodeHistory(raw: unknown): DecodedHistory {
    if (raw === undefined) return { history: [], warnings: [] };

    if (!Array.isArray(raw)) {
        return { history: [], warnings: ['History document is not a list, starting fresh.'] };
    }

    const history: HistoryEntry[] = [];
    let skipped = 0;
    for (const item of raw) {
        const entry = HistoryEntrySchema.safeParse(item);
        if (entry.success) {
            history.push(entry.data);
        } else {
            skipped++;
        }
    }

    const warnings = skipped > 0 ? [`Skipped ${skipped} unreadable history entr${skipped === 1 ? 'y' : 'ies'}.`] : [];
    return { history, warnings };
}

/**
 * Build the rules document written to disk.
 */
export function encodeRulesDocument(
    rules: Rule[],
    manualEdits: string[],
    options: { saveTime: string; categories?: unknown }
): PersistedRulesDocument {
    return {
        version: RULES_FORMAT_VERSION,
        save_time: options.saveTime,
        total_rules: rules.length,
        rules: Object.fromEntries(rules.map(r => [r.merchant, [r.category, r.usage_count] as [string, number]])),
        manual_edited_rules: manualEdits,
        metadata: {
            categories: options.categories ?? {},
        },
    };
}
