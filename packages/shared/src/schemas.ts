/**
 * Zod schemas for billsort data structures.
 *
 * Persisted shapes use snake_case keys so that the JSON on disk stays
 * readable by older tooling that wrote the same files.
 */

import { z } from 'zod';
import {
    DEFAULT_BASE_CATEGORIES,
    DEFAULT_BILL_SOURCES,
    DEFAULT_FILES,
    DEFAULT_LIMITS,
    DEFAULT_PEOPLE_OPTIONS,
    DEFAULT_SPECIAL_TYPES,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

const merchantName = z.string();

const categoryName = z.string().min(1);

const usageCount = z.number().int().min(1);

const positiveLimit = z.number().int().positive();

// ============================================================================
// Rule Schemas
// ============================================================================

/**
 * A learned merchant -> category association.
 */
export const RuleSchema = z.object({
    merchant: merchantName,
    category: categoryName,
    usage_count: usageCount,
});

export type Rule = z.infer<typeof RuleSchema>;

/**
 * Value stored under a merchant key in the rules document.
 *
 * Current files store `[category, usage_count]`. Old files sometimes stored
 * the bare category string; those are upgraded to a usage count of 1.
 */
export const PersistedRuleValueSchema = z.union([
    z.tuple([categoryName, usageCount]).transform(([category, usage_count]) => ({ category, usage_count })),
    z.tuple([categoryName]).transform(([category]) => ({ category, usage_count: 1 })),
    categoryName.transform((category) => ({ category, usage_count: 1 })),
]);

export type PersistedRuleValue = z.infer<typeof PersistedRuleValueSchema>;

// ============================================================================
// History Schemas
// ============================================================================

/**
 * Immutable audit record of one classification decision.
 */
export const HistoryEntrySchema = z.object({
    merchant: merchantName,
    category: categoryName,
    person: z.string(),
    bill_source: z.string(),
    amount: z.number().finite(),
    timestamp: z.string(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const HistorySchema = z.array(HistoryEntrySchema);

// ============================================================================
// Configuration Schemas
// ============================================================================

export const CategoriesConfigSchema = z.object({
    base_categories: z.array(categoryName).default(() => [...DEFAULT_BASE_CATEGORIES]),
    bill_sources: z.array(z.string().min(1)).default(() => [...DEFAULT_BILL_SOURCES]),
    people_options: z.array(z.string().min(1)).default(() => [...DEFAULT_PEOPLE_OPTIONS]),
    special_types: z.record(z.string().min(1), categoryName).default(() => ({ ...DEFAULT_SPECIAL_TYPES })),
});

export type CategoriesConfig = z.infer<typeof CategoriesConfigSchema>;

export const LimitsConfigSchema = z.object({
    max_rules: positiveLimit.default(DEFAULT_LIMITS.MAX_RULES),
    max_history: positiveLimit.default(DEFAULT_LIMITS.MAX_HISTORY),
});

export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;

export const FilesConfigSchema = z.object({
    rules_file: z.string().min(1).default(DEFAULT_FILES.RULES_FILE),
    history_file: z.string().min(1).default(DEFAULT_FILES.HISTORY_FILE),
});

export type FilesConfig = z.infer<typeof FilesConfigSchema>;

/**
 * Full configuration file. Every key is optional; missing keys take defaults.
 */
export const BillsortConfigSchema = z.object({
    files: FilesConfigSchema.default({}),
    limits: LimitsConfigSchema.default({}),
    categories: CategoriesConfigSchema.default({}),
});

export type BillsortConfig = z.infer<typeof BillsortConfigSchema>;

// ============================================================================
// Persisted Document Schemas
// ============================================================================

/**
 * Plain JSON object, passed through as parsed.
 *
 * z.record() rebuilds the object by assignment, which turns a "__proto__"
 * key into a prototype change. Merchant names are arbitrary, so the object
 * from JSON.parse is kept and its own keys are read as they are.
 */
const jsonObject = z.custom<Record<string, unknown>>(
    (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
    { message: 'Expected an object' }
);

/**
 * Rules document as written to disk.
 * Rule values are validated one by one by the codec so a single bad entry
 * does not discard the whole store.
 */
export const RulesDocumentSchema = z.object({
    version: z.string().optional(),
    save_time: z.string().optional(),
    total_rules: z.number().int().min(0).optional(),
    rules: jsonObject.default(() => ({})),
    manual_edited_rules: z.array(merchantName).default([]),
    metadata: z.object({
        categories: z.unknown().optional(),
    }).passthrough().optional(),
});

export type RulesDocument = z.infer<typeof RulesDocumentSchema>;

// ============================================================================
// Engine Contract Schemas
// ============================================================================

/**
 * A user's classification decision, as passed to record().
 */
export const DecisionSchema = z.object({
    merchant: merchantName,
    category: categoryName,
    person: z.string(),
    bill_source: z.string(),
    amount: z.number().finite(),
    manual_correction: z.boolean().default(false),
    prior_category: categoryName.optional(),
});

export type Decision = z.input<typeof DecisionSchema>;

export type ValidDecision = z.infer<typeof DecisionSchema>;

export const SuggestionSourceSchema = z.enum(['special', 'exact', 'fuzzy']);

export type SuggestionSource = z.infer<typeof SuggestionSourceSchema>;

/**
 * One ranked category suggestion with its justification.
 */
export const SuggestionSchema = z.object({
    category: categoryName,
    reason: z.string(),
    source: SuggestionSourceSchema,
});

export type Suggestion = z.infer<typeof SuggestionSchema>;

export const EngineStatisticsSchema = z.object({
    total_rules: z.number().int().min(0),
    total_history: z.number().int().min(0),
    max_rules: positiveLimit,
    max_history: positiveLimit,
    manual_edits: z.number().int().min(0),
});

export type EngineStatistics = z.infer<typeof EngineStatisticsSchema>;
