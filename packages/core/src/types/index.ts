/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Rule,
    HistoryEntry,
    RulesDocument,
    Decision,
    ValidDecision,
    Suggestion,
    SuggestionSource,
    EngineStatistics,
    CategoriesConfig,
} from '@billsort/shared';

export {
    RuleSchema,
    PersistedRuleValueSchema,
    HistoryEntrySchema,
    RulesDocumentSchema,
    DecisionSchema,
    LimitsConfigSchema,
    SuggestionSchema,
    RULES_FORMAT_VERSION,
    DEFAULT_LIMITS,
    PREFIX_INDEX,
    AMOUNT_TOLERANCE,
    SUGGESTION_REASON,
} from '@billsort/shared';
