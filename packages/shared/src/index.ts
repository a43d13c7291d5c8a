// Schemas
export {
    RuleSchema,
    PersistedRuleValueSchema,
    HistoryEntrySchema,
    HistorySchema,
    CategoriesConfigSchema,
    LimitsConfigSchema,
    FilesConfigSchema,
    BillsortConfigSchema,
    RulesDocumentSchema,
    DecisionSchema,
    SuggestionSourceSchema,
    SuggestionSchema,
    EngineStatisticsSchema,
} from './schemas.js';

// Types
export type {
    Rule,
    PersistedRuleValue,
    HistoryEntry,
    CategoriesConfig,
    LimitsConfig,
    FilesConfig,
    BillsortConfig,
    RulesDocument,
    Decision,
    ValidDecision,
    SuggestionSource,
    Suggestion,
    EngineStatistics,
} from './schemas.js';

// Constants
export {
    RULES_FORMAT_VERSION,
    DEFAULT_LIMITS,
    PREFIX_INDEX,
    AMOUNT_TOLERANCE,
    SUGGESTION_REASON,
    DEFAULT_FILES,
    DEFAULT_BASE_CATEGORIES,
    DEFAULT_BILL_SOURCES,
    DEFAULT_PEOPLE_OPTIONS,
    DEFAULT_SPECIAL_TYPES,
} from './constants.js';
