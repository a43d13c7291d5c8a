// Types (re-exported from shared)
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
} from './types/index.js';

// Utils
export { isBlankMerchant, amountsMatch } from './utils/index.js';

// Store
export { RuleStore, rankForRetention, PrefixIndex, indexKey } from './store/index.js';
export type { RuleEntry, UpsertOutcome } from './store/index.js';

// Suggestions
export { suggest, matchSpecialType } from './suggest/index.js';
export type { SuggestContext, SpecialTypeMap } from './suggest/index.js';

// Recorder
export { recordDecision, truncateHistory, removeSupersededEntry } from './recorder/index.js';
export type { RecorderState, RecordOutcome } from './recorder/index.js';

// Persistence
export { decodeRulesDocument, decodeHistory, encodeRulesDocument } from './persistence/index.js';
export type {
    PersistedRulesDocument,
    RawDocuments,
    PersistedDocuments,
    LearningStore,
} from './persistence/index.js';

// Engine
export { LearningEngine } from './engine/index.js';
export type { EngineOptions, RecordResult, SaveResult } from './engine/index.js';
