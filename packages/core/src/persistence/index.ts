/**
 * Persistence module: JSON document codec and storage contract.
 */

export { decodeRulesDocument, decodeHistory, encodeRulesDocument } from './codec.js';
export type { DecodedRules, DecodedHistory } from './codec.js';
export type {
    PersistedRulesDocument,
    RawDocuments,
    PersistedDocuments,
    LearningStore,
} from './types.js';
