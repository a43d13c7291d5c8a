export { RuleStore, rankForRetention } from './rule-store.js';
export type { RuleEntry, UpsertOutcome } from './rule-store.js';
export { PrefixIndex, indexKey } from './prefix-index.js';
