/**
 * Recorder module: learning from classification decisions.
 */

export { recordDecision } from './record.js';
export type { RecorderState, RecordOutcome } from './record.js';
export { truncateHistory, removeSupersededEntry } from './history.js';
export type { SupersededEntryQuery } from './history.js';
