export { LearningEngine } from './learning-engine.js';
export type { EngineOptions, RecordResult, SaveResult } from './types.js';
