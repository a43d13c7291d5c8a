/**
 * Suggestion module: ranked category suggestions from learned rules.
 */

export { suggest, matchSpecialType } from './suggest.js';
export type { SuggestContext } from './suggest.js';
export type { SpecialTypeMap } from './types.js';
