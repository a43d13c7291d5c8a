/**
 * Transaction-type keyword -> forced category.
 */
export type SpecialTypeMap = Record<string, string>;
