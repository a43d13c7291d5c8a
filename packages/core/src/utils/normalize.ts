/**
 * Merchant name helpers for indexing and matching.
 *
 * NOTE: Rule keys are exact, case-sensitive strings. Nothing here is used
 * to rewrite a merchant before it is stored.
 */

/**
 * Split a merchant name into characters (code points, not UTF-16 units),
 * so a prefix never cuts a surrogate pair in half.
 */
export function merchantChars(merchant: string): string[] {
    return Array.from(merchant);
}

/**
 * True when the merchant name carries no matchable text.
 */
export function isBlankMerchant(merchant: string): boolean {
    return merchant.trim().length === 0;
}
