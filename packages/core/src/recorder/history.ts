/**
 * History log helpers. The log is kept oldest-first, newest-last.
 */

import type { HistoryEntry } from '../types/index.js';
import { amountsMatch } from '../utils/amount.js';

/**
 * Drop the oldest entries in place until the log fits maxHistory.
 *
 * @returns number of entries dropped
 */
export function truncateHistory(history: HistoryEntry[], maxHistory: number): number {
    const overflow = history.length - maxHistory;
    if (overflow <= 0) return 0;
    history.splice(0, overflow);
    return overflow;
}

export interface SupersededEntryQuery {
    merchant: string;
    amount: number;
    bill_source: string;
    category: string;
}

/**
 * Remove the most recent entry recording the decision a correction replaces.
 * At most one entry is removed.
 *
 * @returns the removed entry, or null when nothing matched
 */
export function removeSupersededEntry(history: HistoryEntry[], query: SupersededEntryQuery): HistoryEntry | null {
    for (let i = history.length - 1; i >= 0; i--) {
        const entry = history[i];
        if (
            entry.merchant === query.merchant &&
            entry.bill_source === query.bill_source &&
            entry.category === query.category &&
            amountsMatch(entry.amount, query.amount)
        ) {
            history.splice(i, 1);
            return entry;
        }
    }
    return null;
}
