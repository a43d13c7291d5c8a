/**
 * Decision recording: turns one classification decision into rule-store,
 * index and history updates.
 *
 * Not synchronized. LearningEngine holds its mutex around every call.
 */

import type { HistoryEntry, Rule, ValidDecision } from '../types/index.js';
import type { RuleStore, UpsertOutcome } from '../store/rule-store.js';
import type { PrefixIndex } from '../store/prefix-index.js';
import { removeSupersededEntry, truncateHistory } from './history.js';

export interface RecorderState {
    rules: RuleStore;
    index: PrefixIndex;
    history: HistoryEntry[];
    maxHistory: number;
}

export interface RecordOutcome {
    outcome: UpsertOutcome;
    /** Stored rule after the decision; undefined if it was evicted right away. */
    rule?: Rule;
    entry: HistoryEntry;
    removedEntry: HistoryEntry | null;
    evicted: string[];
    historyDropped: number;
}

/**
 * Apply a validated decision to the learning state.
 */
export function recordDecision(state: RecorderState, decision: ValidDecision, timestamp: string): RecordOutcome {
    const { merchant, category, manual_correction: manual } = decision;

    const outcome = state.rules.upsert(merchant, category, manual);
    if (outcome === 'inserted') {
        state.index.register(merchant);
    }
    if (manual) {
        state.rules.markManualEdit(merchant);
    }

    let removedEntry: HistoryEntry | null = null;
    if (manual && decision.prior_category !== undefined) {
        removedEntry = removeSupersededEntry(state.history, {
            merchant,
            amount: decision.amount,
            bill_source: decision.bill_source,
            category: decision.prior_category,
        });
    }

    const entry: HistoryEntry = {
        merchant,
        category,
        person: decision.person,
        bill_source: decision.bill_source,
        amount: decision.amount,
        timestamp,
    };
    state.history.push(entry);

    const evicted = state.rules.evictIfOverCapacity();
    for (const gone of evicted) {
        state.index.unregister(gone);
    }
    const historyDropped = truncateHistory(state.history, state.maxHistory);

    const stored = state.rules.get(merchant);
    return {
        outcome,
        rule: stored ? { merchant, ...stored } : undefined,
        entry,
        removedEntry,
        evicted,
        historyDropped,
    };
}
