/**
 * LearningEngine: the public face of the rule store, prefix index,
 * suggestion logic, decision recorder and persistence codec.
 *
 * One instance per session: open() -> suggest()/record() -> save() -> drop.
 * Every operation that reads or writes state runs under a single mutex, so a
 * prompt loop and an event-loop callback can share the instance.
 *
 * open() throws only for invalid limits. No other method throws: failures
 * come back as result values, and load problems are kept in loadWarnings for
 * the caller to report.
 */

import { Mutex } from 'async-mutex';
import { DecisionSchema, LimitsConfigSchema } from '../types/index.js';
import type {
    Decision,
    EngineStatistics,
    HistoryEntry,
    Rule,
    Suggestion,
} from '../types/index.js';
import { RuleStore, rankForRetention } from '../store/rule-store.js';
import { PrefixIndex } from '../store/prefix-index.js';
import { suggest } from '../suggest/suggest.js';
import { recordDecision } from '../recorder/record.js';
import { truncateHistory } from '../recorder/history.js';
import { decodeHistory, decodeRulesDocument, encodeRulesDocument } from '../persistence/codec.js';
import type { PersistedDocuments } from '../persistence/types.js';
import type { EngineOptions, RecordResult, SaveResult } from './types.js';

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class LearningEngine {
    private readonly mutex = new Mutex();
    private readonly history: HistoryEntry[];
    private readonly warnings: string[];
    private readonly now: () => Date;

    private constructor(
        private readonly options: EngineOptions,
        private readonly rules: RuleStore,
        private readonly index: PrefixIndex,
        history: HistoryEntry[],
        warnings: string[]
    ) {
        this.history = history;
        this.warnings = warnings;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Open a session: load persisted state from the store (if any), apply
     * capacity limits and build the prefix index.
     *
     * Missing or corrupt documents give an empty store plus warnings.
     * Limits must be positive integers.
     */
    static open(options: EngineOptions): LearningEngine {
        const limits = LimitsConfigSchema.safeParse({ max_rules: options.maxRules, max_history: options.maxHistory });
        if (!limits.success) {
            const problems = limits.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
            throw new Error(`Invalid engine limits: ${problems.join('; ')}`);
        }

        const warnings: string[] = [];

        let rawRules: unknown;
        let rawHistory: unknown;
        if (options.store) {
            try {
                const raw = options.store.load();
                rawRules = raw.rules;
                rawHistory = raw.history;
                warnings.push(...raw.warnings);
            } catch (err) {
                warnings.push(`Failed to load learning data, starting fresh: ${errorMessage(err)}`);
            }
        }

        const decodedRules = decodeRulesDocument(rawRules);
        warnings.push(...decodedRules.warnings);
        const rules = RuleStore.from(decodedRules.rules, decodedRules.manualEdits, options.maxRules);
        const evicted = rules.evictIfOverCapacity();
        if (evicted.length > 0) {
            warnings.push(`Too many rules (${decodedRules.rules.length}), kept the ${options.maxRules} most used.`);
        }

        const decodedHistory = decodeHistory(rawHistory);
        warnings.push(...decodedHistory.warnings);
        const history = decodedHistory.history;
        const dropped = truncateHistory(history, options.maxHistory);
        if (dropped > 0) {
            warnings.push(`Too many history entries, dropped the ${dropped} oldest.`);
        }

        const index = PrefixIndex.build(rules.merchants());
        return new LearningEngine(options, rules, index, history, warnings);
    }

    /**
     * Warnings collected while loading persisted state.
     */
    get loadWarnings(): readonly string[] {
        return this.warnings;
    }

    /**
     * Ranked category suggestions for a merchant and transaction type.
     */
    async suggest(merchant: string, transactionType = ''): Promise<Suggestion[]> {
        return this.mutex.runExclusive(() =>
            suggest(merchant, transactionType, {
                rules: this.rules,
                index: this.index,
                specialTypes: this.options.specialTypes,
            })
        );
    }

    /**
     * Learn from one classification decision.
     */
    async record(decision: Decision): Promise<RecordResult> {
        const parsed = DecisionSchema.safeParse(decision);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            return {
                ok: false,
                error: `Invalid decision: ${issue ? `${issue.path.join('.') || 'decision'}: ${issue.message}` : 'unknown error'}`,
            };
        }

        return this.mutex.runExclusive(() => {
            const outcome = recordDecision(
                {
                    rules: this.rules,
                    index: this.index,
                    history: this.history,
                    maxHistory: this.options.maxHistory,
                },
                parsed.data,
                this.now().toISOString()
            );
            return { ok: true as const, ...outcome };
        });
    }

    async statistics(): Promise<EngineStatistics> {
        return this.mutex.runExclusive(() => ({
            total_rules: this.rules.size,
            total_history: this.history.length,
            max_rules: this.options.maxRules,
            max_history: this.options.maxHistory,
            manual_edits: this.rules.manualEditCount,
        }));
    }

    /**
     * Stored rule for a merchant, exact match only.
     */
    async rule(merchant: string): Promise<Rule | undefined> {
        return this.mutex.runExclusive(() => {
            const entry = this.rules.get(merchant);
            return entry ? { merchant, ...entry } : undefined;
        });
    }

    /**
     * Rules ordered by usage_count descending, most recent first on ties.
     */
    async topRules(limit?: number): Promise<Rule[]> {
        return this.mutex.runExclusive(() => {
            const ranked = this.rules.byUsage();
            return limit === undefined ? ranked : ranked.slice(0, limit);
        });
    }

    async isManuallyEdited(merchant: string): Promise<boolean> {
        return this.mutex.runExclusive(() => this.rules.isManuallyEdited(merchant));
    }

    /**
     * Copy of the history log, oldest first.
     */
    async historyEntries(): Promise<HistoryEntry[]> {
        return this.mutex.runExclusive(() => this.history.map(e => ({ ...e })));
    }

    /**
     * Encode the current state as the documents written to disk.
     * Capacity limits are applied to the copies; in-memory state is untouched.
     */
    async snapshot(): Promise<PersistedDocuments> {
        return this.mutex.runExclusive(() => this.encode());
    }

    /**
     * Persist the current state through the store.
     * On failure the in-memory state stays authoritative and save() may be retried.
     */
    async save(): Promise<SaveResult> {
        const store = this.options.store;
        if (!store) {
            return { ok: false, error: 'No store configured for this engine.' };
        }

        return this.mutex.runExclusive(async () => {
            const documents = this.encode();
            try {
                await store.save(documents);
            } catch (err) {
                return { ok: false as const, error: errorMessage(err) };
            }
            return {
                ok: true as const,
                total_rules: documents.rules.total_rules,
                total_history: documents.history.length,
            };
        });
    }

    private encode(): PersistedDocuments {
        const { kept } = rankForRetention(this.rules.toArray(), this.options.maxRules);

        const history = this.history.map(e => ({ ...e }));
        truncateHistory(history, this.options.maxHistory);

        return {
            rules: encodeRulesDocument(kept, this.rules.manualEditMerchants(), {
                saveTime: this.now().toISOString(),
                categories: this.options.categories,
            }),
            history,
        };
    }
}
