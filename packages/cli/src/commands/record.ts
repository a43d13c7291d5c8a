import { openSession, closeSession } from '../session.js';
import { arrow, error, log, success, warn } from '../utils/console.js';
import type { RecordOptions } from '../types.js';

const OUTCOME_LABEL = {
    inserted: 'new rule',
    incremented: 'confirmed',
    replaced: 'category changed',
    protected: 'kept manual category',
} as const;

/**
 * Record one classification decision and save the learning data.
 * Person and bill source default to the first configured option.
 */
export async function recordDecision(merchant: string, category: string, options: RecordOptions): Promise<void> {
    const session = openSession(options);
    const { engine, config } = session;

    const person = options.person ?? config.categories.people_options[0] ?? '';
    const billSource = options.source ?? config.categories.bill_sources[0] ?? '';

    if (options.prior !== undefined && !options.manual) {
        warn('--prior only applies to manual corrections (--manual); ignoring it.');
    }
    if (!config.categories.base_categories.includes(category)) {
        warn(`"${category}" is not one of the configured base categories.`);
    }

    const result = await engine.record({
        merchant,
        category,
        person,
        bill_source: billSource,
        amount: options.amount ?? 0,
        manual_correction: options.manual ?? false,
        prior_category: options.prior,
    });

    if (!result.ok) {
        error(result.error);
        process.exit(1);
    }

    await closeSession(session);

    success(`Recorded "${merchant}" → ${category} (${OUTCOME_LABEL[result.outcome]})`);
    if (result.rule) {
        arrow(`Rule:  ${result.rule.category} × ${result.rule.usage_count}`);
    } else {
        arrow('Rule evicted: the store is full of more frequently used rules.');
    }
    if (result.removedEntry) {
        arrow(`Replaced history entry from ${result.removedEntry.timestamp} (${result.removedEntry.category})`);
    }
    if (result.evicted.length > 0) {
        log(`  Evicted ${result.evicted.length} least-used rule(s).`);
    }
}
