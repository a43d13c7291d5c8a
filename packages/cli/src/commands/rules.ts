import { openSession } from '../session.js';
import { info, log } from '../utils/console.js';
import type { RulesOptions } from '../types.js';

/**
 * List learned rules, most used first. Manually corrected merchants are
 * flagged with "*".
 */
export async function listRules(options: RulesOptions): Promise<void> {
    const { engine } = openSession(options);
    const rules = await engine.topRules(options.limit);

    if (rules.length === 0) {
        info('No rules learned yet.');
        return;
    }

    for (const rule of rules) {
        const flag = (await engine.isManuallyEdited(rule.merchant)) ? '*' : ' ';
        log(`${flag} ${String(rule.usage_count).padStart(5)}  ${rule.merchant} → ${rule.category}`);
    }
}
