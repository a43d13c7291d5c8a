import { openSession } from '../session.js';
import { info, log } from '../utils/console.js';
import type { SuggestOptions } from '../types.js';

export async function suggestCategory(merchant: string, options: SuggestOptions): Promise<void> {
    const { engine, config } = openSession(options);
    const suggestions = await engine.suggest(merchant, options.type ?? '');

    if (suggestions.length === 0) {
        info(`Nothing learned for "${merchant}" yet. Base categories:`);
        config.categories.base_categories.forEach((category, i) => {
            log(`  ${i + 1}. ${category}`);
        });
        return;
    }

    log(`Suggestions for "${merchant}":`);
    suggestions.forEach((s, i) => {
        log(`  ${i + 1}. ${s.category} (${s.reason})`);
    });
}
