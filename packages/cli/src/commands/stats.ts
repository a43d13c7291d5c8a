import { openSession } from '../session.js';
import { arrow, log } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

export async function showStatistics(options: GlobalOptions): Promise<void> {
    const { engine, workspace } = openSession(options);
    const stats = await engine.statistics();

    log(`Learning store: ${workspace.data}`);
    arrow(`Rules:        ${stats.total_rules} / ${stats.max_rules}`);
    arrow(`History:      ${stats.total_history} / ${stats.max_history}`);
    arrow(`Manual edits: ${stats.manual_edits}`);
}
