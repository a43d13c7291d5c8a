import { Command, InvalidArgumentError } from 'commander';
import { suggestCategory } from './commands/suggest.js';
import { recordDecision } from './commands/record.js';
import { showStatistics } from './commands/stats.js';
import { listRules } from './commands/rules.js';
import type { GlobalOptions, RecordOptions, RulesOptions, SuggestOptions } from './types.js';

export const VERSION = '2.0.0';

export function parseAmount(value: string): number {
    const amount = Number(value);
    if (value.trim() === '' || !Number.isFinite(amount)) {
        throw new InvalidArgumentError('Amount must be a number, e.g. -32.50');
    }
    return amount;
}

export function parseLimit(value: string): number {
    const limit = Number(value);
    if (!Number.isInteger(limit) || limit < 1) {
        throw new InvalidArgumentError('Limit must be a positive integer.');
    }
    return limit;
}

/**
 * Build the billsort command tree. Subcommand options are merged over the
 * global ones before dispatch.
 */
export function createProgram(): Command {
    const program = new Command()
        .name('billsort')
        .description('Learn merchant categories from your decisions and suggest them next time')
        .version(VERSION)
        .option('-w, --workspace <path>', 'workspace root (default: nearest directory with config/billsort.yaml)');

    const globals = (): GlobalOptions => program.opts<GlobalOptions>();

    program
        .command('suggest')
        .description('Suggest categories for a merchant')
        .argument('<merchant>', 'merchant name as it appears on the bill')
        .option('-t, --type <type>', 'transaction type, e.g. 商户消费 or 转账')
        .action(async (merchant: string, options: SuggestOptions) => {
            await suggestCategory(merchant, { ...globals(), ...options });
        });

    program
        .command('record')
        .description('Record a classification decision and learn from it')
        .argument('<merchant>', 'merchant name as it appears on the bill')
        .argument('<category>', 'chosen category')
        .option('-p, --person <person>', 'person the transaction belongs to')
        .option('-s, --source <source>', 'bill source, e.g. 微信')
        .option('-a, --amount <amount>', 'signed transaction amount', parseAmount)
        .option('-m, --manual', 'this decision corrects an earlier suggestion')
        .option('--prior <category>', 'category being corrected (with --manual)')
        .action(async (merchant: string, category: string, options: RecordOptions) => {
            await recordDecision(merchant, category, { ...globals(), ...options });
        });

    program
        .command('stats')
        .description('Show rule and history counts')
        .action(async () => {
            await showStatistics(globals());
        });

    program
        .command('rules')
        .description('List learned rules, most used first')
        .option('-n, --limit <count>', 'number of rules to show', parseLimit)
        .action(async (options: RulesOptions) => {
            await listRules({ ...globals(), ...options });
        });

    return program;
}
