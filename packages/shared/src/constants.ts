/**
 * Constants for billsort.
 */

/**
 * Version written into the persisted rules document.
 */
export const RULES_FORMAT_VERSION = '2.0';

/**
 * Default capacity limits for the learning store.
 */
export const DEFAULT_LIMITS = {
    MAX_RULES: 50000,
    MAX_HISTORY: 5000,
} as const;

/**
 * Fuzzy lookup configuration.
 * Merchants shorter than KEY_LENGTH characters are never indexed.
 */
export const PREFIX_INDEX = {
    KEY_LENGTH: 3,
} as const;

/**
 * Two history amounts are "the same transaction" when they differ by less than this.
 */
export const AMOUNT_TOLERANCE = '0.01';

/**
 * Reason prefixes attached to each suggestion, by source.
 */
export const SUGGESTION_REASON = {
    special: 'transaction type',
    exact: 'exact match',
    fuzzy: 'similar merchant',
} as const;

/**
 * Default file names, relative to the workspace data directory.
 */
export const DEFAULT_FILES = {
    RULES_FILE: 'bill_rules.json',
    HISTORY_FILE: 'bill_history.json',
} as const;

// ============================================================================
// Default category configuration
// ============================================================================

export const DEFAULT_BASE_CATEGORIES = [
    '餐饮',
    '出行',
    '住房贷款',
    '购物',
    '生活缴费',
    '娱乐',
    '医疗',
    '学习',
    '人情往来',
    '汽车',
    '投资',
    '其他消费',
    '工资',
    '其他',
    '父母',
    '党费',
    '运动',
    '其他收入',
    '旅游',
    '服务',
    '公积金',
    '贷款',
    '山姆&盒马',
    '水果&超市',
    '买菜',
];

export const DEFAULT_BILL_SOURCES = ['微信', '支付宝', '银行', '现金', '其他'];

export const DEFAULT_PEOPLE_OPTIONS = ['男主人', '女主人', '家庭公用'];

/**
 * Transaction-type keywords that force a category regardless of merchant history.
 * Checked in insertion order; the first keyword contained in the type wins.
 */
export const DEFAULT_SPECIAL_TYPES: Record<string, string> = {
    '转账': '人情往来',
    '微信红包': '人情往来',
    '收付款': '人情往来',
};
