import { describe, it, expect } from 'vitest';
import {
    RuleSchema,
    PersistedRuleValueSchema,
    HistoryEntrySchema,
    BillsortConfigSchema,
    RulesDocumentSchema,
    DecisionSchema,
} from '../src/schemas.js';
import { DEFAULT_BASE_CATEGORIES, DEFAULT_SPECIAL_TYPES } from '../src/constants.js';

describe('RuleSchema', () => {
    it('validates a rule', () => {
        const result = RuleSchema.safeParse({ merchant: '星巴克', category: '餐饮', usage_count: 1 });
        expect(result.success).toBe(true);
    });

    it('rejects a usage_count below 1', () => {
        const result = RuleSchema.safeParse({ merchant: '星巴克', category: '餐饮', usage_count: 0 });
        expect(result.success).toBe(false);
    });

    it('rejects an empty category', () => {
        const result = RuleSchema.safeParse({ merchant: '星巴克', category: '', usage_count: 1 });
        expect(result.success).toBe(false);
    });
});

describe('PersistedRuleValueSchema', () => {
    it('reads [category, usage_count] pairs', () => {
        expect(PersistedRuleValueSchema.parse(['餐饮', 4])).toEqual({ category: '餐饮', usage_count: 4 });
    });

    it('upgrades a bare category string', () => {
        expect(PersistedRuleValueSchema.parse('餐饮')).toEqual({ category: '餐饮', usage_count: 1 });
    });

    it('upgrades a single-element list', () => {
        expect(PersistedRuleValueSchema.parse(['餐饮'])).toEqual({ category: '餐饮', usage_count: 1 });
    });

    it('rejects fractional counts', () => {
        expect(PersistedRuleValueSchema.safeParse(['餐饮', 1.5]).success).toBe(false);
    });

    it('rejects extra elements', () => {
        expect(PersistedRuleValueSchema.safeParse(['餐饮', 2, 'x']).success).toBe(false);
    });
});

describe('HistoryEntrySchema', () => {
    const entry = {
        merchant: '星巴克',
        category: '餐饮',
        person: '家庭公用',
        bill_source: '微信',
        amount: -32,
        timestamp: '2026-03-01T08:00:00.000Z',
    };

    it('validates an entry', () => {
        expect(HistoryEntrySchema.safeParse(entry).success).toBe(true);
    });

    it('rejects string amounts', () => {
        expect(HistoryEntrySchema.safeParse({ ...entry, amount: '-32' }).success).toBe(false);
    });
});

describe('BillsortConfigSchema', () => {
    it('fills every default from an empty document', () => {
        const config = BillsortConfigSchema.parse({});
        expect(config.files).toEqual({ rules_file: 'bill_rules.json', history_file: 'bill_history.json' });
        expect(config.limits).toEqual({ max_rules: 50000, max_history: 5000 });
        expect(config.categories.base_categories).toEqual(DEFAULT_BASE_CATEGORIES);
        expect(config.categories.special_types).toEqual(DEFAULT_SPECIAL_TYPES);
    });

    it('keeps partial overrides and defaults the rest', () => {
        const config = BillsortConfigSchema.parse({ limits: { max_rules: 10 } });
        expect(config.limits).toEqual({ max_rules: 10, max_history: 5000 });
    });

    it('does not share default arrays between parses', () => {
        const first = BillsortConfigSchema.parse({});
        first.categories.base_categories.push('自定义');
        const second = BillsortConfigSchema.parse({});
        expect(second.categories.base_categories).toEqual(DEFAULT_BASE_CATEGORIES);
    });

    it('rejects non-positive limits', () => {
        expect(BillsortConfigSchema.safeParse({ limits: { max_history: 0 } }).success).toBe(false);
    });
});

describe('RulesDocumentSchema', () => {
    it('accepts legacy documents without manual edits', () => {
        const doc = RulesDocumentSchema.parse({ version: '2.0', rules: { '星巴克': ['餐饮', 1] } });
        expect(doc.manual_edited_rules).toEqual([]);
    });

    it('keeps the parsed rules object with its own keys', () => {
        const raw = JSON.parse('{"rules": {"__proto__": ["其他", 1]}}');
        const doc = RulesDocumentSchema.parse(raw);
        expect(Object.keys(doc.rules)).toEqual(['__proto__']);
    });

    it('rejects a list as rules', () => {
        expect(RulesDocumentSchema.safeParse({ rules: [] }).success).toBe(false);
    });
});

describe('DecisionSchema', () => {
    it('defaults manual_correction to false', () => {
        const decision = DecisionSchema.parse({
            merchant: '星巴克',
            category: '餐饮',
            person: '家庭公用',
            bill_source: '微信',
            amount: -32,
        });
        expect(decision.manual_correction).toBe(false);
        expect(decision.prior_category).toBeUndefined();
    });
});
