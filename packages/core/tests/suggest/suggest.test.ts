import { describe, it, expect } from 'vitest';
import { suggest, matchSpecialType } from '../../src/suggest/suggest.js';
import type { SuggestContext } from '../../src/suggest/suggest.js';
import { RuleStore } from '../../src/store/rule-store.js';
import { PrefixIndex } from '../../src/store/prefix-index.js';
import type { Rule } from '../../src/types/index.js';

const specialTypes = {
    '转账': '人情往来',
    '微信红包': '人情往来',
    'Refund': '退款',
};

function context(rules: Rule[]): SuggestContext {
    const store = RuleStore.from(rules, [], 100);
    return { rules: store, index: PrefixIndex.build(store.merchants()), specialTypes };
}

describe('matchSpecialType', () => {
    it('returns the first configured keyword contained in the type', () => {
        expect(matchSpecialType('微信红包（单发）', specialTypes)).toEqual({ keyword: '微信红包', category: '人情往来' });
    });

    it('returns null when no keyword applies', () => {
        expect(matchSpecialType('商户消费', specialTypes)).toBeNull();
    });

    it('ignores empty keywords', () => {
        expect(matchSpecialType('商户消费', { '': '其他' })).toBeNull();
    });
});

describe('suggest', () => {
    it('returns an empty list for an empty store', () => {
        expect(suggest('星巴克', '商户消费', context([]))).toEqual([]);
    });

    it('special types win over any learned rule', () => {
        const ctx = context([{ merchant: '张三', category: '父母', usage_count: 9 }]);
        expect(suggest('张三', '转账', ctx)).toEqual([
            { category: '人情往来', reason: 'transaction type: 转账', source: 'special' },
        ]);
    });

    it('suggests the exact match', () => {
        const ctx = context([{ merchant: '星巴克', category: '餐饮', usage_count: 3 }]);
        expect(suggest('星巴克', '商户消费', ctx)).toEqual([
            { category: '餐饮', reason: 'exact match: 星巴克', source: 'exact' },
        ]);
    });

    it('keeps the exact-match reason when the fuzzy hit has the same category', () => {
        const ctx = context([
            { merchant: '星巴克', category: '餐饮', usage_count: 3 },
            { merchant: '星巴克咖啡', category: '餐饮', usage_count: 1 },
        ]);
        const result = suggest('星巴克咖啡', '商户消费', ctx);
        expect(result).toEqual([
            { category: '餐饮', reason: 'exact match: 星巴克咖啡', source: 'exact' },
        ]);
    });

    it('adds a fuzzy suggestion after the exact one when categories differ', () => {
        const ctx = context([
            { merchant: '星巴克', category: '娱乐', usage_count: 1 },
            { merchant: '星巴克咖啡', category: '餐饮', usage_count: 1 },
        ]);
        expect(suggest('星巴克咖啡', '商户消费', ctx)).toEqual([
            { category: '餐饮', reason: 'exact match: 星巴克咖啡', source: 'exact' },
            { category: '娱乐', reason: 'similar merchant: 星巴克', source: 'fuzzy' },
        ]);
    });

    it('matches when the query is contained in a known merchant', () => {
        const ctx = context([{ merchant: '美团外卖订单', category: '餐饮', usage_count: 1 }]);
        expect(suggest('美团外卖', '', ctx)).toEqual([
            { category: '餐饮', reason: 'similar merchant: 美团外卖订单', source: 'fuzzy' },
        ]);
    });

    it('stops at the first fuzzy hit in the bucket', () => {
        const ctx = context([
            { merchant: '美团外卖', category: '餐饮', usage_count: 1 },
            { merchant: '美团外卖超市', category: '水果&超市', usage_count: 5 },
        ]);
        expect(suggest('美团外卖超市店', '', ctx)).toEqual([
            { category: '餐饮', reason: 'similar merchant: 美团外卖', source: 'fuzzy' },
        ]);
    });

    it('matches prefixes case-insensitively but containment case-sensitively', () => {
        const ctx = context([{ merchant: 'Starbucks', category: 'dining', usage_count: 1 }]);
        expect(suggest('Starbucks Reserve', '', ctx)).toHaveLength(1);
        expect(suggest('STARBUCKS RESERVE', '', ctx)).toEqual([]);
    });

    it('does not fuzzy match merchants sharing only the prefix', () => {
        const ctx = context([{ merchant: '中国石化加油站', category: '汽车', usage_count: 1 }]);
        expect(suggest('中国石油', '', ctx)).toEqual([]);
    });

    it('skips fuzzy matching for names shorter than three characters', () => {
        const ctx = context([
            { merchant: 'KFC Shanghai', category: '餐饮', usage_count: 1 },
            { merchant: 'KF', category: '其他', usage_count: 1 },
        ]);
        expect(suggest('KF', '', ctx)).toEqual([
            { category: '其他', reason: 'exact match: KF', source: 'exact' },
        ]);
    });

    it('never matches a blank merchant', () => {
        const ctx = context([{ merchant: '   ', category: '其他', usage_count: 1 }]);
        expect(suggest('   ', '', ctx)).toEqual([]);
        expect(suggest('', '', ctx)).toEqual([]);
    });

    it('skips index entries whose rule is gone', () => {
        const store = RuleStore.from([{ merchant: '星巴克', category: '餐饮', usage_count: 1 }], [], 100);
        const index = PrefixIndex.build(['星巴克咖啡', '星巴克']);
        expect(suggest('星巴克咖啡店', '', { rules: store, index, specialTypes })).toEqual([
            { category: '餐饮', reason: 'similar merchant: 星巴克', source: 'fuzzy' },
        ]);
    });
});
