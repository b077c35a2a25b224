import { describe, it, expect, vi, afterEach } from 'vitest';
import { TokenBudget, InvalidConfigError, InvalidDeltaError, OverBudgetError } from '../index.js';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('TokenBudget', () => {
    it('starts empty', () => {
        const budget = new TokenBudget(10_000);
        expect(budget.total).toBe(10_000);
        expect(budget.used).toBe(0);
        expect(budget.remaining).toBe(10_000);
        expect(budget.usageRatio).toBe(0);
    });

    it('update adds exactly delta', () => {
        const budget = new TokenBudget(10_000);
        const result = budget.update(1_000);
        expect(result).toEqual({ applied: 1_000, overflow: 0, overBudget: false });
        expect(budget.used).toBe(1_000);
        expect(budget.remaining).toBe(9_000);
    });

    it('recomputes usage ratio on every read', () => {
        const budget = new TokenBudget(200_000);
        budget.update(50_000);
        expect(budget.usageRatio).toBe(0.25);
        budget.update(50_000);
        expect(budget.usageRatio).toBe(0.5);
    });

    it.each([
        [100_000, 'OK'],
        [139_999, 'OK'],
        [140_000, 'WARNING'],
        [150_000, 'WARNING'],
        [180_000, 'CRITICAL'],
        [190_000, 'CRITICAL'],
    ] as const)('classifies %i / 200000 as %s', (used, expected) => {
        const budget = new TokenBudget(200_000);
        budget.update(used);
        expect(budget.getStatus().status).toBe(expected);
    });

    it('getStatus is a pure snapshot', () => {
        const budget = new TokenBudget(200_000);
        budget.update(150_000);
        const first = budget.getStatus();
        const second = budget.getStatus();
        expect(first).toEqual({ status: 'WARNING', total: 200_000, used: 150_000, remaining: 50_000, usageRatio: 0.75 });
        expect(second).toEqual(first);
        expect(budget.used).toBe(150_000);
    });

    it('honours custom thresholds', () => {
        const budget = new TokenBudget(1_000, { warningThreshold: 0.5, criticalThreshold: 0.8 });
        budget.update(600);
        expect(budget.getLevel()).toBe('WARNING');
        budget.update(200);
        expect(budget.getLevel()).toBe('CRITICAL');
    });

    it('warning / critical flags', () => {
        const budget = new TokenBudget(10_000);
        budget.update(7_500);
        expect(budget.isWarning()).toBe(true);
        expect(budget.isCritical()).toBe(false);
        budget.update(2_000);
        expect(budget.isWarning()).toBe(true);
        expect(budget.isCritical()).toBe(true);
    });

    it('describes itself for the report', () => {
        const budget = new TokenBudget(10_000);
        expect(budget.describe()).toBe('OK: 10000 tokens remaining');
        budget.update(9_500);
        expect(budget.describe()).toBe('CRITICAL: 500 tokens remaining');
    });

    describe('invalid deltas', () => {
        it('rejects negative delta without mutating', () => {
            const budget = new TokenBudget(1_000);
            budget.update(100);
            expect(() => budget.update(-5)).toThrow(InvalidDeltaError);
            expect(budget.used).toBe(100);
        });

        it('rejects fractional delta', () => {
            const budget = new TokenBudget(1_000);
            expect(() => budget.update(1.5)).toThrow(InvalidDeltaError);
            expect(budget.used).toBe(0);
        });
    });

    describe('overrun', () => {
        it('clamps to total and reports overflow by default', () => {
            vi.spyOn(console, 'warn').mockImplementation(() => { });
            const budget = new TokenBudget(1_000);
            budget.update(900);
            const result = budget.update(300);
            expect(result).toEqual({ applied: 100, overflow: 200, overBudget: true });
            expect(budget.used).toBe(1_000);
            expect(budget.remaining).toBe(0);
            expect(budget.getOverflow()).toBe(200);
            expect(budget.isExhausted()).toBe(true);
            expect(budget.getLevel()).toBe('CRITICAL');
        });

        it('logs a warning when clamping', () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });
            const budget = new TokenBudget(10);
            budget.update(15);
            expect(warn).toHaveBeenCalledWith(
                '[Budget] Token budget overrun, usage clamped to total {"requested":15,"dropped":5,"total":10}',
            );
        });

        it('rejects without mutating under the reject policy', () => {
            const budget = new TokenBudget(1_000, { overrunPolicy: 'reject' });
            budget.update(900);
            expect(() => budget.update(300)).toThrow(OverBudgetError);
            expect(budget.used).toBe(900);
            expect(budget.getOverflow()).toBe(0);
        });

        it('spending exactly the remainder is not an overrun', () => {
            const budget = new TokenBudget(1_000, { overrunPolicy: 'reject' });
            expect(budget.update(1_000).overBudget).toBe(false);
            expect(budget.isExhausted()).toBe(true);
        });
    });

    describe('construction', () => {
        it.each([0, -10, 1.5])('rejects total %s', (total) => {
            expect(() => new TokenBudget(total)).toThrow(InvalidConfigError);
        });

        it('rejects warning >= critical', () => {
            expect(() => new TokenBudget(100, { warningThreshold: 0.9, criticalThreshold: 0.7 })).toThrow(InvalidConfigError);
            expect(() => new TokenBudget(100, { warningThreshold: 0.8, criticalThreshold: 0.8 })).toThrow(InvalidConfigError);
        });

        it('rejects out-of-range thresholds', () => {
            expect(() => new TokenBudget(100, { warningThreshold: 0 })).toThrow(InvalidConfigError);
            expect(() => new TokenBudget(100, { criticalThreshold: 1.2 })).toThrow(InvalidConfigError);
        });

        it('accepts critical = 1.0', () => {
            const budget = new TokenBudget(100, { criticalThreshold: 1 });
            budget.update(99);
            expect(budget.getLevel()).toBe('WARNING');
            budget.update(1);
            expect(budget.getLevel()).toBe('CRITICAL');
        });
    });
});
