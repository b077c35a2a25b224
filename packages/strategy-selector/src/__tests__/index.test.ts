import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidConfigError, StrategyEngine, UnknownStrategyError } from '@tokenpilot/core';
import { AdaptiveStrategyManager, StrategySelector, type ExecutionContext } from '../index.js';

const ctx = (overrides: Partial<ExecutionContext> = {}): ExecutionContext => ({
    taskType: 'search',
    complexity: 0.5,
    tokenBudgetRemaining: 0.8,
    validationErrors: 0,
    ...overrides,
});

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => { });
    vi.spyOn(console, 'warn').mockImplementation(() => { });
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('StrategySelector', () => {
    it('requires at least one strategy', () => {
        expect(() => new StrategySelector([])).toThrow(InvalidConfigError);
    });

    it('ties resolve to list order', () => {
        const selector = new StrategySelector(['a', 'b', 'c']);
        expect(selector.scoreStrategy('a', ctx())).toBeCloseTo(2.2);
        expect(selector.selectStrategy(ctx())).toBe('a');
    });

    it('penalises repeating a failed strategy', () => {
        const selector = new StrategySelector(['a', 'b']);
        expect(selector.scoreStrategy('a', ctx({ previousStrategy: 'a', previousFailed: true }))).toBeCloseTo(0.63);
        expect(selector.selectStrategy(ctx({ previousStrategy: 'a', previousFailed: true }))).toBe('b');
    });

    it('prefers the strategy with the better record', () => {
        const selector = new StrategySelector(['a', 'b', 'c']);
        selector.recordOutcome('a', true, 1_000);
        selector.recordOutcome('b', false, 1_000);
        selector.recordOutcome('c', false, 1_000);

        expect(selector.scoreStrategy('a', ctx())).toBeCloseTo(0.6 + 0.2 / 1.1 + 0.2);
        expect(selector.selectStrategy(ctx())).toBe('a');
        expect(selector.selectStrategy(ctx(), ['a'])).toBe('b');
    });

    it('prefers faster strategies at equal success', () => {
        const selector = new StrategySelector(['slow', 'fast']);
        selector.recordOutcome('slow', true, 2_000);
        selector.recordOutcome('fast', true, 100);
        expect(selector.selectStrategy(ctx())).toBe('fast');
    });

    it('falls back to the first strategy when everything is excluded', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });
        const selector = new StrategySelector(['a', 'b']);
        expect(selector.selectStrategy(ctx(), ['a', 'b'])).toBe('a');
        expect(warn).toHaveBeenCalledWith('[Selector] No available strategies, using first {"strategy":"a"}');
    });

    it('rejects outcomes for unknown strategies', () => {
        const selector = new StrategySelector(['a']);
        expect(() => selector.recordOutcome('z', true, 10)).toThrow(UnknownStrategyError);
    });

    it('reports success rate and average duration', () => {
        const selector = new StrategySelector(['a', 'b']);
        selector.recordOutcome('a', true, 1_000);
        selector.recordOutcome('a', false, 3_000);
        expect(selector.getPerformanceReport()).toEqual({
            a: { successRate: 0.5, successCount: 1, failureCount: 1, avgDurationMs: 2_000 },
            b: { successRate: 0, successCount: 0, failureCount: 0, avgDurationMs: 0 },
        });
    });

    describe('persistence', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'tokenpilot-selector-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('save → load keeps history', async () => {
            const selector = new StrategySelector(['a', 'b']);
            selector.recordOutcome('b', true, 500);
            const file = join(dir, 'selector.json');

            await selector.save(file);
            const loaded = await StrategySelector.load(file);

            expect(loaded.strategies).toEqual(['a', 'b']);
            expect(loaded.getPerformanceReport()).toEqual(selector.getPerformanceReport());
        });

        it('rejects malformed state', async () => {
            const file = join(dir, 'bad.json');
            await writeFile(file, JSON.stringify({ strategies: [], performance: {} }), 'utf-8');
            await expect(StrategySelector.load(file)).rejects.toThrow(InvalidConfigError);
        });
    });
});

describe('AdaptiveStrategyManager', () => {
    it('selects per domain', () => {
        const manager = new AdaptiveStrategyManager();
        manager.registerSelector('checkout', ['guest', 'login']);
        expect(manager.selectStrategy('checkout', ctx())).toBe('guest');
    });

    it('unknown domain throws on select', () => {
        const manager = new AdaptiveStrategyManager();
        expect(() => manager.selectStrategy('missing', ctx())).toThrow(UnknownStrategyError);
    });

    it('ignores outcomes for unknown domains', () => {
        const manager = new AdaptiveStrategyManager();
        manager.recordOutcome('missing', 'x', true, 10);
        expect(manager.getGlobalStats()).toEqual({ totalExecutions: 0, totalSuccesses: 0 });
    });

    it('tracks global stats', () => {
        const manager = new AdaptiveStrategyManager();
        manager.registerSelector('search', ['direct_search', 'filtered_search']);
        manager.recordOutcome('search', 'direct_search', true, 100);
        manager.recordOutcome('search', 'filtered_search', false, 100);
        manager.recordOutcome('search', 'direct_search', true, 100);
        expect(manager.getGlobalStats()).toEqual({ totalExecutions: 3, totalSuccesses: 2 });
        expect(manager.getSelector('search')?.getPerformanceReport().direct_search.successCount).toBe(2);
    });

    it('registers every engine category', () => {
        const manager = new AdaptiveStrategyManager();
        manager.registerEngine(new StrategyEngine());
        expect(manager.getDomains()).toEqual(['search', 'navigation', 'interaction']);
        expect(manager.selectStrategy('navigation', ctx())).toBe('direct_link');
    });
});
