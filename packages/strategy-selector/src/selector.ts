/**
 * @tokenpilot/strategy-selector — StrategySelector
 *
 * Picks a strategy from recorded outcomes:
 *   score = successRate·0.6 + speed·0.2 + diversity·0.2
 * speed = 1 / (avg seconds + 0.1), diversity = 1 for a new strategy, 0.5 for a repeat.
 * Repeating a strategy that just failed costs ×0.3.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidConfigError, UnknownStrategyError, createLogger } from '@tokenpilot/core';

export interface ExecutionContext {
    taskType: string;
    /** 0–1 */
    complexity: number;
    timeConstraintMs?: number;
    /** remaining / total, 0–1 */
    tokenBudgetRemaining: number;
    validationErrors: number;
    previousStrategy?: string;
    previousFailed?: boolean;
}

export interface StrategyPerformance {
    successCount: number;
    failureCount: number;
    totalDurationMs: number;
}

export interface StrategyReport {
    successRate: number;
    successCount: number;
    failureCount: number;
    avgDurationMs: number;
}

const PerformanceSchema = z.object({
    successCount: z.number().int().nonnegative(),
    failureCount: z.number().int().nonnegative(),
    totalDurationMs: z.number().nonnegative(),
});

const SelectorStateSchema = z.object({
    strategies: z.array(z.string().min(1)).min(1),
    performance: z.record(PerformanceSchema),
});

export type SelectorState = z.infer<typeof SelectorStateSchema>;

const log = createLogger('Selector');

export function successRate(perf: StrategyPerformance): number {
    const runs = perf.successCount + perf.failureCount;
    return runs > 0 ? perf.successCount / runs : 0;
}

export function avgDurationMs(perf: StrategyPerformance): number {
    const runs = perf.successCount + perf.failureCount;
    return runs > 0 ? perf.totalDurationMs / runs : 0;
}

export class StrategySelector {
    readonly strategies: readonly string[];
    private performance: Map<string, StrategyPerformance> = new Map();

    constructor(strategies: readonly string[]) {
        if (strategies.length === 0) {
            throw new InvalidConfigError(['strategy selector needs at least one strategy']);
        }
        this.strategies = [...strategies];
        for (const name of strategies) {
            this.performance.set(name, { successCount: 0, failureCount: 0, totalDurationMs: 0 });
        }
    }

    scoreStrategy(strategy: string, context: ExecutionContext): number {
        const perf = this.getPerformance(strategy);
        const speed = 1 / (avgDurationMs(perf) / 1000 + 0.1);
        const diversity = strategy !== context.previousStrategy ? 1 : 0.5;
        let score = successRate(perf) * 0.6 + speed * 0.2 + diversity * 0.2;
        if (context.previousFailed && strategy === context.previousStrategy) score *= 0.3;
        return score;
    }

    selectStrategy(context: ExecutionContext, exclude: readonly string[] = []): string {
        const candidates = this.strategies.filter((s) => !exclude.includes(s));
        if (candidates.length === 0) {
            log.warn('No available strategies, using first', { strategy: this.strategies[0] });
            return this.strategies[0];
        }

        let best = candidates[0];
        let bestScore = this.scoreStrategy(best, context);
        for (const candidate of candidates.slice(1)) {
            const score = this.scoreStrategy(candidate, context);
            if (score > bestScore) {
                best = candidate;
                bestScore = score;
            }
        }

        log.debug('Strategy selected', { strategy: best, score: Number(bestScore.toFixed(3)) });
        return best;
    }

    recordOutcome(strategy: string, success: boolean, durationMs: number): void {
        const perf = this.getPerformance(strategy);
        if (success) perf.successCount++;
        else perf.failureCount++;
        perf.totalDurationMs += durationMs;
    }

    getPerformance(strategy: string): StrategyPerformance {
        const perf = this.performance.get(strategy);
        if (!perf) throw new UnknownStrategyError(strategy);
        return perf;
    }

    getPerformanceReport(): Record<string, StrategyReport> {
        const report: Record<string, StrategyReport> = {};
        for (const [name, perf] of this.performance) {
            report[name] = {
                successRate: successRate(perf),
                successCount: perf.successCount,
                failureCount: perf.failureCount,
                avgDurationMs: avgDurationMs(perf),
            };
        }
        return report;
    }

    toJSON(): SelectorState {
        const performance: Record<string, StrategyPerformance> = {};
        for (const [name, perf] of this.performance) performance[name] = { ...perf };
        return { strategies: [...this.strategies], performance };
    }

    static fromJSON(input: unknown): StrategySelector {
        const parsed = SelectorStateSchema.safeParse(input);
        if (!parsed.success) {
            throw new InvalidConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
        }
        const selector = new StrategySelector(parsed.data.strategies);
        for (const [name, perf] of Object.entries(parsed.data.performance)) {
            const target = selector.performance.get(name);
            if (target) Object.assign(target, perf);
        }
        return selector;
    }

    async save(path: string): Promise<void> {
        await writeFile(path, JSON.stringify(this.toJSON(), null, 2), 'utf-8');
        log.info(`Selector state saved to ${path}`);
    }

    static async load(path: string): Promise<StrategySelector> {
        const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
        const selector = StrategySelector.fromJSON(raw);
        log.info(`Selector state loaded from ${path}`);
        return selector;
    }
}
