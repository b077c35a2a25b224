/**
 * @tokenpilot/strategy-selector — AdaptiveStrategyManager
 *
 * One selector per domain (search, navigation, ... or any custom name).
 */

import { UnknownStrategyError, createLogger, type StrategyEngine } from '@tokenpilot/core';
import { StrategySelector, type ExecutionContext } from './selector.js';

export interface GlobalStats {
    totalExecutions: number;
    totalSuccesses: number;
}

const log = createLogger('Selector');

export class AdaptiveStrategyManager {
    private selectors: Map<string, StrategySelector> = new Map();
    private stats: GlobalStats = { totalExecutions: 0, totalSuccesses: 0 };

    registerSelector(domain: string, strategies: readonly string[]): StrategySelector {
        const selector = new StrategySelector(strategies);
        this.selectors.set(domain, selector);
        log.info(`Registered selector for domain: ${domain}`);
        return selector;
    }

    /** Register every category of the engine as a domain */
    registerEngine(engine: StrategyEngine): void {
        for (const category of engine.getCategories()) {
            this.registerSelector(category, engine.getStrategies(category));
        }
    }

    selectStrategy(domain: string, context: ExecutionContext, exclude: readonly string[] = []): string {
        const selector = this.selectors.get(domain);
        if (!selector) throw new UnknownStrategyError(domain);
        return selector.selectStrategy(context, exclude);
    }

    /** Outcomes for unregistered domains are dropped */
    recordOutcome(domain: string, strategy: string, success: boolean, durationMs: number): void {
        const selector = this.selectors.get(domain);
        if (!selector) return;

        selector.recordOutcome(strategy, success, durationMs);
        this.stats.totalExecutions++;
        if (success) this.stats.totalSuccesses++;
    }

    getSelector(domain: string): StrategySelector | undefined {
        return this.selectors.get(domain);
    }

    getDomains(): string[] {
        return [...this.selectors.keys()];
    }

    getGlobalStats(): GlobalStats {
        return { ...this.stats };
    }
}
