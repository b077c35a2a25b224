/**
 * @tokenpilot/core — Strategy Engine
 *
 * Static strategy catalogue per category + backtracking predicate.
 */

import { InvalidConfigError } from './errors.js';

export const STRATEGIES = {
    search: [
        'direct_search',
        'filtered_search',
        'category_navigation',
        'advanced_filters',
        'alternative_keywords',
    ],
    navigation: [
        'direct_link',
        'menu_navigation',
        'breadcrumb_path',
        'search_and_click',
        'url_manipulation',
    ],
    interaction: [
        'click',
        'form_fill',
        'search',
        'scroll',
        'wait',
        'navigate',
    ],
} as const satisfies Record<string, readonly string[]>;

export type StrategyCategory = keyof typeof STRATEGIES;

export const DEFAULT_BACKTRACK_THRESHOLD = 3;

export function isStrategyCategory(value: string): value is StrategyCategory {
    return Object.prototype.hasOwnProperty.call(STRATEGIES, value);
}

export class StrategyEngine {
    readonly maxAttemptsBeforeBacktrack: number;

    constructor(maxAttemptsBeforeBacktrack = DEFAULT_BACKTRACK_THRESHOLD) {
        if (!Number.isInteger(maxAttemptsBeforeBacktrack) || maxAttemptsBeforeBacktrack <= 0) {
            throw new InvalidConfigError([`backtrack threshold must be a positive integer (got ${maxAttemptsBeforeBacktrack})`]);
        }
        this.maxAttemptsBeforeBacktrack = maxAttemptsBeforeBacktrack;
    }

    getCategories(): StrategyCategory[] {
        return Object.keys(STRATEGIES).filter(isStrategyCategory);
    }

    getStrategies(category: StrategyCategory): string[] {
        return [...STRATEGIES[category]];
    }

    getSearchStrategies(): string[] {
        return this.getStrategies('search');
    }

    getNavigationStrategies(): string[] {
        return this.getStrategies('navigation');
    }

    /** true once attempts reach the ceiling */
    shouldBacktrack(attempts: number): boolean {
        return attempts >= this.maxAttemptsBeforeBacktrack;
    }

    /** First strategy of the category not yet tried */
    nextStrategy(category: StrategyCategory, tried: readonly string[]): string | undefined {
        return STRATEGIES[category].find((s) => !tried.includes(s));
    }
}
