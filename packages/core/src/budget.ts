/**
 * @tokenpilot/core — Token Budget
 *
 * Tracks consumption against a fixed total and classifies usage:
 * OK below the warning threshold, WARNING up to the critical one, CRITICAL above.
 * Invariant: 0 <= used <= total. Overrun is clamped (default) or rejected.
 */

import {
    DEFAULT_CRITICAL_THRESHOLD,
    DEFAULT_WARNING_THRESHOLD,
    type OverrunPolicy,
} from './config.js';
import { InvalidConfigError, InvalidDeltaError, OverBudgetError } from './errors.js';
import { createLogger } from './logger.js';

export type BudgetLevel = 'OK' | 'WARNING' | 'CRITICAL';

export interface BudgetThresholds {
    warning: number;
    critical: number;
}

export interface TokenBudgetOptions {
    warningThreshold?: number;
    criticalThreshold?: number;
    overrunPolicy?: OverrunPolicy;
}

export interface BudgetStatus {
    status: BudgetLevel;
    total: number;
    used: number;
    remaining: number;
    usageRatio: number;
}

export interface BudgetUpdate {
    /** tokens actually added to `used` */
    applied: number;
    /** tokens dropped by clamping on this call */
    overflow: number;
    overBudget: boolean;
}

const log = createLogger('Budget');

export function validateThresholds(warning: number, critical: number): void {
    const issues: string[] = [];
    if (!(warning > 0)) issues.push(`warningThreshold must be > 0 (got ${warning})`);
    if (!(critical <= 1)) issues.push(`criticalThreshold must be <= 1 (got ${critical})`);
    if (!(warning < critical)) issues.push(`warningThreshold (${warning}) must be below criticalThreshold (${critical})`);
    if (issues.length > 0) throw new InvalidConfigError(issues);
}

export class TokenBudget {
    readonly total: number;
    private spent = 0;
    private overflow = 0;
    private readonly thresholds: BudgetThresholds;
    private readonly overrunPolicy: OverrunPolicy;

    constructor(total: number, options: TokenBudgetOptions = {}) {
        if (!Number.isInteger(total) || total <= 0) {
            throw new InvalidConfigError([`total must be a positive integer (got ${total})`]);
        }
        const warning = options.warningThreshold ?? DEFAULT_WARNING_THRESHOLD;
        const critical = options.criticalThreshold ?? DEFAULT_CRITICAL_THRESHOLD;
        validateThresholds(warning, critical);

        this.total = total;
        this.thresholds = { warning, critical };
        this.overrunPolicy = options.overrunPolicy ?? 'clamp';
    }

    get used(): number {
        return this.spent;
    }

    get remaining(): number {
        return this.total - this.spent;
    }

    get usageRatio(): number {
        return this.spent / this.total;
    }

    /** Add consumption. Negative or fractional deltas are rejected untouched. */
    update(delta: number): BudgetUpdate {
        if (!Number.isInteger(delta) || delta < 0) {
            throw new InvalidDeltaError(delta);
        }

        const remaining = this.remaining;
        if (delta <= remaining) {
            this.spent += delta;
            return { applied: delta, overflow: 0, overBudget: false };
        }

        if (this.overrunPolicy === 'reject') {
            throw new OverBudgetError(delta, remaining);
        }

        const dropped = delta - remaining;
        this.spent = this.total;
        this.overflow += dropped;
        log.warn('Token budget overrun, usage clamped to total', { requested: delta, dropped, total: this.total });
        return { applied: remaining, overflow: dropped, overBudget: true };
    }

    getLevel(): BudgetLevel {
        const ratio = this.usageRatio;
        if (ratio >= this.thresholds.critical) return 'CRITICAL';
        if (ratio >= this.thresholds.warning) return 'WARNING';
        return 'OK';
    }

    getStatus(): BudgetStatus {
        return {
            status: this.getLevel(),
            total: this.total,
            used: this.spent,
            remaining: this.remaining,
            usageRatio: this.usageRatio,
        };
    }

    /** Report line: "WARNING: 50000 tokens remaining" */
    describe(): string {
        return `${this.getLevel()}: ${this.remaining} tokens remaining`;
    }

    isWarning(): boolean {
        return this.usageRatio >= this.thresholds.warning;
    }

    isCritical(): boolean {
        return this.usageRatio >= this.thresholds.critical;
    }

    isExhausted(): boolean {
        return this.spent >= this.total;
    }

    /** Total tokens dropped by clamping over the budget's lifetime */
    getOverflow(): number {
        return this.overflow;
    }

    getThresholds(): BudgetThresholds {
        return { ...this.thresholds };
    }

    getOverrunPolicy(): OverrunPolicy {
        return this.overrunPolicy;
    }
}
