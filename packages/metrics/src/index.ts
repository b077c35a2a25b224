/**
 * @tokenpilot/metrics — Telemetry Collector
 *
 * Ring buffer of metric events + counters + gauges.
 * Подписчики получают события синхронно, по имени или по wildcard.
 */

import { createLogger, errorMessage, type BudgetStatus, type TaskSummary } from '@tokenpilot/core';

export interface MetricEvent {
    name: string;
    value: number;
    tags: Record<string, string>;
    timestamp: number;
}

export type MetricHandler = (event: MetricEvent) => void;

export interface DashboardData {
    counters: Record<string, number>;
    gauges: Record<string, number>;
    recentMetrics: MetricEvent[];
}

export interface TelemetryOptions {
    maxMetrics?: number;
    now?: () => number;
}

const DASHBOARD_RECENT = 100;

const log = createLogger('Telemetry');

export class TelemetryCollector {
    private buffer: MetricEvent[] = [];
    private maxMetrics: number;
    private handlers: Map<string, MetricHandler[]> = new Map();
    private counters: Map<string, number> = new Map();
    private gauges: Map<string, number> = new Map();
    private now: () => number;

    constructor(options: TelemetryOptions = {}) {
        this.maxMetrics = options.maxMetrics ?? 10_000;
        this.now = options.now ?? Date.now;
    }

    recordMetric(name: string, value: number, tags: Record<string, string> = {}): void {
        const event: MetricEvent = { name, value, tags, timestamp: this.now() };

        if (this.buffer.length >= this.maxMetrics) {
            this.buffer.shift();
        }
        this.buffer.push(event);

        for (const [pattern, handlers] of this.handlers) {
            if (this.matches(name, pattern)) {
                for (const handler of handlers) {
                    try {
                        handler(event);
                    } catch (err) {
                        log.error(`Metric handler for "${pattern}" failed`, { metric: name, error: errorMessage(err) });
                    }
                }
            }
        }
    }

    /** `*` = everything, `prefix.*` = one group */
    on(pattern: string, handler: MetricHandler): void {
        const existing = this.handlers.get(pattern) ?? [];
        existing.push(handler);
        this.handlers.set(pattern, existing);
    }

    incrementCounter(name: string, delta = 1): number {
        const value = (this.counters.get(name) ?? 0) + delta;
        this.counters.set(name, value);
        return value;
    }

    getCounter(name: string): number {
        return this.counters.get(name) ?? 0;
    }

    setGauge(name: string, value: number): void {
        this.gauges.set(name, value);
    }

    getGauge(name: string): number | undefined {
        return this.gauges.get(name);
    }

    /** Events grouped by the first segment of the name */
    snapshot(): Record<string, MetricEvent[]> {
        const groups: Record<string, MetricEvent[]> = {};
        for (const event of this.buffer) {
            const prefix = event.name.split('.')[0];
            if (!groups[prefix]) groups[prefix] = [];
            groups[prefix].push(event);
        }
        return groups;
    }

    recent(count = 10): MetricEvent[] {
        return this.buffer.slice(-count);
    }

    size(): number {
        return this.buffer.length;
    }

    /** Drops events, counters and gauges; subscriptions stay */
    clear(): void {
        this.buffer = [];
        this.counters.clear();
        this.gauges.clear();
    }

    getDashboardData(): DashboardData {
        return {
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            recentMetrics: this.recent(DASHBOARD_RECENT),
        };
    }

    private matches(name: string, pattern: string): boolean {
        if (pattern === '*') return true;
        if (pattern.endsWith('.*')) {
            return name.startsWith(pattern.slice(0, -1));
        }
        return name === pattern;
    }
}

// --- Collectors ---

/** Call after every budget update */
export function emitBudgetMetrics(collector: TelemetryCollector, status: BudgetStatus): void {
    collector.recordMetric('budget.used', status.used, { status: status.status });
    collector.recordMetric('budget.remaining', status.remaining, { status: status.status });
    collector.setGauge('budget.usage_ratio', status.usageRatio);
}

export function emitTaskMetrics(collector: TelemetryCollector, summary: TaskSummary): void {
    collector.setGauge('tasks.total', summary.total);
    collector.setGauge('tasks.pending', summary.pending);
    collector.setGauge('tasks.in_progress', summary.inProgress);
    collector.setGauge('tasks.completed', summary.completed);
    collector.setGauge('tasks.failed', summary.failed);
}
