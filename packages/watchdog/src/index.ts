/**
 * @tokenpilot/watchdog — Self-Healing
 *
 * Periodic health checks, auto-restart hooks, safe mode after repeated failures.
 */

import { createLogger, errorMessage } from '@tokenpilot/core';

export interface HealthTarget {
    name: string;
    check: () => Promise<boolean> | boolean;
    restart?: () => Promise<void> | void;
}

export interface HealthStatus {
    healthy: boolean;
    component: string;
    message: string;
    timestamp: number;
}

export interface ComponentHealth {
    healthy: boolean;
    message: string;
    lastCheck: number;
}

export interface HealthReport {
    overallHealthy: boolean;
    safeMode: boolean;
    components: Record<string, ComponentHealth>;
}

export interface WatchdogConfig {
    maxFailures: number;
    maxHistory: number;
    /** entries scanned by getHealthReport */
    reportWindow: number;
    now: () => number;
}

const log = createLogger('Watchdog');

export class Watchdog {
    private targets: Map<string, HealthTarget> = new Map();
    private failCounts: Map<string, number> = new Map();
    private history: HealthStatus[] = [];
    private safeMode = false;
    private checking = false;
    private intervalId: ReturnType<typeof setInterval> | null = null;
    private config: WatchdogConfig;

    constructor(config?: Partial<WatchdogConfig>) {
        this.config = {
            maxFailures: config?.maxFailures ?? 3,
            maxHistory: config?.maxHistory ?? 500,
            reportWindow: config?.reportWindow ?? 50,
            now: config?.now ?? Date.now,
        };
    }

    register(target: HealthTarget): void {
        this.targets.set(target.name, target);
        this.failCounts.set(target.name, 0);
    }

    async runChecks(): Promise<Map<string, HealthStatus>> {
        const results = new Map<string, HealthStatus>();

        for (const [name, target] of this.targets) {
            let healthy: boolean;
            let message: string;
            try {
                healthy = await target.check();
                message = healthy ? 'OK' : 'Check failed';
            } catch (err) {
                healthy = false;
                message = `Check error: ${errorMessage(err)}`;
                log.error(`Health check "${name}" threw`, { error: errorMessage(err) });
            }

            const status: HealthStatus = { healthy, component: name, message, timestamp: this.config.now() };
            results.set(name, status);
            this.pushHistory(status);

            if (healthy) this.failCounts.set(name, 0);
            else await this.handleFailure(name);
        }

        return results;
    }

    getHealthReport(): HealthReport {
        const components: Record<string, ComponentHealth> = {};
        for (const status of this.history.slice(-this.config.reportWindow)) {
            components[status.component] = {
                healthy: status.healthy,
                message: status.message,
                lastCheck: status.timestamp,
            };
        }

        return {
            overallHealthy: Object.values(components).every((c) => c.healthy),
            safeMode: this.safeMode,
            components,
        };
    }

    getHistory(): HealthStatus[] {
        return [...this.history];
    }

    getFailureCount(name: string): number {
        return this.failCounts.get(name) ?? 0;
    }

    activateSafeMode(): void {
        if (!this.safeMode) log.warn('Safe mode activated');
        this.safeMode = true;
    }

    deactivateSafeMode(): void {
        this.safeMode = false;
        for (const name of this.failCounts.keys()) this.failCounts.set(name, 0);
        log.info('Safe mode deactivated');
    }

    isSafeMode(): boolean {
        return this.safeMode;
    }

    start(intervalMs = 30_000): void {
        if (this.intervalId) return;
        this.intervalId = setInterval(() => {
            // skip a tick while the previous round is still running
            if (this.checking) return;
            this.checking = true;
            void this.runChecks().finally(() => {
                this.checking = false;
            });
        }, intervalMs);
        log.info(`Monitoring started (every ${intervalMs}ms)`);
    }

    stop(): void {
        if (this.intervalId) {
            clearInterval(this.intervalId);
            this.intervalId = null;
            log.info('Monitoring stopped');
        }
    }

    isRunning(): boolean {
        return this.intervalId !== null;
    }

    private pushHistory(status: HealthStatus): void {
        this.history.push(status);
        if (this.history.length > this.config.maxHistory) {
            this.history.splice(0, this.history.length - this.config.maxHistory);
        }
    }

    private async handleFailure(name: string): Promise<void> {
        const count = (this.failCounts.get(name) ?? 0) + 1;
        this.failCounts.set(name, count);

        const target = this.targets.get(name);
        if (count <= this.config.maxFailures && target?.restart) {
            try {
                await target.restart();
                log.info(`Restarted "${name}" (failure ${count}/${this.config.maxFailures})`);
            } catch (err) {
                log.error(`Restart of "${name}" failed`, { error: errorMessage(err) });
            }
        } else if (count > this.config.maxFailures) {
            this.activateSafeMode();
        }
    }
}

export function createWatchdog(config?: Partial<WatchdogConfig>): Watchdog {
    return new Watchdog(config);
}
