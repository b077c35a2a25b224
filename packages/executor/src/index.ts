/**
 * @tokenpilot/executor — Async Task Executor
 *
 * Priority queue + dependency gate + retry/timeout per task.
 * Each attempt re-invokes `run` with a fresh AbortSignal; timeouts abort the attempt.
 * Scheduling is event-driven: a slot frees → the queue is pumped again.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { DependencyError, TaskTimeoutError, createLogger } from '@tokenpilot/core';

export interface AsyncTask<T = unknown> {
    id: string;
    run: (signal: AbortSignal) => Promise<T>;
    /** higher runs first */
    priority?: number;
    timeoutMs?: number;
    maxAttempts?: number;
    retryDelayMs?: number;
    dependencies?: string[];
}

export interface ExecutorConfig {
    maxConcurrent: number;
}

export interface ExecutionSummary<T = unknown> {
    completed: Map<string, T>;
    failed: Map<string, Error>;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 1_000;

const log = createLogger('Executor');

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

export class AsyncExecutor<T = unknown> {
    private config: ExecutorConfig;
    private queue: AsyncTask<T>[] = [];
    private ids: Set<string> = new Set();
    private controllers: Set<AbortController> = new Set();
    private completed: Map<string, T> = new Map();
    private failed: Map<string, Error> = new Map();
    private running = 0;
    private closed = false;
    private stopper = new AbortController();
    private waiters: Array<() => void> = [];

    constructor(config?: Partial<ExecutorConfig>) {
        this.config = {
            maxConcurrent: config?.maxConcurrent ?? 10,
        };
    }

    submit(task: AsyncTask<T>): void {
        if (this.closed) throw new Error('Executor is shut down');
        if (this.ids.has(task.id)) throw new Error(`Task "${task.id}" already submitted`);
        this.ids.add(task.id);
        this.queue.push(task);
    }

    /** Run one task with its retry and timeout policy, outside the queue */
    async executeTask(task: AsyncTask<T>): Promise<T> {
        const maxAttempts = task.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
        const retryDelayMs = task.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
        let lastError: Error = new Error(`Task "${task.id}" was not attempted`);

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const controller = new AbortController();
            this.controllers.add(controller);
            try {
                return await this.attempt(task, controller);
            } catch (err) {
                lastError = toError(err);
                log.warn(`Task "${task.id}" attempt ${attempt}/${maxAttempts} failed`, { error: lastError.message });
            } finally {
                this.controllers.delete(controller);
            }

            if (this.closed) break;
            if (attempt < maxAttempts && retryDelayMs > 0) {
                try {
                    await delay(retryDelayMs, undefined, { signal: this.stopper.signal });
                } catch (err) {
                    if (!this.closed) throw err;
                }
                if (this.closed) break;
            }
        }

        throw lastError;
    }

    /** Drain the queue. Resolves once nothing is queued or running. */
    async run(): Promise<ExecutionSummary<T>> {
        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
            this.pump();
        });
        return { completed: new Map(this.completed), failed: new Map(this.failed) };
    }

    async executeParallel(tasks: AsyncTask<T>[]): Promise<ExecutionSummary<T>> {
        for (const task of tasks) this.submit(task);
        return this.run();
    }

    /** Abort running attempts, drop the queue, refuse new work */
    shutdown(): void {
        this.closed = true;
        this.queue = [];
        this.stopper.abort();
        for (const controller of this.controllers) controller.abort(new Error('Executor shut down'));
        log.info('Executor shut down');
        this.pump();
    }

    isShutdown(): boolean {
        return this.closed;
    }

    stats(): { queued: number; running: number; completed: number; failed: number } {
        return {
            queued: this.queue.length,
            running: this.running,
            completed: this.completed.size,
            failed: this.failed.size,
        };
    }

    // ─── Internals ───

    private attempt(task: AsyncTask<T>, controller: AbortController): Promise<T> {
        const timeoutMs = task.timeoutMs;
        if (timeoutMs === undefined) return task.run(controller.signal);

        return new Promise<T>((resolve, reject) => {
            const timer = setTimeout(() => {
                const err = new TaskTimeoutError(task.id, timeoutMs);
                controller.abort(err);
                reject(err);
            }, timeoutMs);

            task.run(controller.signal).then(
                (value) => {
                    clearTimeout(timer);
                    resolve(value);
                },
                (err: unknown) => {
                    clearTimeout(timer);
                    reject(err);
                },
            );
        });
    }

    private pump(): void {
        this.failBlocked();

        while (this.running < this.config.maxConcurrent) {
            const next = this.nextReady();
            if (!next) break;
            this.start(next);
        }

        if (this.running > 0) return;

        // Nothing running and nothing startable: the rest can never become ready
        for (const task of this.queue) {
            const missing = (task.dependencies ?? []).find((dep) => !this.completed.has(dep)) ?? '';
            this.fail(task.id, new DependencyError(task.id, missing));
        }
        this.queue = [];

        const waiters = this.waiters;
        this.waiters = [];
        for (const resolve of waiters) resolve();
    }

    /** Tasks whose dependency already failed */
    private failBlocked(): void {
        let changed = true;
        while (changed) {
            changed = false;
            for (const task of [...this.queue]) {
                const failedDep = (task.dependencies ?? []).find((dep) => this.failed.has(dep));
                if (failedDep === undefined) continue;
                this.queue = this.queue.filter((t) => t !== task);
                this.fail(task.id, new DependencyError(task.id, failedDep));
                changed = true;
            }
        }
    }

    /** Highest priority ready task, FIFO among equals */
    private nextReady(): AsyncTask<T> | undefined {
        let best: AsyncTask<T> | undefined;
        for (const task of this.queue) {
            const ready = (task.dependencies ?? []).every((dep) => this.completed.has(dep));
            if (!ready) continue;
            if (!best || (task.priority ?? 0) > (best.priority ?? 0)) best = task;
        }
        if (best) this.queue = this.queue.filter((t) => t !== best);
        return best;
    }

    private start(task: AsyncTask<T>): void {
        this.running++;
        log.debug(`Task "${task.id}" started`, { priority: task.priority ?? 0 });

        void this.executeTask(task)
            .then(
                (value) => {
                    this.completed.set(task.id, value);
                    log.debug(`Task "${task.id}" completed`);
                },
                (err: unknown) => this.fail(task.id, toError(err)),
            )
            .finally(() => {
                this.running--;
                this.pump();
            });
    }

    private fail(id: string, error: Error): void {
        this.failed.set(id, error);
        log.error(`Task "${id}" failed`, { error: error.message });
    }
}
