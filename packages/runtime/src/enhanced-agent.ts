/**
 * @tokenpilot/runtime — EnhancedAgent
 *
 * AdvancedAgent + plugins + watchdog + security + telemetry + adaptive strategies + executor.
 * The task handler is injected: the runtime tracks, it does not decide what a task does.
 */

import {
    AdvancedAgent,
    PluginError,
    PluginManager,
    SecurityValidationError,
    UnknownStrategyError,
    createLogger,
    errorMessage,
    type AgentConfigInput,
    type BudgetStatus,
    type PluginOutcome,
    type Task,
    type TaskSummary,
} from '@tokenpilot/core';
import { AsyncExecutor, type ExecutionSummary } from '@tokenpilot/executor';
import { TelemetryCollector, emitBudgetMetrics, emitTaskMetrics, type DashboardData } from '@tokenpilot/metrics';
import { SecurityValidator } from '@tokenpilot/sandbox-policy';
import { AdaptiveStrategyManager, type ExecutionContext } from '@tokenpilot/strategy-selector';
import { Watchdog, type HealthReport, type HealthStatus } from '@tokenpilot/watchdog';

export interface TaskResult<T> {
    value: T;
    tokensUsed: number;
}

export type TaskHandler<T> = (
    task: Task,
    context: Record<string, unknown>,
    signal?: AbortSignal,
) => Promise<TaskResult<T>> | TaskResult<T>;

export interface ExecuteOptions {
    activeForm?: string;
    signal?: AbortSignal;
}

export interface StrategyAttemptResult {
    success: boolean;
    tokensUsed: number;
    value?: unknown;
}

export type StrategyAttempt = (strategy: string, task: Task) => Promise<StrategyAttemptResult> | StrategyAttemptResult;

export interface StrategyRunResult {
    task: Task;
    success: boolean;
    /** strategy that succeeded */
    strategy?: string;
    value?: unknown;
}

export interface BatchItem {
    id: string;
    content: string;
    context?: Record<string, unknown>;
    activeForm?: string;
    priority?: number;
    dependencies?: string[];
    timeoutMs?: number;
    /** executor retries; each retry is a new task. Default 1 */
    maxAttempts?: number;
}

export interface RuntimeOptions {
    config?: AgentConfigInput;
    enablePlugins?: boolean;
    enableWatchdog?: boolean;
    enableTelemetry?: boolean;
    maxConcurrent?: number;
    watchdogIntervalMs?: number;
    now?: () => number;
}

export interface RuntimeStatus {
    budget: BudgetStatus;
    tasks: TaskSummary;
    validationErrors: { count: number; max: number };
    security: { suspiciousActivity: number };
    shouldOptimizeOutput: boolean;
    health?: HealthReport;
    telemetry?: DashboardData;
}

/** Thrown by a handler that failed after spending tokens */
export class TaskFailure extends Error {
    constructor(
        message: string,
        public readonly tokensUsed: number,
    ) {
        super(message);
        this.name = 'TaskFailure';
    }
}

const SUSPICIOUS_ACTIVITY_LIMIT = 10;

const log = createLogger('Runtime');

export class EnhancedAgent<T = unknown> {
    readonly agent: AdvancedAgent;
    readonly plugins: PluginManager | null;
    readonly watchdog: Watchdog | null;
    readonly security: SecurityValidator;
    readonly telemetry: TelemetryCollector | null;
    readonly strategies: AdaptiveStrategyManager;

    private readonly handler: TaskHandler<T>;
    private readonly maxConcurrent: number;
    private readonly watchdogIntervalMs: number;
    private readonly now: () => number;
    private executors: Set<AsyncExecutor<T>> = new Set();

    constructor(handler: TaskHandler<T>, options: RuntimeOptions = {}) {
        this.handler = handler;
        this.now = options.now ?? Date.now;
        this.maxConcurrent = options.maxConcurrent ?? 10;
        this.watchdogIntervalMs = options.watchdogIntervalMs ?? 30_000;

        this.agent = new AdvancedAgent(options.config, { now: this.now });
        this.security = new SecurityValidator({ now: this.now });
        this.plugins = options.enablePlugins === false ? null : new PluginManager();
        this.telemetry = options.enableTelemetry === false ? null : new TelemetryCollector({ now: this.now });
        this.watchdog = options.enableWatchdog === false ? null : new Watchdog({ now: this.now });

        this.strategies = new AdaptiveStrategyManager();
        this.strategies.registerEngine(this.agent.strategies);

        if (this.watchdog) this.registerHealthChecks(this.watchdog);
        log.info('EnhancedAgent initialized', { tokenBudget: this.agent.tokenBudget.total });
    }

    // --- Single task ---

    async executeTask(content: string, context: Record<string, unknown> = {}, options: ExecuteOptions = {}): Promise<T> {
        this.agent.ensureWithinValidationLimit();
        if (!this.security.validateInput(content)) {
            this.agent.handleValidationError();
            throw new SecurityValidationError();
        }

        const task = this.agent.addTask(content, options.activeForm);
        task.markInProgress();
        const startedAt = this.now();
        this.agent.recordExecution('task_started', { taskId: task.id, content });

        try {
            const result = await this.handler(task, context, options.signal);
            // executor gave up on this attempt (timeout or shutdown); its result no longer counts
            if (options.signal?.aborted) throw options.signal.reason;
            this.applyTokens(result.tokensUsed);
            task.markCompleted();

            this.agent.recordExecution('task_completed', { taskId: task.id, tokensUsed: result.tokensUsed });
            this.telemetry?.incrementCounter('tasks.completed');
            this.telemetry?.recordMetric('task.duration_ms', this.now() - startedAt, { task: task.id });
            return result.value;
        } catch (err) {
            if (task.canTransitionTo('failed')) task.markFailed();
            if (err instanceof TaskFailure) this.chargeFailedTask(task, err.tokensUsed);
            this.agent.recordExecution('task_failed', { taskId: task.id, error: errorMessage(err) });
            this.telemetry?.incrementCounter('tasks.failed');
            log.error(`Task "${task.id}" failed`, { error: errorMessage(err) });
            throw err;
        } finally {
            this.emitSnapshot();
        }
    }

    // --- Multi-strategy ---

    async executeWithStrategies(
        content: string,
        domain: string,
        attempt: StrategyAttempt,
        complexity = 0.5,
    ): Promise<StrategyRunResult> {
        const selector = this.strategies.getSelector(domain);
        if (!selector) throw new UnknownStrategyError(domain);

        const task = this.agent.addTask(content);
        task.markInProgress();
        let previousStrategy: string | undefined;
        let backtracked = false;

        try {
            while (this.agent.shouldTryAlternativeStrategy(task)) {
                const tried = task.getStrategiesTried();
                if (tried.length >= selector.strategies.length) break;

                const strategy = this.strategies.selectStrategy(
                    domain,
                    this.buildContext(domain, complexity, previousStrategy),
                    tried,
                );
                task.recordStrategy(strategy);

                const startedAt = this.now();
                let outcome: StrategyAttemptResult;
                try {
                    outcome = await attempt(strategy, task);
                } catch (err) {
                    log.warn(`Strategy "${strategy}" threw`, { taskId: task.id, error: errorMessage(err) });
                    outcome = { success: false, tokensUsed: 0 };
                }

                this.strategies.recordOutcome(domain, strategy, outcome.success, this.now() - startedAt);
                this.applyTokens(outcome.tokensUsed);
                this.agent.recordExecution('strategy_attempt', { taskId: task.id, strategy, success: outcome.success });

                if (outcome.success) {
                    task.markCompleted();
                    this.telemetry?.incrementCounter('tasks.completed');
                    return { task, success: true, strategy, value: outcome.value };
                }

                previousStrategy = strategy;
                if (!backtracked && this.agent.shouldBacktrack(task)) {
                    backtracked = true;
                    this.agent.recordExecution('backtrack', { taskId: task.id, attempts: task.attempts });
                    log.info(`Backtracking on "${task.id}" after ${task.attempts} attempts`);
                }
            }

            task.markFailed();
            this.telemetry?.incrementCounter('tasks.failed');
            log.warn(`Task "${task.id}" failed: strategies exhausted`, { tried: task.getStrategiesTried() });
            return { task, success: false };
        } catch (err) {
            if (task.canTransitionTo('failed')) task.markFailed();
            throw err;
        } finally {
            this.emitSnapshot();
        }
    }

    // --- Batch ---

    async executeBatch(items: BatchItem[]): Promise<ExecutionSummary<T>> {
        const executor = new AsyncExecutor<T>({ maxConcurrent: this.maxConcurrent });
        this.executors.add(executor);
        try {
            return await executor.executeParallel(items.map((item) => ({
                id: item.id,
                priority: item.priority,
                dependencies: item.dependencies,
                timeoutMs: item.timeoutMs,
                maxAttempts: item.maxAttempts ?? 1,
                retryDelayMs: 0,
                run: (signal: AbortSignal) => this.executeTask(item.content, item.context, { activeForm: item.activeForm, signal }),
            })));
        } finally {
            this.executors.delete(executor);
        }
    }

    // --- Plugins ---

    async runPlugin(name: string, context: Record<string, unknown> = {}): Promise<PluginOutcome> {
        if (!this.plugins) throw new PluginError(name, 'Plugins are disabled');
        const outcome = await this.plugins.execute(name, context);
        this.telemetry?.incrementCounter(outcome.ok ? 'plugins.executed' : 'plugins.failed');
        return outcome;
    }

    // --- Status & lifecycle ---

    getStatus(): RuntimeStatus {
        const status: RuntimeStatus = {
            budget: this.agent.tokenBudget.getStatus(),
            tasks: this.agent.getTaskSummary(),
            validationErrors: { count: this.agent.getValidationErrors(), max: this.agent.maxValidationErrors },
            security: { suspiciousActivity: this.security.getSuspiciousActivityCount() },
            shouldOptimizeOutput: this.agent.shouldOptimizeOutput(),
        };
        if (this.watchdog) status.health = this.watchdog.getHealthReport();
        if (this.telemetry) status.telemetry = this.telemetry.getDashboardData();
        return status;
    }

    /** One round of health checks; empty without a watchdog */
    async checkHealth(): Promise<Map<string, HealthStatus>> {
        return this.watchdog ? this.watchdog.runChecks() : new Map();
    }

    generateReport(): string {
        return this.agent.generateReport();
    }

    start(): void {
        this.watchdog?.start(this.watchdogIntervalMs);
    }

    async shutdown(): Promise<void> {
        this.watchdog?.stop();
        for (const executor of this.executors) executor.shutdown();
        await this.plugins?.disableAll();
        log.info('EnhancedAgent shutdown complete');
    }

    // --- Internals ---

    private registerHealthChecks(watchdog: Watchdog): void {
        watchdog.register({ name: 'token_budget', check: () => !this.agent.tokenBudget.isCritical() });
        watchdog.register({
            name: 'security_alerts',
            check: () => this.security.getSuspiciousActivityCount() < SUSPICIOUS_ACTIVITY_LIMIT,
        });
        watchdog.register({ name: 'validation_errors', check: () => !this.agent.hasReachedValidationLimit() });
    }

    private applyTokens(tokens: number): void {
        const update = this.agent.tokenBudget.update(tokens);
        if (update.overBudget) this.telemetry?.incrementCounter('budget.overruns');
    }

    /** Failed work still costs tokens; an over-budget charge must not mask the task error */
    private chargeFailedTask(task: Task, tokens: number): void {
        try {
            this.applyTokens(tokens);
        } catch (err) {
            log.warn(`Could not charge tokens for "${task.id}"`, { tokens, error: errorMessage(err) });
        }
    }

    private buildContext(domain: string, complexity: number, previousStrategy?: string): ExecutionContext {
        const budget = this.agent.tokenBudget;
        return {
            taskType: domain,
            complexity,
            tokenBudgetRemaining: budget.remaining / budget.total,
            validationErrors: this.agent.getValidationErrors(),
            previousStrategy,
            previousFailed: previousStrategy !== undefined,
        };
    }

    private emitSnapshot(): void {
        if (!this.telemetry) return;
        emitBudgetMetrics(this.telemetry, this.agent.tokenBudget.getStatus());
        emitTaskMetrics(this.telemetry, this.agent.getTaskSummary());
    }
}

export function createRuntime<T = unknown>(handler: TaskHandler<T>, options: RuntimeOptions = {}): EnhancedAgent<T> {
    return new EnhancedAgent(handler, options);
}
