/**
 * @tokenpilot/core — AdvancedAgent
 *
 * Owns one TokenBudget, an ordered task list and an execution log.
 * Does not execute anything itself: callers drive tasks, the agent aggregates.
 */

import { TokenBudget } from './budget.js';
import { createConfig, type AgentConfig, type AgentConfigInput } from './config.js';
import { ValidationErrorLimitExceeded } from './errors.js';
import { createLogger } from './logger.js';
import { StrategyEngine } from './strategy.js';
import { Task } from './task.js';

export interface ExecutionRecord {
    timestamp: number;
    action: string;
    details: Record<string, unknown>;
    /** budget.used at the moment of recording */
    tokenUsage: number;
}

export interface TaskSummary {
    total: number;
    pending: number;
    inProgress: number;
    completed: number;
    failed: number;
}

export interface AgentDeps {
    now?: () => number;
}

const log = createLogger('Agent');

export class AdvancedAgent {
    readonly tokenBudget: TokenBudget;
    readonly strategies: StrategyEngine;
    readonly maxValidationErrors: number;
    readonly maxRetryAttempts: number;

    private readonly config: Readonly<AgentConfig>;
    private readonly now: () => number;
    private tasks: Task[] = [];
    private executionHistory: ExecutionRecord[] = [];
    private validationErrors = 0;

    constructor(config: AgentConfigInput = {}, deps: AgentDeps = {}) {
        this.config = createConfig(config);
        this.now = deps.now ?? Date.now;
        this.tokenBudget = new TokenBudget(this.config.tokenBudget, {
            warningThreshold: this.config.warningThreshold,
            criticalThreshold: this.config.criticalThreshold,
            overrunPolicy: this.config.overrunPolicy,
        });
        this.strategies = new StrategyEngine(this.config.backtrackThreshold);
        this.maxValidationErrors = this.config.maxValidationErrors;
        this.maxRetryAttempts = this.config.maxRetryAttempts;
    }

    // --- Tasks ---

    addTask(content: string, activeForm = ''): Task {
        const task = new Task({ id: `task_${this.tasks.length + 1}`, content, activeForm, now: this.now });
        this.tasks.push(task);
        log.debug('Task added', { id: task.id, content });
        return task;
    }

    getTasks(): readonly Task[] {
        return [...this.tasks];
    }

    getTask(id: string): Task | undefined {
        return this.tasks.find((t) => t.id === id);
    }

    getPendingTasks(): Task[] {
        return this.tasks.filter((t) => t.getStatus() === 'pending');
    }

    getTaskSummary(): TaskSummary {
        const summary: TaskSummary = { total: this.tasks.length, pending: 0, inProgress: 0, completed: 0, failed: 0 };
        for (const task of this.tasks) {
            switch (task.getStatus()) {
                case 'pending': summary.pending++; break;
                case 'in_progress': summary.inProgress++; break;
                case 'completed': summary.completed++; break;
                case 'failed': summary.failed++; break;
            }
        }
        return summary;
    }

    // --- Execution log ---

    recordExecution(action: string, details: Record<string, unknown> = {}): ExecutionRecord {
        const record: ExecutionRecord = {
            timestamp: this.now(),
            action,
            details,
            tokenUsage: this.tokenBudget.used,
        };
        this.executionHistory.push(record);
        return record;
    }

    getExecutionHistory(): ExecutionRecord[] {
        return [...this.executionHistory];
    }

    // --- Validation errors ---

    /** Count one validation error. false = halt further attempts. */
    handleValidationError(): boolean {
        this.validationErrors++;
        if (this.validationErrors >= this.maxValidationErrors) {
            log.warn('Validation error limit reached', { errors: this.validationErrors, max: this.maxValidationErrors });
            return false;
        }
        return true;
    }

    getValidationErrors(): number {
        return this.validationErrors;
    }

    hasReachedValidationLimit(): boolean {
        return this.validationErrors >= this.maxValidationErrors;
    }

    ensureWithinValidationLimit(): void {
        if (this.hasReachedValidationLimit()) {
            throw new ValidationErrorLimitExceeded(this.validationErrors, this.maxValidationErrors);
        }
    }

    // --- Policy signals ---

    /** Budget crossed the warning threshold: callers should cut verbosity */
    shouldOptimizeOutput(): boolean {
        return this.tokenBudget.getLevel() !== 'OK';
    }

    shouldTryAlternativeStrategy(task: Task): boolean {
        return this.config.enableMultiStrategy && task.attempts < this.maxRetryAttempts;
    }

    shouldBacktrack(task: Task): boolean {
        return this.config.enableBacktracking && this.strategies.shouldBacktrack(task.attempts);
    }

    // --- Reporting ---

    generateReport(): string {
        const summary = this.getTaskSummary();
        return [
            '=== Agent Execution Report ===',
            `Token Budget: ${this.tokenBudget.describe()}`,
            `Tasks: ${summary.completed}/${summary.total} completed`,
            `Validation Errors: ${this.validationErrors}/${this.maxValidationErrors}`,
            `Execution Steps: ${this.executionHistory.length}`,
        ].join('\n');
    }

    getConfig(): Readonly<AgentConfig> {
        return this.config;
    }
}
