/**
 * @tokenpilot/core — Task lifecycle
 *
 * Lifecycle: pending → in_progress → completed | failed
 * Terminal states are final. The strategy log is append-only and unguarded.
 */

import { InvalidTransitionError } from './errors.js';

export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress', 'completed', 'failed'];

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
    pending: ['in_progress'],
    in_progress: ['completed', 'failed'],
    completed: [],
    failed: [],
};

export interface TaskConfig {
    id: string;
    content: string;
    activeForm?: string;
    now?: () => number;
}

export interface TaskInfo {
    id: string;
    content: string;
    activeForm: string;
    status: TaskStatus;
    attempts: number;
    strategiesTried: string[];
    createdAt: number;
    startedAt?: number;
    finishedAt?: number;
}

export class Task {
    readonly id: string;
    readonly content: string;
    readonly activeForm: string;
    readonly createdAt: number;

    private status: TaskStatus = 'pending';
    private strategies: string[] = [];
    private startedAt?: number;
    private finishedAt?: number;
    private readonly now: () => number;

    constructor(config: TaskConfig) {
        this.id = config.id;
        this.content = config.content;
        this.activeForm = config.activeForm ?? '';
        this.now = config.now ?? Date.now;
        this.createdAt = this.now();
    }

    markInProgress(): void {
        this.transition('in_progress');
        this.startedAt = this.now();
    }

    markCompleted(): void {
        this.transition('completed');
        this.finishedAt = this.now();
    }

    markFailed(): void {
        this.transition('failed');
        this.finishedAt = this.now();
    }

    /** Log a strategy attempt. Allowed in any state. */
    recordStrategy(strategy: string): void {
        this.strategies.push(strategy);
    }

    /** One attempt per recorded strategy */
    get attempts(): number {
        return this.strategies.length;
    }

    getStatus(): TaskStatus {
        return this.status;
    }

    getStrategiesTried(): string[] {
        return [...this.strategies];
    }

    canTransitionTo(next: TaskStatus): boolean {
        return TRANSITIONS[this.status].includes(next);
    }

    isTerminal(): boolean {
        return TRANSITIONS[this.status].length === 0;
    }

    info(): TaskInfo {
        return {
            id: this.id,
            content: this.content,
            activeForm: this.activeForm,
            status: this.status,
            attempts: this.attempts,
            strategiesTried: this.getStrategiesTried(),
            createdAt: this.createdAt,
            startedAt: this.startedAt,
            finishedAt: this.finishedAt,
        };
    }

    private transition(next: TaskStatus): void {
        if (!this.canTransitionTo(next)) {
            throw new InvalidTransitionError(this.id, this.status, next);
        }
        this.status = next;
    }
}
