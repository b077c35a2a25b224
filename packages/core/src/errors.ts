/**
 * @tokenpilot/core — Errors
 *
 * Every failure the core can raise carries a stable `code`, so callers
 * can branch without matching on message text.
 */

export type AgentErrorCode =
    | 'INVALID_CONFIG'
    | 'INVALID_DELTA'
    | 'OVER_BUDGET'
    | 'INVALID_TRANSITION'
    | 'VALIDATION_LIMIT'
    | 'PLUGIN_ERROR'
    | 'SECURITY_VALIDATION'
    | 'TASK_TIMEOUT'
    | 'DEPENDENCY_FAILED'
    | 'UNKNOWN_STRATEGY';

export class AgentError extends Error {
    public readonly code: AgentErrorCode;

    constructor(code: AgentErrorCode, message: string) {
        super(message);
        this.name = 'AgentError';
        this.code = code;
    }
}

/** Thresholds, budget totals or env values out of range */
export class InvalidConfigError extends AgentError {
    constructor(public readonly issues: string[]) {
        super('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`);
        this.name = 'InvalidConfigError';
    }
}

export class InvalidDeltaError extends AgentError {
    constructor(public readonly delta: number) {
        super('INVALID_DELTA', `Token delta must be a non-negative integer, got ${delta}`);
        this.name = 'InvalidDeltaError';
    }
}

export class OverBudgetError extends AgentError {
    constructor(
        public readonly requested: number,
        public readonly remaining: number,
    ) {
        super('OVER_BUDGET', `Requested ${requested} tokens but only ${remaining} remaining`);
        this.name = 'OverBudgetError';
    }
}

export class InvalidTransitionError extends AgentError {
    constructor(
        public readonly taskId: string,
        public readonly from: string,
        public readonly to: string,
    ) {
        super('INVALID_TRANSITION', `Task "${taskId}" cannot move from ${from} to ${to}`);
        this.name = 'InvalidTransitionError';
    }
}

export class ValidationErrorLimitExceeded extends AgentError {
    constructor(
        public readonly errors: number,
        public readonly max: number,
    ) {
        super('VALIDATION_LIMIT', `Validation error limit reached (${errors}/${max})`);
        this.name = 'ValidationErrorLimitExceeded';
    }
}

export class PluginError extends AgentError {
    constructor(
        public readonly plugin: string,
        message: string,
    ) {
        super('PLUGIN_ERROR', message);
        this.name = 'PluginError';
    }
}

export class SecurityValidationError extends AgentError {
    constructor(message = 'Security validation failed') {
        super('SECURITY_VALIDATION', message);
        this.name = 'SecurityValidationError';
    }
}

export class TaskTimeoutError extends AgentError {
    constructor(
        public readonly taskId: string,
        public readonly timeoutMs: number,
    ) {
        super('TASK_TIMEOUT', `Task "${taskId}" timed out after ${timeoutMs}ms`);
        this.name = 'TaskTimeoutError';
    }
}

export class DependencyError extends AgentError {
    constructor(
        public readonly taskId: string,
        public readonly dependency: string,
    ) {
        super('DEPENDENCY_FAILED', `Task "${taskId}" cannot run: dependency "${dependency}" did not complete`);
        this.name = 'DependencyError';
    }
}

export class UnknownStrategyError extends AgentError {
    constructor(public readonly strategy: string) {
        super('UNKNOWN_STRATEGY', `Unknown strategy or domain: "${strategy}"`);
        this.name = 'UnknownStrategyError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
