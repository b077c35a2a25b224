/**
 * @tokenpilot/core — Public API
 */

export {
    AgentError, InvalidConfigError, InvalidDeltaError, OverBudgetError, InvalidTransitionError,
    ValidationErrorLimitExceeded, PluginError, SecurityValidationError, TaskTimeoutError,
    DependencyError, UnknownStrategyError, errorMessage,
    type AgentErrorCode,
} from './errors.js';
export {
    createLogger, setLogLevel, getLogLevel, isLogLevel, formatLine, LOG_LEVELS,
    type Logger, type LogLevel,
} from './logger.js';
export {
    AgentConfigSchema, createConfig, parseConfig, loadConfigFromEnv, configToRecord,
    OVERRUN_POLICIES, DEFAULT_TOKEN_BUDGET, DEFAULT_WARNING_THRESHOLD, DEFAULT_CRITICAL_THRESHOLD,
    type AgentConfig, type AgentConfigInput, type OverrunPolicy,
} from './config.js';
export {
    TokenBudget, validateThresholds,
    type BudgetLevel, type BudgetStatus, type BudgetThresholds, type BudgetUpdate, type TokenBudgetOptions,
} from './budget.js';
export { Task, TASK_STATUSES, type TaskStatus, type TaskConfig, type TaskInfo } from './task.js';
export {
    StrategyEngine, STRATEGIES, DEFAULT_BACKTRACK_THRESHOLD, isStrategyCategory,
    type StrategyCategory,
} from './strategy.js';
export { AdvancedAgent, type ExecutionRecord, type TaskSummary, type AgentDeps } from './agent.js';
export { PluginManager, type AgentPlugin, type PluginContext, type PluginOutcome } from './plugins.js';
