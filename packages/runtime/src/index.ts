/**
 * @tokenpilot/runtime — Public API
 */

export {
    EnhancedAgent, TaskFailure, createRuntime,
    type TaskHandler, type TaskResult, type ExecuteOptions, type StrategyAttempt, type StrategyAttemptResult,
    type StrategyRunResult, type BatchItem, type RuntimeOptions, type RuntimeStatus,
} from './enhanced-agent.js';
