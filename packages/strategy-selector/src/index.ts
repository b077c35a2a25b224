/**
 * @tokenpilot/strategy-selector — Public API
 */

export {
    StrategySelector, successRate, avgDurationMs,
    type ExecutionContext, type StrategyPerformance, type StrategyReport, type SelectorState,
} from './selector.js';
export { AdaptiveStrategyManager, type GlobalStats } from './manager.js';
