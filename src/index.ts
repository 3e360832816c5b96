export * from './types';
export * from './core/errors';
export { BacktestSession } from './core/BacktestSession';
export { BacktestEngine, simulate } from './backtest/BacktestEngine';
export type { BacktestEngineOptions } from './backtest/BacktestEngine';
export { TradeSimulator } from './backtest/TradeSimulator';
export { MetricsCalculator, DEFAULT_PERIODS_PER_YEAR } from './backtest/Metrics';
export type * from './backtest/types';
export {
  evaluateCondition,
  parseCondition,
  referencedColumns,
} from './strategy/ConditionEvaluator';
export type { ArithmeticNode, ConditionNode, ComparisonOperator, ArithmeticOperator } from './strategy/ConditionEvaluator';
export { buildConditionSignals, conditionName, evaluateLogic, parseLogic } from './strategy/LogicCombinator';
export type { LogicNode } from './strategy/LogicCombinator';
export { applyIndicator, applyIndicators, indicatorColumns } from './analysis/IndicatorProvider';
export { emaSeries, macdSeries, rsiSeries } from './analysis/indicators';
export { loadCsv, parseCsv } from './data/CsvLoader';
export { createSeries, withColumn, columnValues } from './utils/SeriesUtils';
export { parseStrategyRequest, strategyRequestSchema } from './config/StrategyConfig';
export { logger } from './utils/logger';
