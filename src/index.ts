export {
  ANNUALIZATION_PERIODS,
  analyzePerformance,
  calculateMaxDrawdown,
  computeMetrics,
  computeProfitFactor,
  computeReturns,
  computeSharpe,
} from './analysis/performance.js';
export {
  computeIndicators,
  DEFAULT_INDICATOR_PARAMS,
  dropWarmup,
  type IndicatorParams,
  type PartialIndicatorBar,
} from './analysis/technical/indicators.js';
export {
  type BestPerformers,
  findBestPerformers,
  runStrategyComparison,
  type StrategyComparison,
} from './backtest/comparison.js';
export { BacktestEngine, DEFAULT_BACKTEST_CONFIG } from './backtest/engine.js';
export { type PipelineOptions, type PipelineResult, runPipeline } from './backtest/pipeline.js';
export {
  formatEquityCurve,
  generateComparisonTable,
  generateSummary,
  INFINITY_SENTINEL,
  toMetricsRecord,
} from './backtest/reporter.js';
export type {
  BacktestConfig,
  BacktestInputRow,
  BacktestPosition,
  BacktestResult,
  BacktestTrade,
  EquitySample,
  ExitReason,
  PerformanceMetrics,
  PositionSide,
} from './backtest/types.js';
export {
  ConfigManager,
  configManager,
  loadBacktestConfig,
  loadSignalOptions,
} from './config/manager.js';
export {
  createStrategyProfile,
  getAllStrategyProfiles,
  getStrategyProfile,
  STRATEGY_NAMES,
  type StrategyName,
  type StrategyProfile,
} from './config/strategy-profiles.js';
export { parseBars, parseIndicatorBars, validateBarSeries } from './data/bar-validator.js';
export * from './errors.js';
export { DEFAULT_SIGNAL_OPTIONS, generateSignals } from './signals/conditions.js';
export type {
  Bar,
  ConditionFlags,
  ConditionRow,
  Decision,
  IndicatorBar,
  IndicatorField,
  SignalOptions,
  SignalRow,
  SignalSummary,
  SignalValidation,
  TrendMode,
} from './signals/types.js';
export { INDICATOR_FIELDS, OHLCV_FIELDS } from './signals/types.js';
export { assertValidSignals, getSignalSummary, validateSignals } from './signals/validator.js';
