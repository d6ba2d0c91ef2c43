import { analyzePerformance } from '../analysis/performance.js';
import type { StrategyProfile } from '../config/strategy-profiles.js';
import { DEFAULT_SIGNAL_OPTIONS, generateSignals } from '../signals/conditions.js';
import type { IndicatorBar, SignalOptions, SignalRow, SignalSummary } from '../signals/types.js';
import { getSignalSummary } from '../signals/validator.js';
import { createLogger } from '../utils/logger.js';
import { BacktestEngine } from './engine.js';
import type { BacktestConfig, BacktestResult, PerformanceMetrics } from './types.js';

const log = createLogger('pipeline');

export interface PipelineOptions {
  signals?: SignalOptions;
  backtest?: Partial<BacktestConfig>;
}

export interface PipelineResult {
  profile: StrategyProfile;
  rows: SignalRow[];
  summary: SignalSummary;
  backtest: BacktestResult;
  metrics: PerformanceMetrics;
}

/**
 * Signals → validation → simulation → metrics for one profile. Either every
 * artifact is produced or the first failure is thrown.
 */
export function runPipeline(
  bars: readonly IndicatorBar[],
  profile: StrategyProfile,
  options: PipelineOptions = {},
): PipelineResult {
  const signalOptions = options.signals ?? DEFAULT_SIGNAL_OPTIONS;

  try {
    const rows = generateSignals(bars, profile, signalOptions);
    const summary = getSignalSummary(rows, signalOptions.trendMode);

    log.info(
      {
        profile: profile.name,
        buySignals: summary.buySignals,
        sellSignals: summary.sellSignals,
      },
      'Signals generated',
    );

    // Fresh engine per run so concurrent profiles never share capital or position
    const engine = new BacktestEngine({ config: options.backtest });
    const backtest = engine.run(rows);
    const metrics = analyzePerformance(backtest);

    return { profile, rows, summary, backtest, metrics };
  } catch (err) {
    log.error({ profile: profile.name, err }, 'Pipeline failed');
    throw err;
  }
}
