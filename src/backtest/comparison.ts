import type { StrategyProfile } from '../config/strategy-profiles.js';
import type { IndicatorBar } from '../signals/types.js';
import { createLogger } from '../utils/logger.js';
import { type PipelineOptions, type PipelineResult, runPipeline } from './pipeline.js';

const log = createLogger('strategy-comparison');

/**
 * Profile names per ranking. Ties keep the earlier profile. Drawdowns are
 * negative, so the lowest drawdown is the shallowest one, not the most
 * negative value.
 */
export interface BestPerformers {
  highestReturn: string;
  highestWinRate: string;
  bestSharpe: string;
  /** The profile whose max drawdown is closest to zero. */
  lowestDrawdown: string;
}

export interface StrategyComparison {
  results: PipelineResult[];
  bestPerformers: BestPerformers | null;
}

function pickBest(
  results: readonly PipelineResult[],
  score: (r: PipelineResult) => number,
): string {
  let best = results[0];
  for (const r of results.slice(1)) {
    if (score(r) > score(best)) best = r;
  }
  return best.profile.name;
}

export function findBestPerformers(results: readonly PipelineResult[]): BestPerformers | null {
  if (results.length < 2) return null;
  return {
    highestReturn: pickBest(results, (r) => r.metrics.totalReturnPct),
    highestWinRate: pickBest(results, (r) => r.metrics.winRate),
    bestSharpe: pickBest(results, (r) => r.metrics.sharpeRatio),
    lowestDrawdown: pickBest(results, (r) => r.metrics.maxDrawdown),
  };
}

/**
 * Run the same bar series through each profile independently. Ties keep the
 * earlier profile.
 */
export function runStrategyComparison(
  bars: readonly IndicatorBar[],
  profiles: readonly StrategyProfile[],
  options: PipelineOptions = {},
): StrategyComparison {
  log.info({ profiles: profiles.map((p) => p.name), bars: bars.length }, 'Comparing strategies');

  const results = profiles.map((profile) => runPipeline(bars, profile, options));
  return { results, bestPerformers: findBestPerformers(results) };
}
