import type {
  BacktestResult,
  BacktestTrade,
  EquitySample,
  PerformanceMetrics,
} from '../backtest/types.js';
import { mean, sampleStdDev, sum } from '../utils/helpers.js';

/**
 * Fixed annualization factor applied to bar-over-bar returns whatever the
 * bar interval is. Kept for comparability with existing reports; it
 * overstates Sharpe for intraday bars.
 */
export const ANNUALIZATION_PERIODS = 252;

// ── Exported pure computation functions (for testability) ─────────────────

/**
 * Most negative (equity - runningPeak) / runningPeak over the curve,
 * 0 when equity never falls below a prior peak.
 */
export function calculateMaxDrawdown(equity: readonly number[]): number {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDrawdown = 0;
  for (const value of equity) {
    if (value > peak) peak = value;
    if (peak > 0) {
      const dd = (value - peak) / peak;
      if (dd < maxDrawdown) maxDrawdown = dd;
    }
  }
  return maxDrawdown;
}

/** Simple bar-over-bar fractional change; steps from a zero equity are skipped. */
export function computeReturns(equity: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    const prev = equity[i - 1];
    if (prev !== 0) {
      returns.push((equity[i] - prev) / prev);
    }
  }
  return returns;
}

/**
 * mean / sample stdev * sqrt(252). Returns 0 with fewer than 2 returns or
 * zero dispersion.
 */
export function computeSharpe(returns: readonly number[]): number {
  if (returns.length < 2) return 0;
  const stdDev = sampleStdDev(returns);
  if (stdDev === 0) return 0;
  return (mean(returns) / stdDev) * Math.sqrt(ANNUALIZATION_PERIODS);
}

/**
 * Gross profit over gross loss: Infinity with gains and no losses, 0 when
 * both are zero.
 */
export function computeProfitFactor(grossProfit: number, grossLoss: number): number {
  if (grossLoss === 0) {
    return grossProfit > 0 ? Number.POSITIVE_INFINITY : 0;
  }
  return grossProfit / grossLoss;
}

function emptyMetrics(initialCapital: number, finalCapital: number): PerformanceMetrics {
  return {
    initialCapital,
    finalCapital,
    totalTrades: 0,
    winningTrades: 0,
    losingTrades: 0,
    winRate: 0,
    avgWin: 0,
    avgLoss: 0,
    grossProfit: 0,
    grossLoss: 0,
    totalPnl: 0,
    totalCommission: 0,
    netPnl: 0,
    totalReturnPct: 0,
    maxDrawdown: 0,
    profitFactor: 0,
    sharpeRatio: 0,
  };
}

export function computeMetrics(
  trades: readonly BacktestTrade[],
  equityCurve: readonly EquitySample[],
  initialCapital: number,
  finalCapital: number,
): PerformanceMetrics {
  if (trades.length === 0) {
    return emptyMetrics(initialCapital, finalCapital);
  }

  const wins = trades.filter((t) => t.pnl > 0).map((t) => t.pnl);
  const losses = trades.filter((t) => t.pnl < 0).map((t) => t.pnl);

  const totalPnl = sum(trades.map((t) => t.pnl));
  const totalCommission = sum(trades.map((t) => t.commission));
  const netPnl = totalPnl - totalCommission;

  const grossProfit = sum(wins);
  const grossLoss = Math.abs(sum(losses));

  const equity = equityCurve.map((s) => s.totalEquity);

  return {
    initialCapital,
    finalCapital,
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: wins.length / trades.length,
    avgWin: mean(wins),
    avgLoss: Math.abs(mean(losses)),
    grossProfit,
    grossLoss,
    totalPnl,
    totalCommission,
    netPnl,
    totalReturnPct: (netPnl / initialCapital) * 100,
    maxDrawdown: calculateMaxDrawdown(equity),
    profitFactor: computeProfitFactor(grossProfit, grossLoss),
    sharpeRatio: computeSharpe(computeReturns(equity)),
  };
}

export function analyzePerformance(result: BacktestResult): PerformanceMetrics {
  return computeMetrics(
    result.trades,
    result.equityCurve,
    result.config.initialCapital,
    result.finalCapital,
  );
}
