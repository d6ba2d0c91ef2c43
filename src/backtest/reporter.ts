import { formatCurrency, formatPercent, round } from '../utils/helpers.js';
import type { StrategyComparison } from './comparison.js';
import type { PipelineResult } from './pipeline.js';
import type { BacktestResult, PerformanceMetrics } from './types.js';

export const INFINITY_SENTINEL = 'inf';

/**
 * Flat metric-name → value record for exporters. Infinite profit factor is
 * rendered as the "inf" sentinel since JSON has no infinity.
 */
export function toMetricsRecord(metrics: PerformanceMetrics): Record<string, number | string> {
  const record: Record<string, number | string> = {};
  for (const [key, value] of Object.entries(metrics)) {
    record[key] = value === Number.POSITIVE_INFINITY ? INFINITY_SENTINEL : value;
  }
  return record;
}

function formatProfitFactor(pf: number): string {
  return Number.isFinite(pf) ? pf.toFixed(2) : INFINITY_SENTINEL;
}

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(result: PipelineResult): string {
  const { metrics, summary, profile } = result;
  const lines: string[] = [];

  lines.push(`=== Backtest Results: ${profile.name} ===`);
  if (profile.description) lines.push(profile.description);
  lines.push(`Trend Mode: ${summary.trendMode}`);
  lines.push(`Initial Capital: ${formatCurrency(metrics.initialCapital)}`);
  lines.push('');

  lines.push('--- Signals ---');
  lines.push(`Total Bars: ${summary.totalBars}`);
  lines.push(`BUY: ${summary.buySignals} | SELL: ${summary.sellSignals}`);
  lines.push(`Signal Rate: ${formatPercent(summary.validation.signalRate)}`);
  lines.push('');

  lines.push('--- Performance ---');
  lines.push(`Final Capital: ${formatCurrency(metrics.finalCapital)}`);
  lines.push(`Net P&L: ${formatCurrency(metrics.netPnl)}`);
  lines.push(`Return: ${round(metrics.totalReturnPct, 2).toFixed(2)}%`);
  lines.push(`Commission: ${formatCurrency(metrics.totalCommission)}`);
  lines.push('');

  lines.push('--- Trade Statistics ---');
  lines.push(`Total Trades: ${metrics.totalTrades}`);
  lines.push(`Win Rate: ${formatPercent(metrics.winRate)}`);
  lines.push(`Wins: ${metrics.winningTrades} | Losses: ${metrics.losingTrades}`);
  lines.push(`Avg Win: ${formatCurrency(metrics.avgWin)}`);
  lines.push(`Avg Loss: ${formatCurrency(metrics.avgLoss)}`);
  lines.push('');

  lines.push('--- Risk Metrics ---');
  lines.push(`Max Drawdown: ${formatPercent(metrics.maxDrawdown)}`);
  lines.push(`Sharpe Ratio: ${metrics.sharpeRatio.toFixed(2)}`);
  lines.push(`Profit Factor: ${formatProfitFactor(metrics.profitFactor)}`);

  return lines.join('\n');
}

/**
 * Side-by-side table of every profile in a comparison, plus best performers.
 */
export function generateComparisonTable(comparison: StrategyComparison): string {
  const lines: string[] = ['=== Strategy Comparison ===', ''];

  lines.push(
    `${'Strategy'.padEnd(15)}${'Signals'.padEnd(12)}${'Trades'.padEnd(8)}` +
      `${'Win %'.padEnd(9)}${'Return %'.padEnd(11)}${'Drawdown %'.padEnd(12)}Sharpe`,
  );

  for (const { profile, summary, metrics } of comparison.results) {
    const signals = `${summary.buySignals}B/${summary.sellSignals}S`;
    lines.push(
      `${profile.name.padEnd(15)}${signals.padEnd(12)}${String(metrics.totalTrades).padEnd(8)}` +
        `${(metrics.winRate * 100).toFixed(1).padEnd(9)}` +
        `${metrics.totalReturnPct.toFixed(2).padEnd(11)}` +
        `${(metrics.maxDrawdown * 100).toFixed(2).padEnd(12)}` +
        `${metrics.sharpeRatio.toFixed(2)}`,
    );
  }

  const best = comparison.bestPerformers;
  if (best) {
    lines.push('');
    lines.push('Best Performers:');
    lines.push(`  Highest Return: ${best.highestReturn}`);
    lines.push(`  Highest Win Rate: ${best.highestWinRate}`);
    lines.push(`  Best Sharpe Ratio: ${best.bestSharpe}`);
    lines.push(`  Lowest Drawdown: ${best.lowestDrawdown}`);
  }

  return lines.join('\n');
}

/**
 * Format the equity curve for charting.
 */
export function formatEquityCurve(result: BacktestResult): {
  timestamps: string[];
  values: number[];
  initialCapital: number;
} {
  return {
    timestamps: result.equityCurve.map((p) => p.timestamp),
    values: result.equityCurve.map((p) => round(p.totalEquity, 2)),
    initialCapital: result.config.initialCapital,
  };
}
