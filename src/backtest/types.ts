import type { Bar, ConditionRow } from '../signals/types.js';

export interface BacktestConfig {
  initialCapital: number;
  /** Flat fee charged once per executed order. */
  commission: number;
  /** Fraction of the open price, always adverse to the trader. */
  slippage: number;
}

export type PositionSide = 'FLAT' | 'LONG' | 'SHORT';

export type ExitReason = 'reversal' | 'end_of_data';

/** The subset of a signal row the simulation reads. */
export type BacktestInputRow = Pick<Bar, 'timestamp' | 'open' | 'close'> &
  Pick<ConditionRow, 'decision'>;

export interface BacktestPosition {
  side: PositionSide;
  entryPrice: number;
  entryTime: string;
}

export interface BacktestTrade {
  /** Timestamp of the bar whose signal opened the position. */
  entryTime: string;
  /** Timestamp of the bar whose signal (or the final bar) closed the position. */
  exitTime: string;
  entryPrice: number;
  exitPrice: number;
  side: Exclude<PositionSide, 'FLAT'>;
  pnl: number;
  /** Commission of the closing order. The entry order's fee is debited from capital only. */
  commission: number;
  exitReason: ExitReason;
}

export interface EquitySample {
  timestamp: string;
  realizedCapital: number;
  unrealizedPnl: number;
  totalEquity: number;
  positionSide: PositionSide;
  markPrice: number;
}

export interface BacktestResult {
  config: BacktestConfig;
  trades: BacktestTrade[];
  equityCurve: EquitySample[];
  finalCapital: number;
}

export interface PerformanceMetrics {
  initialCapital: number;
  finalCapital: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** Fraction of trades with pnl > 0. */
  winRate: number;
  avgWin: number;
  avgLoss: number;
  grossProfit: number;
  grossLoss: number;
  totalPnl: number;
  totalCommission: number;
  netPnl: number;
  totalReturnPct: number;
  /** Most negative peak-to-trough fraction of total equity, 0 or below. */
  maxDrawdown: number;
  /** Infinity when there are gains and no losses. */
  profitFactor: number;
  sharpeRatio: number;
}
