export type Decision = 'BUY' | 'SELL' | 'HOLD';

export type TrendMode = 'pullback' | 'stacked';

/** One OHLCV sample. Timestamps are ISO-8601 strings, strictly increasing. */
export interface Bar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** A bar with the precomputed indicator columns the signal engine consumes. */
export interface IndicatorBar extends Bar {
  sma20: number;
  sma50: number;
  sma200: number;
  macd: number;
  macdSignal: number;
  rsi: number;
}

export const OHLCV_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

export const INDICATOR_FIELDS = ['sma20', 'sma50', 'sma200', 'macd', 'macdSignal', 'rsi'] as const;

export type IndicatorField = (typeof INDICATOR_FIELDS)[number];

export interface ConditionFlags {
  trendLongOk: boolean;
  trendShortOk: boolean;
  macdUpOk: boolean;
  macdDownOk: boolean;
  rsiUpOk: boolean;
  rsiDownOk: boolean;
  /** Present only when the profile enables the volume filter. */
  volumeOk?: boolean;
}

export interface ConditionRow extends ConditionFlags {
  buySignal: boolean;
  sellSignal: boolean;
  decision: Decision;
}

export type SignalRow = IndicatorBar & ConditionRow;

export interface SignalOptions {
  trendMode: TrendMode;
}

export interface SignalValidation {
  valid: boolean;
  error?: string;
  totalBars: number;
  buySignals: number;
  sellSignals: number;
  holdSignals: number;
  /** (buy + sell) / totalBars, as a fraction. */
  signalRate: number;
}

export interface SignalSummary {
  trendMode: TrendMode;
  totalBars: number;
  buySignals: number;
  sellSignals: number;
  holdSignals: number;
  buyFrequencyPct: number;
  sellFrequencyPct: number;
  firstSignalTime: string | null;
  lastSignalTime: string | null;
  validation: SignalValidation;
}
