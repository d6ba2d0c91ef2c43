import { MACD, RSI, SMA } from 'technicalindicators';
import { EmptyInputError, InvalidBarError } from '../../errors.js';
import type { Bar, IndicatorBar, IndicatorField } from '../../signals/types.js';

export interface IndicatorParams {
  /** Short, medium and long SMA periods, stored as sma20, sma50 and sma200. */
  smaPeriods: [number, number, number];
  macd: { fast: number; slow: number; signal: number };
  rsiPeriod: number;
}

export const DEFAULT_INDICATOR_PARAMS: IndicatorParams = {
  smaPeriods: [20, 50, 200],
  macd: { fast: 12, slow: 26, signal: 9 },
  rsiPeriod: 14,
};

/** A bar whose indicators may still be warming up. */
export type PartialIndicatorBar = Bar & { [K in IndicatorField]: number | null };

/**
 * Library outputs are shorter than their input by the warm-up length; line
 * them up with the tail of the series and pad the head with null.
 */
function alignToEnd<T>(length: number, values: readonly T[]): (T | null)[] {
  const pad = length - values.length;
  const aligned: (T | null)[] = new Array<T | null>(Math.max(pad, 0)).fill(null);
  for (const v of pad >= 0 ? values : values.slice(-pad)) {
    aligned.push(v);
  }
  return aligned;
}

// ─── SMA ─────────────────────────────────────────────────

export function smaSeries(closes: number[], period: number): (number | null)[] {
  if (closes.length < period) return closes.map(() => null);
  return alignToEnd(closes.length, SMA.calculate({ values: closes, period }));
}

// ─── MACD ────────────────────────────────────────────────

export function macdSeries(
  closes: number[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9,
): { macd: (number | null)[]; signal: (number | null)[] } {
  if (closes.length < slowPeriod) {
    return { macd: closes.map(() => null), signal: closes.map(() => null) };
  }
  const result = MACD.calculate({
    values: closes,
    fastPeriod,
    slowPeriod,
    signalPeriod,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  });
  return {
    macd: alignToEnd(
      closes.length,
      result.map((r) => r.MACD ?? null),
    ),
    signal: alignToEnd(
      closes.length,
      result.map((r) => r.signal ?? null),
    ),
  };
}

// ─── RSI ─────────────────────────────────────────────────

/** Wilder-smoothed RSI. */
export function rsiSeries(closes: number[], period = 14): (number | null)[] {
  if (closes.length < period + 1) return closes.map(() => null);
  return alignToEnd(closes.length, RSI.calculate({ values: closes, period }));
}

/**
 * Attach SMA, MACD and RSI columns to each bar. Values not yet available
 * during warm-up are null.
 */
export function computeIndicators(
  bars: readonly Bar[],
  params: IndicatorParams = DEFAULT_INDICATOR_PARAMS,
): PartialIndicatorBar[] {
  if (bars.length === 0) {
    throw new EmptyInputError('indicators');
  }

  const closes = bars.map((b) => b.close);
  const [short, medium, long] = params.smaPeriods;
  const sma20 = smaSeries(closes, short);
  const sma50 = smaSeries(closes, medium);
  const sma200 = smaSeries(closes, long);
  const macd = macdSeries(closes, params.macd.fast, params.macd.slow, params.macd.signal);
  const rsi = rsiSeries(closes, params.rsiPeriod);

  return bars.map((bar, i) => ({
    ...bar,
    sma20: sma20[i],
    sma50: sma50[i],
    sma200: sma200[i],
    macd: macd.macd[i],
    macdSignal: macd.signal[i],
    rsi: rsi[i],
  }));
}

function toIndicatorBar(row: PartialIndicatorBar): IndicatorBar | null {
  const { sma20, sma50, sma200, macd, macdSignal, rsi } = row;
  if (
    sma20 === null ||
    sma50 === null ||
    sma200 === null ||
    macd === null ||
    macdSignal === null ||
    rsi === null
  ) {
    return null;
  }
  return { ...row, sma20, sma50, sma200, macd, macdSignal, rsi };
}

/**
 * Drop the first `minWarmup` rows, then any leading rows that still lack an
 * indicator value. Throws when nothing past the warm-up remains.
 */
export function dropWarmup(rows: readonly PartialIndicatorBar[], minWarmup = 200): IndicatorBar[] {
  if (rows.length <= minWarmup) {
    throw new InvalidBarError(
      `Insufficient data: ${rows.length} bars, need more than ${minWarmup}`,
    );
  }

  const result: IndicatorBar[] = [];
  for (const row of rows.slice(minWarmup)) {
    const complete = toIndicatorBar(row);
    if (complete) {
      result.push(complete);
    } else if (result.length > 0) {
      throw new InvalidBarError(`Indicator gap at ${row.timestamp}`);
    }
  }

  if (result.length === 0) {
    throw new InvalidBarError('No bars with complete indicators after warm-up');
  }
  return result;
}
