import type { IndicatorBar } from '../../src/signals/types.js';

const BASE_TIME = Date.parse('2024-03-01T14:30:00.000Z');
const BAR_MS = 15 * 60 * 1000;

export function barTime(index: number): string {
  return new Date(BASE_TIME + index * BAR_MS).toISOString();
}

/**
 * A neutral bar: flat SMAs (no trend), MACD on its signal line, RSI at 50.
 * Nothing fires unless overridden.
 */
export function makeBar(index: number, overrides: Partial<IndicatorBar> = {}): IndicatorBar {
  return {
    timestamp: barTime(index),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    sma20: 100,
    sma50: 100,
    sma200: 100,
    macd: 0,
    macdSignal: 0,
    rsi: 50,
    ...overrides,
  };
}

export function makeBars(overrides: Partial<IndicatorBar>[]): IndicatorBar[] {
  return overrides.map((o, i) => makeBar(i, o));
}

/** SMA layouts for each trend condition. */
export const PULLBACK_LONG = { sma20: 99, sma50: 100, sma200: 98 };
export const PULLBACK_SHORT = { sma20: 101, sma50: 100, sma200: 102 };
export const STACKED_LONG = { sma20: 102, sma50: 100, sma200: 98 };
export const STACKED_SHORT = { sma20: 98, sma50: 100, sma200: 102 };

/**
 * Four bars on which only the aggressive preset trades: a pullback uptrend
 * with an RSI cross to 53 on bar 1 and no MACD cross. Price then rises
 * from a 101 open to a 106 close.
 */
export function aggressiveOnlySeries(): IndicatorBar[] {
  return makeBars([
    { ...PULLBACK_LONG, rsi: 48 },
    { ...PULLBACK_LONG, rsi: 53 },
    { ...PULLBACK_LONG, rsi: 55, open: 101, high: 104, low: 100, close: 103 },
    { ...PULLBACK_LONG, rsi: 56, open: 104, high: 107, low: 103, close: 106 },
  ]);
}
