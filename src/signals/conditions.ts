import type { StrategyProfile } from '../config/strategy-profiles.js';
import { EmptyInputError, MissingFieldError, SignalInconsistencyError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import {
  type ConditionRow,
  type Decision,
  INDICATOR_FIELDS,
  type IndicatorBar,
  OHLCV_FIELDS,
  type SignalOptions,
  type SignalRow,
  type TrendMode,
} from './types.js';

const log = createLogger('signals');

const RSI_MIDLINE = 50;

// Trend, MACD and RSI
const CORE_FILTERS = 3;

export const DEFAULT_SIGNAL_OPTIONS: SignalOptions = { trendMode: 'pullback' };

export interface SideFlags {
  long: boolean[];
  short: boolean[];
}

/**
 * Every bar must carry finite OHLCV and indicator values. Bars parsed from
 * untyped sources can lack a column even though the type says otherwise.
 */
export function assertSignalInput(bars: readonly IndicatorBar[]): void {
  if (bars.length === 0) {
    throw new EmptyInputError('signals');
  }
  const fields = [...OHLCV_FIELDS, ...INDICATOR_FIELDS];
  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];
    if (typeof bar.timestamp !== 'string') {
      throw new MissingFieldError('timestamp', i);
    }
    for (const field of fields) {
      const value: unknown = bar[field];
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new MissingFieldError(field, i);
      }
    }
  }
}

function rawTrend(bar: IndicatorBar, mode: TrendMode): { long: boolean; short: boolean } {
  const { sma20, sma50, sma200 } = bar;
  if (mode === 'pullback') {
    // Buy dips in an uptrend, sell rallies in a downtrend
    return {
      long: sma50 > sma200 && sma20 < sma50,
      short: sma50 < sma200 && sma20 > sma50,
    };
  }
  return {
    long: sma20 > sma50 && sma50 > sma200,
    short: sma20 < sma50 && sma50 < sma200,
  };
}

/**
 * A bar passes only if the raw condition held on it and on the preceding
 * `periods - 1` bars. Windows reaching before the first bar fail.
 */
export function requireConsecutive(raw: readonly boolean[], periods: number): boolean[] {
  const confirmed: boolean[] = [];
  let streak = 0;
  for (const ok of raw) {
    streak = ok ? streak + 1 : 0;
    confirmed.push(streak >= periods);
  }
  return confirmed;
}

export function calculateTrendFilters(
  bars: readonly IndicatorBar[],
  mode: TrendMode,
  confirmationPeriods = 1,
): SideFlags {
  const raw = bars.map((bar) => rawTrend(bar, mode));
  return {
    long: requireConsecutive(
      raw.map((r) => r.long),
      confirmationPeriods,
    ),
    short: requireConsecutive(
      raw.map((r) => r.short),
      confirmationPeriods,
    ),
  };
}

/**
 * MACD line crossing its signal line between the previous and current bar.
 * With `requireZeroCross`, an up-cross counts only below zero and a
 * down-cross only above zero. The first bar has no previous bar and fails.
 */
export function calculateMacdSignals(
  bars: readonly IndicatorBar[],
  requireZeroCross: boolean,
): SideFlags {
  const long: boolean[] = [];
  const short: boolean[] = [];

  for (let i = 0; i < bars.length; i++) {
    if (i === 0) {
      long.push(false);
      short.push(false);
      continue;
    }
    const prev = bars[i - 1];
    const curr = bars[i];

    const crossUp = prev.macd <= prev.macdSignal && curr.macd > curr.macdSignal;
    const crossDown = prev.macd >= prev.macdSignal && curr.macd < curr.macdSignal;

    if (requireZeroCross) {
      long.push(crossUp && curr.macd < 0 && curr.macdSignal < 0);
      short.push(crossDown && curr.macd > 0 && curr.macdSignal > 0);
    } else {
      long.push(crossUp);
      short.push(crossDown);
    }
  }

  return { long, short };
}

export function calculateRsiSignals(
  bars: readonly IndicatorBar[],
  buyThreshold: number,
  sellThreshold: number,
): SideFlags {
  const long: boolean[] = [];
  const short: boolean[] = [];

  for (let i = 0; i < bars.length; i++) {
    if (i === 0) {
      long.push(false);
      short.push(false);
      continue;
    }
    const prevRsi = bars[i - 1].rsi;
    const currRsi = bars[i].rsi;
    long.push(prevRsi < RSI_MIDLINE && currRsi > buyThreshold);
    short.push(prevRsi > RSI_MIDLINE && currRsi < sellThreshold);
  }

  return { long, short };
}

/**
 * Current volume above the simple average of the trailing `lookback` bars
 * (the current bar included). Bars without a full window fail.
 */
export function calculateVolumeFilter(bars: readonly IndicatorBar[], lookback: number): boolean[] {
  const result: boolean[] = [];
  for (let i = 0; i < bars.length; i++) {
    if (i + 1 < lookback) {
      result.push(false);
      continue;
    }
    let total = 0;
    for (let j = i - lookback + 1; j <= i; j++) {
      total += bars[j].volume;
    }
    result.push(bars[i].volume > total / lookback);
  }
  return result;
}

function decide(buySignal: boolean, sellSignal: boolean): Decision {
  if (buySignal) return 'BUY';
  if (sellSignal) return 'SELL';
  return 'HOLD';
}

/**
 * Evaluate every filter for every bar and aggregate them into a decision.
 * A side fires when enough of its trend, MACD and RSI filters hold to meet
 * `profile.indicatorsRequired` (capped at the three of them). The volume
 * filter, when enabled, is an extra gate that both sides must pass.
 *
 * Throws EmptyInputError, MissingFieldError, or SignalInconsistencyError
 * when a bar fires on both sides.
 */
export function generateSignals(
  bars: readonly IndicatorBar[],
  profile: StrategyProfile,
  options: SignalOptions = DEFAULT_SIGNAL_OPTIONS,
): SignalRow[] {
  assertSignalInput(bars);

  log.debug(
    { profile: profile.name, trendMode: options.trendMode, bars: bars.length },
    'Generating signals',
  );

  const trend = calculateTrendFilters(bars, options.trendMode, profile.trendConfirmationPeriods);
  const macd = calculateMacdSignals(bars, profile.macdRequireZeroCross);
  const rsi = calculateRsiSignals(bars, profile.rsiBuyThreshold, profile.rsiSellThreshold);
  const volume =
    profile.useVolumeFilter && profile.volumeLookbackPeriods !== undefined
      ? calculateVolumeFilter(bars, profile.volumeLookbackPeriods)
      : null;

  const required = Math.min(profile.indicatorsRequired, CORE_FILTERS);
  const rows: SignalRow[] = [];

  for (let i = 0; i < bars.length; i++) {
    const volumeOk = volume ? volume[i] : undefined;
    const volumeGate = volumeOk ?? true;

    const longCount = Number(trend.long[i]) + Number(macd.long[i]) + Number(rsi.long[i]);
    const shortCount = Number(trend.short[i]) + Number(macd.short[i]) + Number(rsi.short[i]);

    const buySignal = volumeGate && longCount >= required;
    const sellSignal = volumeGate && shortCount >= required;

    if (buySignal && sellSignal) {
      log.error(
        { profile: profile.name, index: i, timestamp: bars[i].timestamp },
        'Simultaneous BUY and SELL signal',
      );
      throw new SignalInconsistencyError(
        `Simultaneous BUY and SELL signal at bar ${i} (${bars[i].timestamp})`,
        i,
      );
    }

    const condition: ConditionRow = {
      trendLongOk: trend.long[i],
      trendShortOk: trend.short[i],
      macdUpOk: macd.long[i],
      macdDownOk: macd.short[i],
      rsiUpOk: rsi.long[i],
      rsiDownOk: rsi.short[i],
      buySignal,
      sellSignal,
      decision: decide(buySignal, sellSignal),
    };
    if (volumeOk !== undefined) {
      condition.volumeOk = volumeOk;
    }

    rows.push({ ...bars[i], ...condition });
  }

  return rows;
}
