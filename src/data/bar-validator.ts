import { z } from 'zod';
import { EmptyInputError, InvalidBarError, MissingFieldError } from '../errors.js';
import type { Bar, IndicatorBar } from '../signals/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('bar-validator');

const barSchema = z.object({
  timestamp: z.string().min(1),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const indicatorBarSchema = barSchema.extend({
  sma20: z.number(),
  sma50: z.number(),
  sma200: z.number(),
  macd: z.number(),
  macdSignal: z.number(),
  rsi: z.number(),
});

function parseSeries<T>(input: unknown, schema: z.ZodType<T>): T[] {
  if (!Array.isArray(input)) {
    throw new InvalidBarError('Bar series must be an array');
  }
  if (input.length === 0) {
    throw new EmptyInputError('parse');
  }

  return input.map((raw: unknown, index) => {
    const result = schema.safeParse(raw);
    if (result.success) return result.data;

    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'bar';
    const absent = raw !== null && typeof raw === 'object' && !(field in raw);
    if (absent) {
      throw new MissingFieldError(field, index);
    }
    throw new InvalidBarError(`Invalid bar at ${index}: ${field}: ${issue.message}`, index);
  });
}

/** Parse untyped JSON (e.g. a file) into OHLCV bars. */
export function parseBars(input: unknown): Bar[] {
  return parseSeries(input, barSchema);
}

/** Parse untyped JSON into bars carrying precomputed indicator columns. */
export function parseIndicatorBars(input: unknown): IndicatorBar[] {
  return parseSeries(input, indicatorBarSchema);
}

/**
 * Data-quality gate for a bar series before indicator or signal work.
 * Throws EmptyInputError or InvalidBarError on the first violation.
 */
export function validateBarSeries(bars: readonly Bar[], minBars = 1): void {
  if (bars.length === 0) {
    throw new EmptyInputError('data');
  }
  if (bars.length < minBars) {
    throw new InvalidBarError(`Insufficient data: ${bars.length} bars, need at least ${minBars}`);
  }

  let prevTime = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < bars.length; i++) {
    const { timestamp, open, high, low, close, volume } = bars[i];

    for (const value of [open, high, low, close, volume]) {
      if (!Number.isFinite(value)) {
        throw new InvalidBarError(`Non-finite value at bar ${i}`, i);
      }
    }
    if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
      throw new InvalidBarError(`Invalid price at bar ${i}`, i);
    }
    if (high < low) {
      throw new InvalidBarError(`High price less than low price at bar ${i}`, i);
    }
    if (high < Math.max(open, close)) {
      throw new InvalidBarError(`High price less than open/close at bar ${i}`, i);
    }
    if (low > Math.min(open, close)) {
      throw new InvalidBarError(`Low price greater than open/close at bar ${i}`, i);
    }

    const time = Date.parse(timestamp);
    if (Number.isNaN(time)) {
      throw new InvalidBarError(`Unparseable timestamp at bar ${i}: ${timestamp}`, i);
    }
    if (time <= prevTime) {
      throw new InvalidBarError(`Timestamps not strictly increasing at bar ${i}`, i);
    }
    prevTime = time;
  }

  log.debug({ bars: bars.length }, 'Bar series passed data-quality checks');
}
