import { describe, expect, it } from 'vitest';
import { parseBars, parseIndicatorBars, validateBarSeries } from '../../src/data/bar-validator.js';
import { EmptyInputError, InvalidBarError, MissingFieldError } from '../../src/errors.js';
import type { Bar } from '../../src/signals/types.js';
import { barTime, makeBar } from '../helpers/fixtures.js';

function bar(index: number, overrides: Partial<Bar> = {}): Bar {
  return {
    timestamp: barTime(index),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    ...overrides,
  };
}

describe('parseBars', () => {
  it('parses plain OHLCV objects', () => {
    const input = JSON.parse(JSON.stringify([bar(0), bar(1)]));
    expect(parseBars(input)).toEqual([bar(0), bar(1)]);
  });

  it('strips unknown keys', () => {
    const [parsed] = parseBars([{ ...bar(0), symbol: 'TEST' }]);
    expect(parsed).not.toHaveProperty('symbol');
  });

  it('rejects a non-array input', () => {
    expect(() => parseBars({ bars: [] })).toThrow(InvalidBarError);
    expect(() => parseBars({ bars: [] })).toThrow('Bar series must be an array');
  });

  it('throws EmptyInputError on an empty array', () => {
    expect(() => parseBars([])).toThrow(EmptyInputError);
  });

  it('throws MissingFieldError naming the absent field and bar', () => {
    const { volume: _volume, ...withoutVolume } = bar(1);
    try {
      parseBars([bar(0), withoutVolume]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingFieldError);
      expect(err).toMatchObject({ field: 'volume', index: 1 });
    }
  });

  it('throws InvalidBarError for a present field of the wrong type', () => {
    expect(() => parseBars([{ ...bar(0), close: '100' }])).toThrow(
      'Invalid bar at 0: close: Expected number, received string',
    );
  });
});

describe('parseIndicatorBars', () => {
  it('requires the indicator columns', () => {
    const { rsi: _rsi, ...withoutRsi } = makeBar(0);
    expect(() => parseIndicatorBars([withoutRsi])).toThrow(
      'Missing required field "rsi" at bar 0',
    );
  });

  it('parses complete indicator bars', () => {
    expect(parseIndicatorBars([makeBar(0)])).toEqual([makeBar(0)]);
  });
});

describe('validateBarSeries', () => {
  it('accepts a well-formed series', () => {
    expect(() => validateBarSeries([bar(0), bar(1), bar(2)])).not.toThrow();
  });

  it('throws EmptyInputError on an empty series', () => {
    expect(() => validateBarSeries([])).toThrow(EmptyInputError);
  });

  it('enforces the minimum bar count', () => {
    expect(() => validateBarSeries([bar(0)], 2)).toThrow(
      'Insufficient data: 1 bars, need at least 2',
    );
  });

  it('rejects non-finite values', () => {
    expect(() => validateBarSeries([bar(0, { volume: Number.NaN })])).toThrow(
      'Non-finite value at bar 0',
    );
  });

  it('rejects non-positive prices', () => {
    expect(() => validateBarSeries([bar(0, { low: 0 })])).toThrow('Invalid price at bar 0');
  });

  it('rejects high below low', () => {
    expect(() => validateBarSeries([bar(0, { high: 98 })])).toThrow(
      'High price less than low price at bar 0',
    );
  });

  it('rejects high below the open or close', () => {
    expect(() => validateBarSeries([bar(0, { close: 102, high: 101 })])).toThrow(
      'High price less than open/close at bar 0',
    );
  });

  it('rejects low above the open or close', () => {
    expect(() => validateBarSeries([bar(0, { open: 98 })])).toThrow(
      'Low price greater than open/close at bar 0',
    );
  });

  it('rejects unparseable timestamps', () => {
    expect(() => validateBarSeries([bar(0, { timestamp: 'not-a-date' })])).toThrow(
      'Unparseable timestamp at bar 0: not-a-date',
    );
  });

  it('rejects out-of-order and duplicate timestamps', () => {
    expect(() => validateBarSeries([bar(1), bar(0)])).toThrow(
      'Timestamps not strictly increasing at bar 1',
    );
    expect(() => validateBarSeries([bar(0), bar(0)])).toThrow(InvalidBarError);
  });

  it('reports the offending index', () => {
    try {
      validateBarSeries([bar(0), bar(1), bar(2, { high: 98 })]);
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ index: 2, code: 'INVALID_BAR' });
    }
  });
});
