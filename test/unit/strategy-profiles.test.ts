import { describe, expect, it } from 'vitest';
import {
  createStrategyProfile,
  getAllStrategyProfiles,
  getStrategyProfile,
  isStrategyName,
  STRATEGY_NAMES,
} from '../../src/config/strategy-profiles.js';
import type { StrategyProfileInput } from '../../src/config/schema-validator.js';
import { ConfigValidationError } from '../../src/errors.js';

const VALID: StrategyProfileInput = {
  name: 'custom',
  rsiBuyThreshold: 60,
  rsiSellThreshold: 40,
  macdRequireZeroCross: false,
  trendConfirmationPeriods: 2,
  indicatorsRequired: 2,
  useVolumeFilter: false,
};

describe('strategy presets', () => {
  it('current requires all three filters with zero-cross MACD', () => {
    expect(getStrategyProfile('current')).toMatchObject({
      name: 'current',
      rsiBuyThreshold: 52,
      rsiSellThreshold: 48,
      macdRequireZeroCross: true,
      trendConfirmationPeriods: 1,
      indicatorsRequired: 3,
      useVolumeFilter: false,
    });
  });

  it('aggressive requires two filters and accepts any MACD cross', () => {
    expect(getStrategyProfile('aggressive')).toMatchObject({
      rsiBuyThreshold: 50,
      rsiSellThreshold: 50,
      macdRequireZeroCross: false,
      trendConfirmationPeriods: 1,
      indicatorsRequired: 2,
      useVolumeFilter: false,
    });
  });

  it('conservative adds the volume filter and a 3-bar trend', () => {
    expect(getStrategyProfile('conservative')).toMatchObject({
      rsiBuyThreshold: 55,
      rsiSellThreshold: 45,
      macdRequireZeroCross: true,
      trendConfirmationPeriods: 3,
      indicatorsRequired: 3,
      useVolumeFilter: true,
      volumeLookbackPeriods: 20,
    });
  });

  it('presets are frozen', () => {
    expect(Object.isFrozen(getStrategyProfile('current'))).toBe(true);
  });
});

describe('getStrategyProfile', () => {
  it('matches names case-insensitively', () => {
    expect(getStrategyProfile('AGGRESSIVE').name).toBe('aggressive');
  });

  it('throws ConfigValidationError for an unknown name', () => {
    expect(() => getStrategyProfile('turbo')).toThrow(ConfigValidationError);
    expect(() => getStrategyProfile('turbo')).toThrow(
      'Strategy profile not found: turbo (expected one of current, aggressive, conservative)',
    );
  });
});

describe('getAllStrategyProfiles', () => {
  it('returns the presets in declaration order', () => {
    expect(getAllStrategyProfiles().map((p) => p.name)).toEqual([...STRATEGY_NAMES]);
  });
});

describe('isStrategyName', () => {
  it('accepts preset names only', () => {
    expect(isStrategyName('current')).toBe(true);
    expect(isStrategyName('Current')).toBe(false);
    expect(isStrategyName('other')).toBe(false);
  });
});

describe('createStrategyProfile', () => {
  it('returns a frozen profile with an empty default description', () => {
    const profile = createStrategyProfile(VALID);
    expect(profile.description).toBe('');
    expect(profile.indicatorsRequired).toBe(2);
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('rejects thresholds outside 0..100', () => {
    expect(() => createStrategyProfile({ ...VALID, rsiBuyThreshold: 101 })).toThrow(
      ConfigValidationError,
    );
  });

  it('rejects indicatorsRequired below 2', () => {
    expect(() => createStrategyProfile({ ...VALID, indicatorsRequired: 1 })).toThrow(
      ConfigValidationError,
    );
  });

  it('rejects a non-integer confirmation period', () => {
    expect(() => createStrategyProfile({ ...VALID, trendConfirmationPeriods: 1.5 })).toThrow(
      ConfigValidationError,
    );
  });

  it('rejects requiring more filters than are enabled', () => {
    try {
      createStrategyProfile({ ...VALID, indicatorsRequired: 4 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.issues).toEqual([
          'indicatorsRequired: indicatorsRequired exceeds the number of enabled filters',
        ]);
      }
    }
  });

  it('allows four required filters when volume is enabled', () => {
    const profile = createStrategyProfile({
      ...VALID,
      indicatorsRequired: 4,
      useVolumeFilter: true,
      volumeLookbackPeriods: 10,
    });
    expect(profile.indicatorsRequired).toBe(4);
  });

  it('requires a lookback when the volume filter is on', () => {
    try {
      createStrategyProfile({ ...VALID, useVolumeFilter: true });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.issues).toEqual([
          'volumeLookbackPeriods: volumeLookbackPeriods is required when useVolumeFilter is enabled',
        ]);
        expect(err.code).toBe('INVALID_CONFIG');
      }
    }
  });
});
