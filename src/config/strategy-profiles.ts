import { ConfigValidationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import {
  formatIssues,
  type StrategyProfileInput,
  strategyProfileSchema,
} from './schema-validator.js';

const log = createLogger('strategy-profiles');

export interface StrategyProfile {
  readonly name: string;
  readonly description: string;
  readonly rsiBuyThreshold: number;
  readonly rsiSellThreshold: number;
  readonly macdRequireZeroCross: boolean;
  /** Consecutive trailing bars the trend condition must hold. */
  readonly trendConfirmationPeriods: number;
  /**
   * How many of trend, MACD and RSI must agree on a side. A value of 4 with
   * the volume filter on means all three plus volume.
   */
  readonly indicatorsRequired: number;
  readonly useVolumeFilter: boolean;
  readonly volumeLookbackPeriods?: number;
}

export const STRATEGY_NAMES = ['current', 'aggressive', 'conservative'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Validate arbitrary profile parameters and return a frozen profile.
 * Throws ConfigValidationError listing every violated constraint.
 */
export function createStrategyProfile(input: StrategyProfileInput): StrategyProfile {
  const result = strategyProfileSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    log.error({ name: input.name, issues }, 'Invalid strategy profile');
    throw new ConfigValidationError(
      `Invalid strategy profile ${input.name}: ${issues.join('; ')}`,
      issues,
    );
  }
  return Object.freeze(result.data);
}

// Built-in presets
const PRESET_CURRENT = createStrategyProfile({
  name: 'current',
  description: 'All 3 indicators (trend + MACD + RSI) must align',
  rsiBuyThreshold: 52,
  rsiSellThreshold: 48,
  macdRequireZeroCross: true,
  trendConfirmationPeriods: 1,
  indicatorsRequired: 3,
  useVolumeFilter: false,
});

const PRESET_AGGRESSIVE = createStrategyProfile({
  name: 'aggressive',
  description: 'Any 2 of 3 indicators must align, any MACD cross, faster RSI crossover',
  rsiBuyThreshold: 50,
  rsiSellThreshold: 50,
  macdRequireZeroCross: false,
  trendConfirmationPeriods: 1,
  indicatorsRequired: 2,
  useVolumeFilter: false,
});

const PRESET_CONSERVATIVE = createStrategyProfile({
  name: 'conservative',
  description: 'All 3 indicators plus volume confirmation and a 3-bar trend',
  rsiBuyThreshold: 55,
  rsiSellThreshold: 45,
  macdRequireZeroCross: true,
  trendConfirmationPeriods: 3,
  indicatorsRequired: 3,
  useVolumeFilter: true,
  volumeLookbackPeriods: 20,
});

const PRESETS: Record<StrategyName, StrategyProfile> = {
  current: PRESET_CURRENT,
  aggressive: PRESET_AGGRESSIVE,
  conservative: PRESET_CONSERVATIVE,
};

export function isStrategyName(name: string): name is StrategyName {
  return STRATEGY_NAMES.some((n) => n === name);
}

export function getStrategyProfile(name: string): StrategyProfile {
  const key = name.toLowerCase();
  if (!isStrategyName(key)) {
    throw new ConfigValidationError(
      `Strategy profile not found: ${name} (expected one of ${STRATEGY_NAMES.join(', ')})`,
    );
  }
  return PRESETS[key];
}

export function getAllStrategyProfiles(): StrategyProfile[] {
  return STRATEGY_NAMES.map((name) => PRESETS[name]);
}
