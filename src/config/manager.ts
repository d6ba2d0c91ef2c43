import type { BacktestConfig } from '../backtest/types.js';
import { ConfigValidationError } from '../errors.js';
import type { SignalOptions } from '../signals/types.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import {
  backtestConfigSchema,
  formatIssues,
  trendModeSchema,
  validateConfigValue,
} from './schema-validator.js';

const log = createLogger('config');

export class ConfigManager {
  private overrides = new Map<string, unknown>();

  get<T>(key: string): T {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) return envOverride as T;

    if (this.overrides.has(key)) {
      return this.overrides.get(key) as T;
    }

    const def = CONFIG_DEFAULTS.find((d) => d.key === key);
    if (def) {
      return JSON.parse(def.value) as T;
    }

    throw new Error(`Config key not found: ${key}`);
  }

  set(key: string, value: unknown): void {
    const validation = validateConfigValue(key, value);
    if (!validation.valid) {
      throw new ConfigValidationError(
        `Invalid value for ${key}: ${validation.error}`,
        validation.error ? [validation.error] : [],
      );
    }
    this.overrides.set(key, value);
    log.info({ key, value }, 'Config updated');
  }

  getAll(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS) {
      result[def.key] = this.get(def.key);
    }
    for (const key of this.overrides.keys()) {
      result[key] = this.get(key);
    }
    return result;
  }

  getByCategory(category: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS.filter((d) => d.category === category)) {
      result[def.key] = this.get(def.key);
    }
    return result;
  }

  reset(key?: string): void {
    if (key) {
      this.overrides.delete(key);
    } else {
      this.overrides.clear();
    }
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "backtest.initialCapital" → "BACKTEST_INITIAL_CAPITAL"
   *      "indicators.macd.fast" → "INDICATORS_MACD_FAST"
   */
  private configKeyToEnvVar(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings.
   */
  private getEnvOverride(key: string): unknown | undefined {
    const envName = this.configKeyToEnvVar(key);
    const envValue = process.env[envName];

    if (envValue === undefined) return undefined;

    try {
      return JSON.parse(envValue);
    } catch {
      return envValue;
    }
  }
}

export const configManager = new ConfigManager();

export function loadBacktestConfig(manager: ConfigManager = configManager): BacktestConfig {
  const result = backtestConfigSchema.safeParse({
    initialCapital: manager.get('backtest.initialCapital'),
    commission: manager.get('backtest.commission'),
    slippage: manager.get('backtest.slippage'),
  });
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigValidationError(`Invalid backtest config: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function loadSignalOptions(manager: ConfigManager = configManager): SignalOptions {
  const result = trendModeSchema.safeParse(manager.get('signals.trendMode'));
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigValidationError(`Invalid signals.trendMode: ${issues.join('; ')}`, issues);
  }
  return { trendMode: result.data };
}
