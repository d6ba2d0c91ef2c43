import { readFile } from 'node:fs/promises';
import { computeIndicators, dropWarmup } from './analysis/technical/indicators.js';
import { runStrategyComparison, type StrategyComparison } from './backtest/comparison.js';
import { generateComparisonTable, generateSummary } from './backtest/reporter.js';
import {
  type ConfigManager,
  configManager,
  loadBacktestConfig,
  loadSignalOptions,
} from './config/manager.js';
import { getAllStrategyProfiles, getStrategyProfile } from './config/strategy-profiles.js';
import { parseBars, parseIndicatorBars, validateBarSeries } from './data/bar-validator.js';
import type { IndicatorBar } from './signals/types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('runner');

export interface RunnerArgs {
  file: string;
  /** Preset to run; falls back to the signals.profile setting. */
  profile?: string;
  /** Input holds plain OHLCV bars; indicators are computed here. */
  raw: boolean;
}

export const USAGE = 'Usage: signal-backtest <bars.json> [--profile <name>] [--raw]';

export function parseArgs(argv: readonly string[]): RunnerArgs {
  let file: string | undefined;
  let profile: string | undefined;
  let raw = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--profile') {
      profile = argv[++i];
      if (!profile) throw new Error(`--profile requires a value. ${USAGE}`);
    } else if (arg === '--raw') {
      raw = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option ${arg}. ${USAGE}`);
    } else {
      file = arg;
    }
  }

  if (!file) throw new Error(USAGE);
  return { file, profile, raw };
}

/**
 * Turn parsed JSON into indicator bars, computing indicators first when the
 * input is plain OHLCV.
 */
export function prepareBars(
  input: unknown,
  raw: boolean,
  manager: ConfigManager = configManager,
): IndicatorBar[] {
  if (!raw) {
    const bars = parseIndicatorBars(input);
    validateBarSeries(bars);
    return bars;
  }

  const bars = parseBars(input);
  validateBarSeries(bars, manager.get<number>('data.minBars'));
  const withIndicators = computeIndicators(bars, {
    smaPeriods: manager.get<[number, number, number]>('indicators.smaPeriods'),
    macd: {
      fast: manager.get<number>('indicators.macd.fast'),
      slow: manager.get<number>('indicators.macd.slow'),
      signal: manager.get<number>('indicators.macd.signal'),
    },
    rsiPeriod: manager.get<number>('indicators.rsi.period'),
  });
  return dropWarmup(withIndicators, manager.get<number>('indicators.warmupBars'));
}

export const ALL_PROFILES = 'all';

export function runComparison(
  bars: readonly IndicatorBar[],
  profileName: string | undefined,
  manager: ConfigManager = configManager,
): StrategyComparison {
  const name = profileName ?? manager.get<string>('signals.profile');
  const profiles =
    name.toLowerCase() === ALL_PROFILES ? getAllStrategyProfiles() : [getStrategyProfile(name)];
  return runStrategyComparison(bars, profiles, {
    signals: loadSignalOptions(manager),
    backtest: loadBacktestConfig(manager),
  });
}

export function renderReport(comparison: StrategyComparison): string {
  const sections = comparison.results.map((r) => generateSummary(r));
  if (comparison.results.length > 1) {
    sections.push(generateComparisonTable(comparison));
  }
  return sections.join('\n\n');
}

export async function run(argv: readonly string[]): Promise<string> {
  const args = parseArgs(argv);
  log.info({ file: args.file, profile: args.profile, raw: args.raw }, 'Loading bars');

  const text = await readFile(args.file, 'utf8');
  const bars = prepareBars(JSON.parse(text), args.raw);
  const comparison = runComparison(bars, args.profile);
  return renderReport(comparison);
}
