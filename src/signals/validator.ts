import { SignalInconsistencyError } from '../errors.js';
import { round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import type { ConditionRow, SignalSummary, SignalValidation, TrendMode } from './types.js';

const log = createLogger('signal-validator');

type ValidatedRow = ConditionRow & { timestamp: string };

function invalid(error: string, totalBars: number): SignalValidation {
  return {
    valid: false,
    error,
    totalBars,
    buySignals: 0,
    sellSignals: 0,
    holdSignals: 0,
    signalRate: 0,
  };
}

/**
 * Cross-check a produced signal series. Any inconsistency invalidates the
 * whole series; nothing is repaired.
 */
export function validateSignals(rows: readonly ConditionRow[]): SignalValidation {
  if (rows.length === 0) {
    return invalid('Data is empty', 0);
  }

  let buySignals = 0;
  let sellSignals = 0;
  let decisionBuy = 0;
  let decisionSell = 0;
  let holdSignals = 0;
  let simultaneous = 0;

  for (const row of rows) {
    if (row.buySignal) buySignals++;
    if (row.sellSignal) sellSignals++;
    if (row.buySignal && row.sellSignal) simultaneous++;
    if (row.decision === 'BUY') decisionBuy++;
    else if (row.decision === 'SELL') decisionSell++;
    else holdSignals++;
  }

  if (simultaneous > 0) {
    return invalid(`Found ${simultaneous} simultaneous BUY and SELL signals`, rows.length);
  }
  if (buySignals !== decisionBuy) {
    return invalid(`BUY signal mismatch: ${buySignals} vs ${decisionBuy}`, rows.length);
  }
  if (sellSignals !== decisionSell) {
    return invalid(`SELL signal mismatch: ${sellSignals} vs ${decisionSell}`, rows.length);
  }

  return {
    valid: true,
    totalBars: rows.length,
    buySignals,
    sellSignals,
    holdSignals,
    signalRate: (buySignals + sellSignals) / rows.length,
  };
}

/**
 * Throwing variant used by the pipeline.
 */
export function assertValidSignals(rows: readonly ConditionRow[]): SignalValidation {
  const validation = validateSignals(rows);
  if (!validation.valid) {
    log.error({ error: validation.error }, 'Signal validation failed');
    throw new SignalInconsistencyError(validation.error ?? 'Signal validation failed');
  }
  return validation;
}

export function getSignalSummary(
  rows: readonly ValidatedRow[],
  trendMode: TrendMode,
): SignalSummary {
  const validation = assertValidSignals(rows);

  const signalTimes = rows.filter((r) => r.buySignal || r.sellSignal).map((r) => r.timestamp);
  const totalBars = rows.length;

  return {
    trendMode,
    totalBars,
    buySignals: validation.buySignals,
    sellSignals: validation.sellSignals,
    holdSignals: validation.holdSignals,
    buyFrequencyPct: round((validation.buySignals / totalBars) * 100, 2),
    sellFrequencyPct: round((validation.sellSignals / totalBars) * 100, 2),
    firstSignalTime: signalTimes[0] ?? null,
    lastSignalTime: signalTimes.length > 0 ? signalTimes[signalTimes.length - 1] : null,
    validation,
  };
}
