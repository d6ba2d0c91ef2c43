import { z } from 'zod';

// ── Backtest ─────────────────────────────────────────────────────────────────
const backtestSchemas = new Map<string, z.ZodType>([
  ['backtest.initialCapital', z.number().positive()],
  ['backtest.commission', z.number().min(0)],
  ['backtest.slippage', z.number().min(0).max(1)],
]);

// ── Signals ──────────────────────────────────────────────────────────────────
export const trendModeSchema = z.enum(['pullback', 'stacked']);

const signalSchemas = new Map<string, z.ZodType>([
  ['signals.trendMode', trendModeSchema],
  ['signals.profile', z.string().min(1).max(100)],
]);

// ── Indicators ───────────────────────────────────────────────────────────────
const indicatorSchemas = new Map<string, z.ZodType>([
  [
    'indicators.smaPeriods',
    z.tuple([z.number().int().min(1), z.number().int().min(1), z.number().int().min(1)]),
  ],
  ['indicators.macd.fast', z.number().int().min(2).max(200)],
  ['indicators.macd.slow', z.number().int().min(2).max(200)],
  ['indicators.macd.signal', z.number().int().min(2).max(200)],
  ['indicators.rsi.period', z.number().int().min(2).max(200)],
  ['indicators.warmupBars', z.number().int().min(0).max(10_000)],
]);

// ── Data ─────────────────────────────────────────────────────────────────────
const dataSchemas = new Map<string, z.ZodType>([
  ['data.minBars', z.number().int().min(1).max(1_000_000)],
]);

// ── Merged schema map ────────────────────────────────────────────────────────
export const configSchemas: Map<string, z.ZodType> = new Map([
  ...backtestSchemas,
  ...signalSchemas,
  ...indicatorSchemas,
  ...dataSchemas,
]);

/**
 * Look up the Zod schema for a given config key.
 * Returns undefined for unknown keys.
 */
export function getConfigSchema(key: string): z.ZodType | undefined {
  return configSchemas.get(key);
}

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are considered valid (forward-compatibility).
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = configSchemas.get(key);
  if (!schema) {
    return { valid: true };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}

// ── Composite shapes ─────────────────────────────────────────────────────────

export const backtestConfigSchema = z.object({
  initialCapital: z.number().positive(),
  commission: z.number().min(0),
  slippage: z.number().min(0).max(1),
});

export const strategyProfileSchema = z
  .object({
    name: z.string().min(1).max(100),
    description: z.string().default(''),
    rsiBuyThreshold: z.number().min(0).max(100),
    rsiSellThreshold: z.number().min(0).max(100),
    macdRequireZeroCross: z.boolean(),
    trendConfirmationPeriods: z.number().int().min(1),
    indicatorsRequired: z.number().int().min(2).max(4),
    useVolumeFilter: z.boolean(),
    volumeLookbackPeriods: z.number().int().min(1).optional(),
  })
  .refine((p) => p.indicatorsRequired <= 3 + (p.useVolumeFilter ? 1 : 0), {
    message: 'indicatorsRequired exceeds the number of enabled filters',
    path: ['indicatorsRequired'],
  })
  .refine((p) => !p.useVolumeFilter || p.volumeLookbackPeriods !== undefined, {
    message: 'volumeLookbackPeriods is required when useVolumeFilter is enabled',
    path: ['volumeLookbackPeriods'],
  });

export type StrategyProfileInput = z.input<typeof strategyProfileSchema>;

/** Formats zod issues as "path: message" strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
  );
}
