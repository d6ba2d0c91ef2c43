export interface ConfigDefault {
  key: string;
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Backtest
  {
    key: 'backtest.initialCapital',
    value: '10000',
    category: 'backtest',
    description: 'Starting capital',
  },
  {
    key: 'backtest.commission',
    value: '0',
    category: 'backtest',
    description: 'Flat fee per executed order',
  },
  {
    key: 'backtest.slippage',
    value: '0.001',
    category: 'backtest',
    description: 'Adverse fill slippage as a fraction of the open price',
  },

  // Signals
  {
    key: 'signals.trendMode',
    value: '"pullback"',
    category: 'signals',
    description: 'pullback | stacked',
  },
  {
    key: 'signals.profile',
    value: '"all"',
    category: 'signals',
    description: 'Preset to run: current | aggressive | conservative | all',
  },

  // Indicators
  {
    key: 'indicators.smaPeriods',
    value: '[20,50,200]',
    category: 'indicators',
    description: 'Short, medium and long SMA periods',
  },
  {
    key: 'indicators.macd.fast',
    value: '12',
    category: 'indicators',
    description: 'MACD fast EMA',
  },
  {
    key: 'indicators.macd.slow',
    value: '26',
    category: 'indicators',
    description: 'MACD slow EMA',
  },
  {
    key: 'indicators.macd.signal',
    value: '9',
    category: 'indicators',
    description: 'MACD signal EMA',
  },
  { key: 'indicators.rsi.period', value: '14', category: 'indicators', description: 'RSI period' },
  {
    key: 'indicators.warmupBars',
    value: '200',
    category: 'indicators',
    description: 'Bars dropped before analysis starts',
  },

  // Data
  {
    key: 'data.minBars',
    value: '200',
    category: 'data',
    description: 'Minimum bars required by the data-quality check',
  },
];
