import { EmptyInputError } from '../errors.js';
import type { Decision } from '../signals/types.js';
import { createLogger } from '../utils/logger.js';
import type {
  BacktestConfig,
  BacktestInputRow,
  BacktestPosition,
  BacktestResult,
  BacktestTrade,
  EquitySample,
  ExitReason,
} from './types.js';

const log = createLogger('backtest-engine');

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = {
  initialCapital: 10_000,
  commission: 0,
  slippage: 0.001,
};

export interface BacktestEngineOptions {
  config?: Partial<BacktestConfig>;
}

const FLAT: BacktestPosition = { side: 'FLAT', entryPrice: 0, entryTime: '' };

/**
 * Single-instrument, single-position simulation. A signal on bar t fills at
 * the open of bar t+1; a position still open after the last bar is unwound
 * at that bar's close without slippage. Each run() starts from fresh state.
 */
export class BacktestEngine {
  readonly config: BacktestConfig;
  private capital: number;
  private position: BacktestPosition;
  private trades: BacktestTrade[];
  private equityCurve: EquitySample[];

  constructor(options: BacktestEngineOptions = {}) {
    this.config = { ...DEFAULT_BACKTEST_CONFIG, ...options.config };
    this.capital = this.config.initialCapital;
    this.position = FLAT;
    this.trades = [];
    this.equityCurve = [];
  }

  run(rows: readonly BacktestInputRow[]): BacktestResult {
    if (rows.length === 0) {
      throw new EmptyInputError('backtest');
    }

    this.reset();

    log.info(
      {
        bars: rows.length,
        initialCapital: this.config.initialCapital,
        commission: this.config.commission,
        slippage: this.config.slippage,
      },
      'Starting backtest',
    );

    for (let i = 0; i < rows.length; i++) {
      const row = rows[i];

      // Equity is marked before this bar's signal is acted on
      const unrealizedPnl = this.unrealizedPnl(row.close);
      this.equityCurve.push({
        timestamp: row.timestamp,
        realizedCapital: this.capital,
        unrealizedPnl,
        totalEquity: this.capital + unrealizedPnl,
        positionSide: this.position.side,
        markPrice: row.close,
      });

      // Execution at next bar's open to avoid look-ahead bias
      const next = rows[i + 1];
      if (next && row.decision !== 'HOLD') {
        this.execute(row.decision, row.timestamp, next.open);
      }
    }

    const last = rows[rows.length - 1];
    if (this.position.side !== 'FLAT') {
      this.forceClose(last.timestamp, last.close);
    }

    log.info(
      { trades: this.trades.length, finalCapital: this.capital },
      'Backtest complete',
    );

    return {
      config: { ...this.config },
      trades: [...this.trades],
      equityCurve: [...this.equityCurve],
      finalCapital: this.capital,
    };
  }

  /** Slippage always works against the trader. */
  fillPrice(open: number, signal: Exclude<Decision, 'HOLD'>): number {
    return signal === 'BUY' ? open * (1 + this.config.slippage) : open * (1 - this.config.slippage);
  }

  private reset(): void {
    this.capital = this.config.initialCapital;
    this.position = FLAT;
    this.trades = [];
    this.equityCurve = [];
  }

  private unrealizedPnl(price: number): number {
    switch (this.position.side) {
      case 'LONG':
        return price - this.position.entryPrice;
      case 'SHORT':
        return this.position.entryPrice - price;
      default:
        return 0;
    }
  }

  private execute(signal: Exclude<Decision, 'HOLD'>, time: string, nextOpen: number): void {
    const target = signal === 'BUY' ? 'LONG' : 'SHORT';
    if (this.position.side === target) return;

    const price = this.fillPrice(nextOpen, signal);

    if (this.position.side !== 'FLAT') {
      this.close(time, price, 'reversal');
    }
    this.open(target, time, price);
  }

  private open(side: 'LONG' | 'SHORT', time: string, price: number): void {
    this.capital -= this.config.commission;
    this.position = { side, entryPrice: price, entryTime: time };
    log.debug({ side, price, time }, 'Entry executed');
  }

  private close(time: string, price: number, reason: ExitReason): void {
    const { side, entryPrice, entryTime } = this.position;
    if (side === 'FLAT') return;

    const pnl = this.unrealizedPnl(price);
    this.capital += pnl - this.config.commission;

    this.trades.push({
      entryTime,
      exitTime: time,
      entryPrice,
      exitPrice: price,
      side,
      pnl,
      commission: this.config.commission,
      exitReason: reason,
    });
    this.position = FLAT;

    log.debug({ side, entryPrice, exitPrice: price, pnl, reason, time }, 'Exit executed');
  }

  private forceClose(time: string, close: number): void {
    this.close(time, close, 'end_of_data');
  }
}
