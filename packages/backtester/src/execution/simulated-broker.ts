/**
 * Simulated Broker
 *
 * Holds cash and at most one long position. Orders fill completely at the
 * given price; commission is charged on both sides as a fraction of the
 * traded notional. Orders that do not apply (BUY while positioned, SELL
 * while flat) are no-ops and return null.
 *
 * @example
 * ```typescript
 * const broker = new SimulatedBroker({ initialCapital: 10_000, commissionRate: 0.0005, positionSizeFraction: 0.95 });
 *
 * broker.on('position:closed', (trade) => {
 *   console.log('Closed with P&L', trade.pnl);
 * });
 *
 * broker.buy(bar, 0);
 * broker.sell(nextBar, 1);
 * ```
 */

import { EventEmitter } from 'events';
import type { Bar, ExitReason, Fill, Position, Signal, Trade } from '@barsim/shared';

/**
 * Simulated Broker Events
 */
export interface SimulatedBrokerEvents {
  'position:opened': (position: Position, fill: Fill) => void;
  'position:closed': (trade: Trade, fill: Fill) => void;
}

export interface BrokerConfig {
  initialCapital: number;
  commissionRate: number;
  /** Fraction of available cash committed on each BUY (0, 1] */
  positionSizeFraction: number;
}

export class SimulatedBroker extends EventEmitter {
  private cashBalance: number;
  private openPosition: Position | null = null;
  private readonly closedTrades: Trade[] = [];
  private readonly fills: Fill[] = [];

  constructor(private readonly config: BrokerConfig) {
    super();
    this.cashBalance = config.initialCapital;
  }

  /**
   * Route a strategy signal. HOLD never trades.
   */
  apply(signal: Signal, bar: Bar, index: number, price: number = bar.close): Fill | null {
    switch (signal) {
      case 'BUY':
        return this.buy(bar, index, price);
      case 'SELL':
        return this.sell(bar, index, price);
      case 'HOLD':
        return null;
    }
  }

  /**
   * Open a position sized from available cash
   */
  buy(bar: Bar, index: number, price: number = bar.close): Fill | null {
    if (this.openPosition !== null || this.cashBalance <= 0 || price <= 0) {
      return null;
    }

    const size = (this.cashBalance * this.config.positionSizeFraction) / price;
    const commission = price * size * this.config.commissionRate;
    this.cashBalance -= price * size + commission;

    const position: Position = {
      entryPrice: price,
      entryTimestamp: bar.timestamp,
      entryIndex: index,
      size,
      entryCommission: commission,
    };
    this.openPosition = position;

    const fill = this.recordFill('BUY', bar.timestamp, price, size, commission);
    this.emit('position:opened', { ...position }, fill);
    return fill;
  }

  /**
   * Close the open position
   */
  sell(bar: Bar, index: number, price: number = bar.close, reason: ExitReason = 'SIGNAL'): Fill | null {
    const position = this.openPosition;
    if (position === null) {
      return null;
    }

    const { size, entryPrice, entryCommission } = position;
    const commission = price * size * this.config.commissionRate;
    this.cashBalance += price * size - commission;
    this.openPosition = null;

    const commissionPaid = entryCommission + commission;
    const pnl = (price - entryPrice) * size - commissionPaid;

    const trade: Trade = {
      entryTimestamp: position.entryTimestamp,
      exitTimestamp: bar.timestamp,
      entryPrice,
      exitPrice: price,
      size,
      commissionPaid,
      pnl,
      pnlPct: (pnl / (entryPrice * size)) * 100,
      barsHeld: index - position.entryIndex,
      exitReason: reason,
    };
    this.closedTrades.push(trade);

    const fill = this.recordFill('SELL', bar.timestamp, price, size, commission);
    this.emit('position:closed', trade, fill);
    return fill;
  }

  /**
   * Close any open position at the bar close (end of data)
   */
  forceClose(bar: Bar, index: number): Trade | null {
    const fill = this.sell(bar, index, bar.close, 'END_OF_DATA');
    return fill === null ? null : (this.closedTrades[this.closedTrades.length - 1] ?? null);
  }

  /**
   * Account value at the given close
   */
  markToMarket(close: number): number {
    return this.cashBalance + (this.openPosition ? this.openPosition.size * close : 0);
  }

  get cash(): number {
    return this.cashBalance;
  }

  get position(): Readonly<Position> | null {
    return this.openPosition;
  }

  get inPosition(): boolean {
    return this.openPosition !== null;
  }

  getTrades(): Trade[] {
    return [...this.closedTrades];
  }

  getFills(): Fill[] {
    return [...this.fills];
  }

  private recordFill(side: Fill['side'], timestamp: number, price: number, size: number, commission: number): Fill {
    const fill: Fill = { side, timestamp, price, size, commission, cash: this.cashBalance };
    this.fills.push(fill);
    return fill;
  }
}
