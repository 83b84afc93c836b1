/**
 * Trading types for the simulated broker
 */

/**
 * Strategy decision for a single bar
 */
export type Signal = 'BUY' | 'SELL' | 'HOLD';

/**
 * Why a position was closed
 */
export type ExitReason = 'SIGNAL' | 'END_OF_DATA';

/**
 * Open long position (at most one at a time)
 */
export interface Position {
  entryPrice: number;
  /** Unix timestamp in seconds */
  entryTimestamp: number;
  /** Index of the entry bar */
  entryIndex: number;
  /** Units held, always > 0 */
  size: number;
  /** Commission paid when opening */
  entryCommission: number;
}

/**
 * Closed round trip
 */
export interface Trade {
  entryTimestamp: number;
  exitTimestamp: number;
  entryPrice: number;
  exitPrice: number;
  size: number;
  /** Entry plus exit commission */
  commissionPaid: number;
  /** (exitPrice - entryPrice) * size - commissionPaid */
  pnl: number;
  /** pnl relative to the entry notional, in % */
  pnlPct: number;
  barsHeld: number;
  exitReason: ExitReason;
}

/**
 * Executed BUY or SELL
 */
export interface Fill {
  side: 'BUY' | 'SELL';
  timestamp: number;
  price: number;
  size: number;
  commission: number;
  /** Cash after the fill */
  cash: number;
}

/**
 * Portfolio value at the close of one bar
 */
export interface EquityPoint {
  timestamp: number;
  value: number;
}
