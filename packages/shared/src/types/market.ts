/**
 * Market data types
 */

/**
 * Represents a single OHLCV bar
 */
export interface Bar {
  /** Bar start time (Unix timestamp in seconds) */
  timestamp: number;
  /** Opening price */
  open: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
  /** Closing price */
  close: number;
  /** Traded volume */
  volume: number;
}

/**
 * Date range covered by a bar series
 */
export interface DateRange {
  from: Date;
  to: Date;
  barCount: number;
}
