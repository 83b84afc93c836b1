/**
 * Market Data Feed
 *
 * Turns raw rows into a validated, strictly ascending bar sequence.
 * Nothing is sorted or de-duplicated here: out-of-order data is an error.
 */

import { BarSchema, ConfigurationError, MarketDataError, type Bar, type DateRange } from '@barsim/shared';

/**
 * Validate rows and return them as bars
 *
 * @throws ConfigurationError when a row is missing a field or holds an invalid value
 * @throws MarketDataError when timestamps are not strictly increasing
 */
export function createMarketFeed(rows: readonly unknown[]): Bar[] {
  const bars: Bar[] = [];

  rows.forEach((row, index) => {
    const parsed = BarSchema.safeParse(row);
    if (!parsed.success) {
      throw ConfigurationError.fromZod(`Invalid bar at row ${index}`, parsed.error);
    }

    const bar = parsed.data;
    const previous = bars[bars.length - 1];
    if (previous && bar.timestamp <= previous.timestamp) {
      throw new MarketDataError(
        bar.timestamp === previous.timestamp
          ? `Duplicate timestamp ${bar.timestamp} at row ${index}`
          : `Timestamp ${bar.timestamp} at row ${index} is earlier than ${previous.timestamp}`,
        { index, timestamp: bar.timestamp, previousTimestamp: previous.timestamp }
      );
    }

    bars.push(bar);
  });

  return bars;
}

/**
 * Date range covered by the bars, or null when there are none
 */
export function getDateRange(bars: readonly Bar[]): DateRange | null {
  const first = bars[0];
  const last = bars[bars.length - 1];
  if (!first || !last) return null;

  return {
    from: new Date(first.timestamp * 1000),
    to: new Date(last.timestamp * 1000),
    barCount: bars.length,
  };
}

/**
 * Bars whose timestamp falls inside [from, to]; either bound may be omitted
 */
export function filterBarsByDate(bars: readonly Bar[], range: { from?: Date; to?: Date }): Bar[] {
  const from = range.from ? range.from.getTime() / 1000 : -Infinity;
  const to = range.to ? range.to.getTime() / 1000 : Infinity;
  return bars.filter((bar) => bar.timestamp >= from && bar.timestamp <= to);
}
