/**
 * Tests for SimulatedBroker
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Bar } from '@barsim/shared';
import { SimulatedBroker } from './simulated-broker.js';

function bar(timestamp: number, close: number, open: number = close): Bar {
  return { timestamp, open, high: Math.max(open, close), low: Math.min(open, close), close, volume: 100 };
}

describe('SimulatedBroker', () => {
  let broker: SimulatedBroker;

  beforeEach(() => {
    broker = new SimulatedBroker({
      initialCapital: 10_000,
      commissionRate: 0.001,
      positionSizeFraction: 0.5,
    });
  });

  describe('buy', () => {
    it('should size the position from cash and charge commission', () => {
      const fill = broker.buy(bar(1, 100), 0);

      expect(fill).not.toBeNull();
      expect(fill?.size).toBe(50);
      expect(fill?.commission).toBeCloseTo(5, 10);
      expect(broker.cash).toBeCloseTo(4995, 10);
      expect(broker.inPosition).toBe(true);
      expect(broker.position?.entryPrice).toBe(100);
    });

    it('should ignore a BUY while positioned', () => {
      broker.buy(bar(1, 100), 0);
      const cashAfterFirst = broker.cash;

      expect(broker.buy(bar(2, 90), 1)).toBeNull();
      expect(broker.cash).toBe(cashAfterFirst);
      expect(broker.getFills()).toHaveLength(1);
    });

    it('should emit position:opened', () => {
      const onOpened = vi.fn();
      broker.on('position:opened', onOpened);

      broker.buy(bar(1, 100), 0);

      expect(onOpened).toHaveBeenCalledTimes(1);
      expect(onOpened.mock.calls[0]?.[0]).toMatchObject({ entryPrice: 100, size: 50, entryIndex: 0 });
    });
  });

  describe('sell', () => {
    it('should ignore a SELL while flat', () => {
      expect(broker.sell(bar(1, 100), 0)).toBeNull();
      expect(broker.cash).toBe(10_000);
      expect(broker.getTrades()).toHaveLength(0);
    });

    it('should realize the trade net of both commissions', () => {
      broker.buy(bar(1, 100), 0);
      broker.sell(bar(4, 110), 3);

      const [trade] = broker.getTrades();
      expect(trade).toBeDefined();
      expect(trade?.entryTimestamp).toBe(1);
      expect(trade?.exitTimestamp).toBe(4);
      expect(trade?.commissionPaid).toBeCloseTo(10.5, 10);
      expect(trade?.pnl).toBeCloseTo(489.5, 10);
      expect(trade?.pnlPct).toBeCloseTo(9.79, 10);
      expect(trade?.barsHeld).toBe(3);
      expect(trade?.exitReason).toBe('SIGNAL');
      expect(broker.cash).toBeCloseTo(10_489.5, 10);
      expect(broker.inPosition).toBe(false);
    });

    it('should emit position:closed with the trade', () => {
      const onClosed = vi.fn();
      broker.on('position:closed', onClosed);

      broker.buy(bar(1, 100), 0);
      broker.sell(bar(2, 90), 1);

      expect(onClosed).toHaveBeenCalledTimes(1);
      expect(onClosed.mock.calls[0]?.[0]).toMatchObject({ entryPrice: 100, exitPrice: 90 });
    });

    it('should fill at an explicit price', () => {
      broker.buy(bar(1, 100, 98), 0, 98);
      expect(broker.position?.entryPrice).toBe(98);
    });
  });

  describe('apply', () => {
    it('should route signals and never trade on HOLD', () => {
      expect(broker.apply('HOLD', bar(1, 100), 0)).toBeNull();
      expect(broker.apply('SELL', bar(1, 100), 0)).toBeNull();
      expect(broker.apply('BUY', bar(1, 100), 0)?.side).toBe('BUY');
      expect(broker.apply('SELL', bar(2, 100), 1)?.side).toBe('SELL');
    });
  });

  describe('forceClose', () => {
    it('should close the open position with END_OF_DATA', () => {
      broker.buy(bar(1, 100), 0);
      const trade = broker.forceClose(bar(2, 120), 1);

      expect(trade?.exitReason).toBe('END_OF_DATA');
      expect(trade?.exitPrice).toBe(120);
      expect(broker.inPosition).toBe(false);
    });

    it('should return null when flat', () => {
      expect(broker.forceClose(bar(1, 100), 0)).toBeNull();
    });
  });

  describe('markToMarket', () => {
    it('should value cash plus the position at the close', () => {
      expect(broker.markToMarket(100)).toBe(10_000);

      broker.buy(bar(1, 100), 0);
      expect(broker.markToMarket(120)).toBeCloseTo(4995 + 50 * 120, 10);
    });
  });
});
