/**
 * Typed reads from an indicator snapshot. Anything not ready reads as null.
 */

import { isBollingerValue, type BollingerValue, type IndicatorSnapshot } from '../indicators/index.js';

export function readNumber(snapshot: IndicatorSnapshot | null, key: string): number | null {
  const value = snapshot?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readBands(snapshot: IndicatorSnapshot | null, key: string): BollingerValue | null {
  const value = snapshot?.[key];
  return isBollingerValue(value) ? value : null;
}
