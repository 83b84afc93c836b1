/**
 * CSV Loader
 *
 * Reads header-led OHLCV files into bars. Rows go through the market feed,
 * so the same validation and ordering rules apply as for in-memory data.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BACKTEST_ERROR_CODES, MarketDataError, type Bar } from '@barsim/shared';
import { createMarketFeed } from './market-feed.js';

export type TimestampFormat = 'unix_s' | 'unix_ms' | 'iso';

/**
 * CSV parsing options
 */
export interface CSVLoadOptions {
  /** Column name or index for timestamp (default: 'timestamp') */
  timestampColumn?: string | number;
  openColumn?: string | number;
  highColumn?: string | number;
  lowColumn?: string | number;
  closeColumn?: string | number;
  /** Column for volume; null when the file has none (volume is then 0) */
  volumeColumn?: string | number | null;
  /** Delimiter (default: ',') */
  delimiter?: string;
  /** Has header row (default: true) */
  hasHeader?: boolean;
  /** Timestamp format (default: 'unix_s') */
  timestampFormat?: TimestampFormat;
}

const DEFAULT_OPTIONS: Required<CSVLoadOptions> = {
  timestampColumn: 'timestamp',
  openColumn: 'open',
  highColumn: 'high',
  lowColumn: 'low',
  closeColumn: 'close',
  volumeColumn: 'volume',
  delimiter: ',',
  hasHeader: true,
  timestampFormat: 'unix_s',
};

/**
 * Parse a CSV line handling quoted values
 */
export function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Get column index from header or use numeric index
 */
function getColumnIndex(column: string | number, headers: string[]): number {
  if (typeof column === 'number') {
    return column;
  }

  const index = headers.findIndex((h) => h.toLowerCase() === column.toLowerCase());

  if (index === -1) {
    throw new MarketDataError(
      `Column "${column}" not found in headers: ${headers.join(', ')}`,
      { column, headers },
      BACKTEST_ERROR_CODES.DATA_INVALID_FORMAT
    );
  }

  return index;
}

/** Empty cells read as NaN so validation reports them */
function toNumber(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return Number.NaN;
  return Number(value);
}

/**
 * Parse timestamp based on format, returning Unix seconds
 */
export function parseTimestamp(value: string | undefined, format: TimestampFormat): number {
  switch (format) {
    case 'unix_s':
      return toNumber(value);
    case 'unix_ms':
      return Math.floor(toNumber(value) / 1000);
    case 'iso':
      return value === undefined ? Number.NaN : Math.floor(Date.parse(value) / 1000);
  }
}

/**
 * Parse CSV text into bars
 */
export function parseBarsFromCSV(content: string, options?: CSVLoadOptions): Bar[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);

  const firstLine = lines[0];
  if (firstLine === undefined) {
    throw new MarketDataError('CSV data is empty', undefined, BACKTEST_ERROR_CODES.DATA_INVALID_FORMAT);
  }

  const headers = opts.hasHeader
    ? parseCSVLine(firstLine, opts.delimiter)
    : parseCSVLine(firstLine, opts.delimiter).map((_, i) => i.toString());
  const dataLines = opts.hasHeader ? lines.slice(1) : lines;

  const tsIdx = getColumnIndex(opts.timestampColumn, headers);
  const openIdx = getColumnIndex(opts.openColumn, headers);
  const highIdx = getColumnIndex(opts.highColumn, headers);
  const lowIdx = getColumnIndex(opts.lowColumn, headers);
  const closeIdx = getColumnIndex(opts.closeColumn, headers);
  const volumeIdx = opts.volumeColumn === null ? null : getColumnIndex(opts.volumeColumn, headers);

  const rows = dataLines.map((line) => {
    const values = parseCSVLine(line, opts.delimiter);
    return {
      timestamp: parseTimestamp(values[tsIdx], opts.timestampFormat),
      open: toNumber(values[openIdx]),
      high: toNumber(values[highIdx]),
      low: toNumber(values[lowIdx]),
      close: toNumber(values[closeIdx]),
      volume: volumeIdx === null ? 0 : toNumber(values[volumeIdx]),
    };
  });

  return createMarketFeed(rows);
}

/**
 * Load bars from a CSV file
 *
 * @throws MarketDataError when the file is missing or malformed
 * @throws ConfigurationError when a row holds an invalid value
 */
export function loadBarsFromCSV(filePath: string, options?: CSVLoadOptions): Bar[] {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new MarketDataError(
      `CSV file not found: ${absolutePath}`,
      { path: absolutePath },
      BACKTEST_ERROR_CODES.DATA_NOT_FOUND
    );
  }

  return parseBarsFromCSV(fs.readFileSync(absolutePath, 'utf-8'), options);
}
