import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { InvalidSeriesError, MissingColumnError } from '../core/errors';
import { BASE_COLUMNS } from '../types/market';
import type { Bar, PriceSeries } from '../types/market';
import { createSeries } from '../utils/SeriesUtils';

const recordsSchema = z.array(z.record(z.string(), z.string()));

const parseRecords = (content: string): Promise<unknown> =>
  new Promise((resolve, reject) => {
    parse(
      content,
      {
        columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
        skip_empty_lines: true,
        trim: true,
      },
      (err, records) => {
        if (err) reject(err);
        else resolve(records);
      }
    );
  });

/** Epoch milliseconds, or anything Date.parse understands (ISO dates). */
export const parseTimestamp = (raw: string): number => {
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return Date.parse(raw);
};

const parseNumber = (raw: string | undefined): number => {
  if (raw === undefined || raw === '') return NaN;
  return Number(raw);
};

/**
 * Parses OHLCV rows with a header line. Header names are matched
 * case-insensitively; any extra numeric column is kept as a series column.
 * Rows are ordered by timestamp.
 */
export const parseCsv = async (content: string): Promise<PriceSeries> => {
  const records = recordsSchema.parse(await parseRecords(content));
  if (records.length === 0) {
    return createSeries([]);
  }

  const header = Object.keys(records[0]);
  const missing = BASE_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }
  const baseColumns: readonly string[] = BASE_COLUMNS;
  const extraColumns = header.filter((column) => !baseColumns.includes(column));

  const bars: Bar[] = records.map((record, row) => {
    const timestamp = parseTimestamp(record.timestamp);
    if (Number.isNaN(timestamp)) {
      throw new InvalidSeriesError(`Row ${row + 1} has an unreadable timestamp '${record.timestamp}'`);
    }

    const bar: Bar = {
      timestamp,
      open: parseNumber(record.open),
      high: parseNumber(record.high),
      low: parseNumber(record.low),
      close: parseNumber(record.close),
      volume: parseNumber(record.volume),
    };
    for (const column of extraColumns) {
      bar[column] = parseNumber(record[column]);
    }
    return bar;
  });

  bars.sort((a, b) => a.timestamp - b.timestamp);
  return createSeries(bars, extraColumns);
};

export const loadCsv = async (filePath: string): Promise<PriceSeries> => {
  const resolved = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
  const content = await fs.readFile(resolved, 'utf-8');
  return parseCsv(content);
};
