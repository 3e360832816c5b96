import { InvalidSeriesError, UnknownColumnError } from '../core/errors';
import { BASE_COLUMNS } from '../types/market';
import type { Bar, OHLCV, PriceSeries } from '../types/market';

const baseColumns: readonly string[] = BASE_COLUMNS;

/**
 * Builds a series from bars, checking that timestamps strictly increase and
 * that every bar carries the base OHLCV fields plus `extraColumns`.
 */
export const createSeries = (bars: readonly OHLCV[], extraColumns: readonly string[] = []): PriceSeries => {
  const columns = [...new Set([...BASE_COLUMNS, ...extraColumns])];
  const copied: Bar[] = [];

  for (let i = 0; i < bars.length; i++) {
    const source: Record<string, unknown> = { ...bars[i] };
    const bar: Bar = {
      timestamp: toFinite(source.timestamp, 'timestamp', i),
      open: toFinite(source.open, 'open', i),
      high: toFinite(source.high, 'high', i),
      low: toFinite(source.low, 'low', i),
      close: toFinite(source.close, 'close', i),
      volume: toFinite(source.volume, 'volume', i),
    };

    for (const column of columns.slice(baseColumns.length)) {
      const value = source[column];
      if (typeof value !== 'number') {
        throw new InvalidSeriesError(`Bar ${i} has no numeric value for column '${column}'`);
      }
      bar[column] = value;
    }

    if (i > 0 && bar.timestamp <= copied[i - 1].timestamp) {
      throw new InvalidSeriesError(
        `Timestamps must be strictly increasing: bar ${i} (${bar.timestamp}) follows ${copied[i - 1].timestamp}`
      );
    }
    copied.push(bar);
  }

  return { columns, bars: copied };
};

/** Returns a new series with `column` appended. The input series is left untouched. */
export const withColumn = (series: PriceSeries, column: string, values: readonly number[]): PriceSeries => {
  if (values.length !== series.bars.length) {
    throw new InvalidSeriesError(
      `Column '${column}' has ${values.length} values for ${series.bars.length} bars`
    );
  }
  if (baseColumns.includes(column)) {
    throw new InvalidSeriesError(`Column '${column}' would overwrite a base OHLCV field`);
  }

  const columns = series.columns.includes(column) ? series.columns : [...series.columns, column];
  const bars = series.bars.map((bar, i) => ({ ...bar, [column]: values[i] }));
  return { columns, bars };
};

export const columnValues = (series: PriceSeries, column: string): number[] => {
  if (!series.columns.includes(column)) {
    throw new UnknownColumnError(column, series.columns);
  }
  return series.bars.map((bar) => bar[column]);
};

const toFinite = (value: unknown, field: string, index: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidSeriesError(`Bar ${index} has a non-numeric '${field}' value`);
  }
  return value;
};
