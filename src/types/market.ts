export interface OHLCV {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export const BASE_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

/**
 * One OHLCV observation plus any indicator-derived fields.
 * Indicator values that are still warming up are NaN.
 */
export interface Bar extends OHLCV {
  [field: string]: number;
}

export interface PriceSeries {
  /** Every field present on every bar, base columns first. */
  readonly columns: readonly string[];
  readonly bars: readonly Bar[];
}

export type SignalSequence = readonly boolean[];
