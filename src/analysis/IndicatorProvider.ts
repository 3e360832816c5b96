import type { PriceSeries } from '../types/market';
import type { IndicatorSpec } from '../types/strategy';
import { columnValues, withColumn } from '../utils/SeriesUtils';
import { emaSeries, macdSeries, rsiSeries } from './indicators';

/** Column names an indicator spec will add, in the order they are appended. */
export const indicatorColumns = (spec: IndicatorSpec): string[] => {
  switch (spec.name) {
    case 'ema':
      return [spec.params.column ?? `ema_${spec.params.period}`];
    case 'rsi':
      return [spec.params.column ?? `rsi_${spec.params.period}`];
    case 'macd':
      return [
        spec.params.macdColumn ?? 'macd',
        spec.params.signalColumn ?? 'macd_signal',
        spec.params.histogramColumn ?? 'macd_hist',
      ];
  }
};

export const applyIndicator = (series: PriceSeries, spec: IndicatorSpec): PriceSeries => {
  const source = columnValues(series, spec.params.source ?? 'close');
  const [first, second, third] = indicatorColumns(spec);

  switch (spec.name) {
    case 'ema':
      return withColumn(series, first, emaSeries(source, spec.params.period));
    case 'rsi':
      return withColumn(series, first, rsiSeries(source, spec.params.period));
    case 'macd': {
      const { fastPeriod, slowPeriod, signalPeriod } = spec.params;
      const macd = macdSeries(source, fastPeriod, slowPeriod, signalPeriod);
      let augmented = withColumn(series, first, macd.macd);
      augmented = withColumn(augmented, second, macd.signal);
      return withColumn(augmented, third, macd.histogram);
    }
  }
};

/**
 * Appends the columns of every spec in order. Later specs may use an
 * earlier spec's output as their `source`.
 */
export const applyIndicators = (series: PriceSeries, specs: readonly IndicatorSpec[]): PriceSeries =>
  specs.reduce(applyIndicator, series);
