/**
 * Column-wise indicator transforms. Every function returns one value per
 * input value; positions without enough history hold NaN.
 */

/**
 * Exponential moving average (multiplier 2 / (period + 1), no bias adjustment).
 * Seeded with the first non-NaN value; positions before it are NaN. A NaN
 * inside the series repeats the previous average and decays its weight, so
 * the next observation counts for more.
 */
export const emaSeries = (values: readonly number[], period: number): number[] => {
  const multiplier = 2 / (period + 1);
  const out: number[] = [];
  let average = NaN;
  // (1 - multiplier) ^ number of NaN values since the last observation
  let decay = 1;

  for (const value of values) {
    if (Number.isNaN(value)) {
      if (!Number.isNaN(average)) decay *= 1 - multiplier;
    } else if (Number.isNaN(average)) {
      average = value;
    } else if (decay === 1) {
      average = (value - average) * multiplier + average;
    } else {
      const weight = decay * (1 - multiplier);
      average = (weight * average + multiplier * value) / (weight + multiplier);
      decay = 1;
    }
    out.push(average);
  }

  return out;
};

/**
 * RSI from simple rolling averages of gains and losses over `period` bars.
 * The first bar has no previous close and counts as a zero change.
 */
export const rsiSeries = (values: readonly number[], period: number = 14): number[] => {
  const gains: number[] = [];
  const losses: number[] = [];

  for (let i = 0; i < values.length; i++) {
    const change = i === 0 ? 0 : values[i] - values[i - 1];
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const out: number[] = [];

  for (let i = 0; i < values.length; i++) {
    if (i < period - 1) {
      out.push(NaN);
      continue;
    }

    let gainSum = 0;
    let lossSum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      gainSum += gains[j];
      lossSum += losses[j];
    }

    const avgGain = gainSum / period;
    const avgLoss = lossSum / period;

    if (avgLoss === 0) {
      // no losses in the window: 100, or undefined when the window is flat
      out.push(avgGain === 0 ? NaN : 100);
    } else {
      out.push(100 - 100 / (1 + avgGain / avgLoss));
    }
  }

  return out;
};

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export const macdSeries = (
  values: readonly number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MacdSeries => {
  const fast = emaSeries(values, fastPeriod);
  const slow = emaSeries(values, slowPeriod);
  const macd = fast.map((value, i) => value - slow[i]);
  const signal = emaSeries(macd, signalPeriod);
  const histogram = macd.map((value, i) => value - signal[i]);

  return { macd, signal, histogram };
};
