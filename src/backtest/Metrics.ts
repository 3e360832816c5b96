import type { LedgerEntry, MetricsOptions, PerformanceSummary, SimulationResult } from './types';

export const DEFAULT_PERIODS_PER_YEAR = 252;

const mean = (values: readonly number[]): number =>
  values.reduce((a, b) => a + b, 0) / values.length;

// Sample standard deviation (n - 1). Fewer than two points has no spread.
const stdDev = (values: readonly number[]): number => {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((a, b) => a + Math.pow(b - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
};

const finiteOrZero = (value: number): number => (Number.isFinite(value) ? value : 0);

export class MetricsCalculator {
  /** Bar-over-bar fractional changes; steps from a zero balance are skipped. */
  public static returns(values: readonly number[]): number[] {
      const out: number[] = [];
      for (let i = 1; i < values.length; i++) {
          if (values[i - 1] === 0) continue;
          out.push(values[i] / values[i - 1] - 1);
      }
      return out;
  }

  /** Compound annual growth rate, in percent. Years = points / periodsPerYear. */
  public static cagr(values: readonly number[], periodsPerYear: number = DEFAULT_PERIODS_PER_YEAR): number {
      if (values.length < 2) return 0;
      const start = values[0];
      const end = values[values.length - 1];
      const years = values.length / periodsPerYear;
      if (start <= 0 || years <= 0) return 0;

      return finiteOrZero((Math.pow(end / start, 1 / years) - 1) * 100);
  }

  public static maxDrawdown(values: readonly number[]): { amount: number; percent: number } {
      let peak = -Infinity;
      let amount = 0;
      let percent = 0;

      for (const value of values) {
          peak = Math.max(peak, value);
          const drawdown = peak - value;
          amount = Math.max(amount, drawdown);
          if (peak > 0) {
              percent = Math.max(percent, (drawdown / peak) * 100);
          }
      }

      return { amount, percent };
  }

  /** Annualized standard deviation of returns, in percent. */
  public static volatility(returns: readonly number[], periodsPerYear: number = DEFAULT_PERIODS_PER_YEAR): number {
      return finiteOrZero(stdDev(returns) * Math.sqrt(periodsPerYear) * 100);
  }

  public static sharpe(
      returns: readonly number[],
      riskFreeRate: number = 0,
      periodsPerYear: number = DEFAULT_PERIODS_PER_YEAR
  ): number {
      const deviation = stdDev(returns);
      if (deviation === 0) return 0;

      const excess = mean(returns) - riskFreeRate / periodsPerYear;
      return finiteOrZero((excess / deviation) * Math.sqrt(periodsPerYear));
  }

  /** Like Sharpe, with the deviation of the losing periods only. */
  public static sortino(
      returns: readonly number[],
      riskFreeRate: number = 0,
      periodsPerYear: number = DEFAULT_PERIODS_PER_YEAR
  ): number {
      const downside = returns.filter((r) => r < 0);
      const deviation = stdDev(downside);
      if (deviation === 0) return 0;

      const excess = mean(returns) - riskFreeRate / periodsPerYear;
      return finiteOrZero((excess / deviation) * Math.sqrt(periodsPerYear));
  }

  /** CAGR as a fraction over the deepest fall from peak, as a fraction. */
  public static calmar(values: readonly number[], periodsPerYear: number = DEFAULT_PERIODS_PER_YEAR): number {
      const drawdown = MetricsCalculator.maxDrawdown(values).percent / 100;
      if (drawdown === 0) return 0;
      return finiteOrZero(MetricsCalculator.cagr(values, periodsPerYear) / 100 / drawdown);
  }

  /**
   * Historical VaR: the `confidence` quantile of the returns (linear
   * interpolation between order statistics), as a positive percentage.
   */
  public static valueAtRisk(returns: readonly number[], confidence: number = 0.05): number {
      if (returns.length === 0) return 0;

      const sorted = [...returns].sort((a, b) => a - b);
      const position = confidence * (sorted.length - 1);
      const lower = Math.floor(position);
      const upper = Math.ceil(position);
      const quantile = sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);

      return finiteOrZero(Math.abs(quantile) * 100);
  }

  /**
   * Sample covariance with the benchmark over the benchmark's population
   * variance. Series of different length are aligned on their most recent
   * observations.
   */
  public static beta(strategyReturns: readonly number[], benchmarkReturns: readonly number[]): number {
      const length = Math.min(strategyReturns.length, benchmarkReturns.length);
      if (length < 2) return 0;

      const strategy = strategyReturns.slice(strategyReturns.length - length);
      const benchmark = benchmarkReturns.slice(benchmarkReturns.length - length);
      const strategyMean = mean(strategy);
      const benchmarkMean = mean(benchmark);

      let covariance = 0;
      let variance = 0;
      for (let i = 0; i < length; i++) {
          covariance += (strategy[i] - strategyMean) * (benchmark[i] - benchmarkMean);
          variance += Math.pow(benchmark[i] - benchmarkMean, 2);
      }
      covariance /= length - 1;
      variance /= length;

      if (variance === 0) return 0;
      return finiteOrZero(covariance / variance);
  }

  /** Share of closed trades with a strictly positive pnl, in percent. */
  public static winRate(trades: readonly LedgerEntry[]): number {
      let exits = 0;
      let wins = 0;
      for (const trade of trades) {
          if (trade.type !== 'exit') continue;
          exits++;
          if (trade.pnl > 0) wins++;
      }
      return exits === 0 ? 0 : (wins / exits) * 100;
  }

  public static calculate(simulation: SimulationResult, options: MetricsOptions = {}): PerformanceSummary {
      const periodsPerYear = options.periodsPerYear ?? DEFAULT_PERIODS_PER_YEAR;
      const riskFreeRate = options.riskFreeRate ?? 0;
      const equity = simulation.equityCurve;
      const returns = MetricsCalculator.returns(equity);
      const drawdown = MetricsCalculator.maxDrawdown(equity);

      return {
          totalTrades: simulation.totalTrades,
          totalPnl: simulation.totalPnl,
          winRate: MetricsCalculator.winRate(simulation.trades),
          maxDrawdown: drawdown.amount,
          maxDrawdownPct: drawdown.percent,
          cagr: MetricsCalculator.cagr(equity, periodsPerYear),
          sharpeRatio: MetricsCalculator.sharpe(returns, riskFreeRate, periodsPerYear),
          sortinoRatio: MetricsCalculator.sortino(returns, riskFreeRate, periodsPerYear),
          calmarRatio: MetricsCalculator.calmar(equity, periodsPerYear),
          volatility: MetricsCalculator.volatility(returns, periodsPerYear),
          valueAtRisk95: MetricsCalculator.valueAtRisk(returns),
          beta: options.benchmarkReturns === undefined ? null : MetricsCalculator.beta(returns, options.benchmarkReturns),
          finalBalance: simulation.finalBalance,
      };
  }
}
