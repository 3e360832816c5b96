/**
 * Tests for MetricsCalculator
 *
 * Each statistic is checked against a hand-computed value, and against the
 * degenerate inputs (short, flat or empty series) that must return 0.
 */

import { describe, it, expect } from 'vitest';
import { MetricsCalculator } from '../../src/backtest/Metrics';
import type { LedgerEntry, SimulationResult } from '../../src/backtest/types';

const exit = (pnl: number): LedgerEntry => ({ type: 'exit', price: 1, timestamp: 0, barIndex: 0, pnl, balance: 0 });
const entry: LedgerEntry = { type: 'entry', price: 1, timestamp: 0, barIndex: 0 };

describe('MetricsCalculator.returns', () => {
  it('computes bar-over-bar fractional changes', () => {
    const returns = MetricsCalculator.returns([100, 110, 99]);
    expect(returns).toHaveLength(2);
    expect(returns[0]).toBeCloseTo(0.1, 12);
    expect(returns[1]).toBeCloseTo(-0.1, 12);
  });

  it('skips steps from a zero balance', () => {
    expect(MetricsCalculator.returns([0, 10, 20])).toEqual([1]);
  });

  it('is empty for fewer than two points', () => {
    expect(MetricsCalculator.returns([])).toEqual([]);
    expect(MetricsCalculator.returns([100])).toEqual([]);
  });
});

describe('MetricsCalculator.cagr', () => {
  it('annualizes growth over points / periodsPerYear years', () => {
    // two points at one period per year = two years
    expect(MetricsCalculator.cagr([100, 121], 1)).toBeCloseTo(10, 10);
  });

  it('returns 0 for short or non-positive starting curves', () => {
    expect(MetricsCalculator.cagr([])).toBe(0);
    expect(MetricsCalculator.cagr([100])).toBe(0);
    expect(MetricsCalculator.cagr([0, 10])).toBe(0);
    expect(MetricsCalculator.cagr([-5, 10])).toBe(0);
  });

  it('returns 0 instead of a non-finite value', () => {
    expect(MetricsCalculator.cagr([100, -50], 3)).toBe(0);
  });
});

describe('MetricsCalculator.maxDrawdown', () => {
  it('reports the deepest fall from the running peak in currency and percent', () => {
    expect(MetricsCalculator.maxDrawdown([100, 120, 90, 130, 117])).toEqual({ amount: 30, percent: 25 });
  });

  it('is zero for rising, flat or empty curves', () => {
    expect(MetricsCalculator.maxDrawdown([100, 110, 120])).toEqual({ amount: 0, percent: 0 });
    expect(MetricsCalculator.maxDrawdown([10000, 10000, 10000])).toEqual({ amount: 0, percent: 0 });
    expect(MetricsCalculator.maxDrawdown([])).toEqual({ amount: 0, percent: 0 });
  });
});

describe('MetricsCalculator.volatility', () => {
  it('annualizes the sample standard deviation, in percent', () => {
    // std = sqrt(0.0002), * sqrt(252) * 100
    expect(MetricsCalculator.volatility([0.01, -0.01], 252)).toBeCloseTo(22.4499443, 5);
  });

  it('is 0 with fewer than two returns', () => {
    expect(MetricsCalculator.volatility([])).toBe(0);
    expect(MetricsCalculator.volatility([0.05])).toBe(0);
  });
});

describe('MetricsCalculator.sharpe', () => {
  it('divides mean return by its deviation and annualizes', () => {
    // mean 0.01, std 0.01
    expect(MetricsCalculator.sharpe([0.02, 0, 0.01], 0, 252)).toBeCloseTo(15.8745079, 5);
  });

  it('subtracts the per-period risk-free rate', () => {
    // excess mean 0.009
    expect(MetricsCalculator.sharpe([0.02, 0, 0.01], 0.252, 252)).toBeCloseTo(14.2870571, 5);
  });

  it('returns 0 for zero-variance or too-short returns', () => {
    expect(MetricsCalculator.sharpe([0, 0, 0])).toBe(0);
    expect(MetricsCalculator.sharpe([0.03])).toBe(0);
    expect(MetricsCalculator.sharpe([])).toBe(0);
  });
});

describe('MetricsCalculator.sortino', () => {
  it('uses the deviation of negative returns only', () => {
    // mean 0.0025, downside std sqrt(0.0002)
    expect(MetricsCalculator.sortino([0.02, -0.01, 0.03, -0.03], 0, 252)).toBeCloseTo(2.8062430, 5);
  });

  it('returns 0 when the downside subset is empty or has no spread', () => {
    expect(MetricsCalculator.sortino([0.01, 0.02])).toBe(0);
    expect(MetricsCalculator.sortino([0.01, -0.02])).toBe(0);
    expect(MetricsCalculator.sortino([-0.01, -0.01, 0.04])).toBe(0);
  });
});

describe('MetricsCalculator.calmar', () => {
  it('divides fractional CAGR by the fractional max drawdown', () => {
    // one year of four points: CAGR 10%, drawdown 30/120 = 25%
    expect(MetricsCalculator.calmar([100, 120, 90, 110], 4)).toBeCloseTo(0.4, 10);
  });

  it('returns 0 without a drawdown', () => {
    expect(MetricsCalculator.calmar([100, 110, 120])).toBe(0);
    expect(MetricsCalculator.calmar([100])).toBe(0);
  });
});

describe('MetricsCalculator.valueAtRisk', () => {
  it('interpolates the 5th percentile and reports its magnitude in percent', () => {
    // position 0.05 * 4 = 0.2 between -0.05 and -0.02
    expect(MetricsCalculator.valueAtRisk([0.04, -0.02, 0.01, -0.05, 0.03])).toBeCloseTo(4.4, 10);
  });

  it('uses the only observation when there is one', () => {
    expect(MetricsCalculator.valueAtRisk([-0.02])).toBeCloseTo(2, 10);
  });

  it('returns 0 with no observations', () => {
    expect(MetricsCalculator.valueAtRisk([])).toBe(0);
  });
});

describe('MetricsCalculator.beta', () => {
  const benchmark = [0.01, 0.02, -0.01];
  const strategy = [0.02, 0.04, -0.02];

  it('divides sample covariance by the population variance of the benchmark', () => {
    // strategy = 2 x benchmark: 2 * SS / (n - 1) over SS / n = 2 * 3 / 2
    expect(MetricsCalculator.beta(strategy, benchmark)).toBeCloseTo(3, 10);
  });

  it('keeps the most recent observations when lengths differ', () => {
    expect(MetricsCalculator.beta([0.5, ...strategy], benchmark)).toBeCloseTo(3, 10);
    expect(MetricsCalculator.beta(strategy, [0.9, -0.4, ...benchmark])).toBeCloseTo(3, 10);
  });

  it('returns 0 for a flat benchmark or fewer than two aligned points', () => {
    expect(MetricsCalculator.beta(strategy, [0.5, 0.5, 0.5])).toBe(0);
    expect(MetricsCalculator.beta([0.01], [0.02])).toBe(0);
    expect(MetricsCalculator.beta([], benchmark)).toBe(0);
  });
});

describe('MetricsCalculator.winRate', () => {
  it('counts strictly positive exits as wins', () => {
    expect(MetricsCalculator.winRate([entry, exit(5), entry, exit(-2), entry, exit(0), entry, exit(3)])).toBe(50);
  });

  it('is 0 without completed trades', () => {
    expect(MetricsCalculator.winRate([])).toBe(0);
    expect(MetricsCalculator.winRate([entry])).toBe(0);
  });
});

describe('MetricsCalculator.calculate', () => {
  const simulation = (equityCurve: number[], trades: LedgerEntry[] = []): SimulationResult => {
    const initialBalance = 10000;
    const finalBalance = equityCurve.length > 0 ? equityCurve[equityCurve.length - 1] : initialBalance;
    return {
      trades,
      equityCurve,
      initialBalance,
      finalBalance,
      totalPnl: finalBalance - initialBalance,
      maxDrawdown: 0,
      totalTrades: trades.filter((t) => t.type === 'exit').length,
      openPosition: null,
    };
  };

  it('returns neutral statistics for a constant equity curve', () => {
    const summary = MetricsCalculator.calculate(simulation([10000, 10000, 10000, 10000, 10000]));

    expect(summary.sharpeRatio).toBe(0);
    expect(summary.sortinoRatio).toBe(0);
    expect(summary.calmarRatio).toBe(0);
    expect(summary.volatility).toBe(0);
    expect(summary.valueAtRisk95).toBe(0);
    expect(summary.maxDrawdown).toBe(0);
    expect(summary.maxDrawdownPct).toBe(0);
    expect(summary.cagr).toBe(0);
  });

  it('returns zeros for an empty run and leaves beta unset without a benchmark', () => {
    expect(MetricsCalculator.calculate(simulation([]))).toEqual({
      totalTrades: 0,
      totalPnl: 0,
      winRate: 0,
      maxDrawdown: 0,
      maxDrawdownPct: 0,
      cagr: 0,
      sharpeRatio: 0,
      sortinoRatio: 0,
      calmarRatio: 0,
      volatility: 0,
      valueAtRisk95: 0,
      beta: null,
      finalBalance: 10000,
    });
  });

  it('computes beta when a benchmark is supplied', () => {
    const summary = MetricsCalculator.calculate(simulation([10000, 10000]), { benchmarkReturns: [0.01, 0.02] });
    expect(summary.beta).toBe(0);
  });

  it('summarizes trades and drawdown from the equity curve', () => {
    const summary = MetricsCalculator.calculate(simulation([10000, 10000, 9995], [entry, exit(-5)]));

    expect(summary.totalTrades).toBe(1);
    expect(summary.totalPnl).toBe(-5);
    expect(summary.winRate).toBe(0);
    expect(summary.finalBalance).toBe(9995);
    expect(summary.maxDrawdown).toBe(5);
    expect(summary.maxDrawdownPct).toBeCloseTo(0.05, 10);
  });
});
