import { describe, it, expect } from 'vitest';
import { parseStrategyRequest } from '../../src/config/StrategyConfig';
import { InvalidStrategyError } from '../../src/core/errors';

const logic = { conditions: ['close > open'], entry: 'COND1', exit: 'NOT COND1' };

describe('parseStrategyRequest', () => {
  it('fills in execution and indicator defaults', () => {
    expect(parseStrategyRequest({ logic })).toEqual({
      indicators: [],
      logic,
      execution: { orderType: 'market', initialBalance: 10000, positionSize: 1 },
    });
  });

  it('applies the default MACD and RSI periods', () => {
    const request = parseStrategyRequest({ logic, indicators: [{ name: 'macd' }, { name: 'rsi', params: {} }] });

    expect(request.indicators).toEqual([
      { name: 'macd', params: { fastPeriod: 12, slowPeriod: 26, signalPeriod: 9 } },
      { name: 'rsi', params: { period: 14 } },
    ]);
  });

  it('keeps stopLoss and takeProfit', () => {
    const request = parseStrategyRequest({ logic, execution: { stopLoss: 0.05, takeProfit: 0.1 } });
    expect(request.execution.stopLoss).toBe(0.05);
    expect(request.execution.takeProfit).toBe(0.1);
  });

  it('names the offending field', () => {
    expect(() => parseStrategyRequest({ logic, execution: { orderType: 'stop' } })).toThrow(/execution\.orderType/);
  });

  it.each([
    ['no logic', {}],
    ['no conditions', { logic: { ...logic, conditions: [] } }],
    ['an empty entry', { logic: { ...logic, entry: '' } }],
    ['a negative position size', { logic, execution: { positionSize: -1 } }],
    ['a zero balance', { logic, execution: { initialBalance: 0 } }],
    ['an EMA without a period', { logic, indicators: [{ name: 'ema', params: {} }] }],
    ['an unknown indicator', { logic, indicators: [{ name: 'vwap', params: {} }] }],
    ['a column name with spaces', { logic, indicators: [{ name: 'ema', params: { period: 5, column: 'my ema' } }] }],
    ['a non-finite benchmark', { logic, benchmarkReturns: [0.01, Infinity] }],
  ])('rejects %s', (_label, input) => {
    expect(() => parseStrategyRequest(input)).toThrow(InvalidStrategyError);
  });
});
