import { applyIndicators } from '../analysis/IndicatorProvider';
import { env } from '../config/env';
import { parseStrategyRequest } from '../config/StrategyConfig';
import { BacktestEngineError, BacktestError } from '../core/errors';
import { buildConditionSignals, evaluateLogic, parseLogic, validateLogic } from '../strategy/LogicCombinator';
import type { PriceSeries, SignalSequence } from '../types/market';
import type { OrderType, StrategyRequest } from '../types/strategy';
import { logger as rootLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { MetricsCalculator } from './Metrics';
import { TradeSimulator } from './TradeSimulator';
import type { BacktestResult, StrategyBacktestResult } from './types';

export interface BacktestEngineOptions {
  periodsPerYear?: number;
  riskFreeRate?: number;
  logger?: Logger;
}

/**
 * Simulates pre-computed signals and summarizes the run.
 */
export const simulate = (
  series: PriceSeries,
  entrySignal: SignalSequence,
  exitSignal: SignalSequence,
  orderType: OrderType,
  initialBalance: number,
  positionSize: number,
  benchmarkReturns?: readonly number[],
  options: Pick<BacktestEngineOptions, 'periodsPerYear' | 'riskFreeRate'> = {}
): BacktestResult => {
  const simulation = new TradeSimulator({ orderType, initialBalance, positionSize }).run(series, entrySignal, exitSignal);
  const summary = MetricsCalculator.calculate(simulation, {
    periodsPerYear: options.periodsPerYear ?? env.PERIODS_PER_YEAR,
    riskFreeRate: options.riskFreeRate ?? env.RISK_FREE_RATE,
    benchmarkReturns,
  });

  return { trades: simulation.trades, equityCurve: simulation.equityCurve, summary };
};

export class BacktestEngine {
  private readonly periodsPerYear: number;
  private readonly riskFreeRate: number;
  private readonly logger: Logger;

  constructor(options: BacktestEngineOptions = {}) {
      this.periodsPerYear = options.periodsPerYear ?? env.PERIODS_PER_YEAR;
      this.riskFreeRate = options.riskFreeRate ?? env.RISK_FREE_RATE;
      this.logger = options.logger ?? rootLogger.child({ component: 'BacktestEngine' });
  }

  /**
   * Runs a full strategy request against a series: indicators, conditions,
   * entry/exit logic, simulation and metrics. Every expression is validated
   * before the simulation starts, so a failed run returns nothing partial.
   */
  public run(series: PriceSeries, request: unknown): StrategyBacktestResult {
      try {
          const strategy = parseStrategyRequest(request);
          const { execution, logic } = strategy;
          this.logger.info(
              { bars: series.bars.length, indicators: strategy.indicators.length, conditions: logic.conditions.length },
              'Starting backtest'
          );

          if (execution.stopLoss !== undefined || execution.takeProfit !== undefined) {
              this.logger.warn(
                  { stopLoss: execution.stopLoss, takeProfit: execution.takeProfit },
                  'stopLoss/takeProfit are accepted but not applied by the simulator'
              );
          }

          const result = this.execute(series, strategy);
          this.logger.info(
              {
                  totalTrades: result.summary.totalTrades,
                  totalPnl: result.summary.totalPnl,
                  finalBalance: result.summary.finalBalance,
              },
              'Backtest finished'
          );
          return result;
      } catch (error) {
          if (error instanceof BacktestError) {
              this.logger.error({ code: error.code, err: error }, 'Backtest rejected');
              throw error;
          }
          this.logger.error({ err: error }, 'Backtest failed unexpectedly');
          const reason = error instanceof Error ? error.message : String(error);
          throw new BacktestEngineError(`Backtest failed: ${reason}`, error);
      }
  }

  private execute(series: PriceSeries, strategy: StrategyRequest): StrategyBacktestResult {
      const { execution, logic } = strategy;

      const augmented = applyIndicators(series, strategy.indicators);
      this.logger.debug({ columns: augmented.columns }, 'Indicators applied');

      const conditions = buildConditionSignals(augmented, logic.conditions);
      // Parse both logic strings up front so neither side is evaluated when the other is invalid.
      const names = new Set(Object.keys(conditions));
      validateLogic(parseLogic(logic.entry), names, logic.entry);
      validateLogic(parseLogic(logic.exit), names, logic.exit);

      const entrySignal = [...evaluateLogic(augmented, conditions, logic.entry)];
      const exitSignal = [...evaluateLogic(augmented, conditions, logic.exit)];
      this.logger.debug(
          {
              entryBars: entrySignal.filter(Boolean).length,
              exitBars: exitSignal.filter(Boolean).length,
          },
          'Signals evaluated'
      );

      const simulation = new TradeSimulator({
          orderType: execution.orderType,
          initialBalance: execution.initialBalance,
          positionSize: execution.positionSize,
      }).run(augmented, entrySignal, exitSignal);

      const summary = MetricsCalculator.calculate(simulation, {
          periodsPerYear: this.periodsPerYear,
          riskFreeRate: this.riskFreeRate,
          benchmarkReturns: strategy.benchmarkReturns,
      });

      return {
          trades: simulation.trades,
          equityCurve: simulation.equityCurve,
          summary,
          execution,
          entrySignal,
          exitSignal,
          openPosition: simulation.openPosition,
      };
  }
}
