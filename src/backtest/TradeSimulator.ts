import { SignalAlignmentError } from '../core/errors';
import type { Bar, PriceSeries, SignalSequence } from '../types/market';
import { Portfolio } from './Portfolio';
import type { SimulationParams, SimulationResult } from './types';

export class TradeSimulator {
  private readonly params: SimulationParams;

  constructor(params: SimulationParams) {
      this.params = params;
  }

  /**
   * Walks the series once. Entry is only checked while flat and exit only
   * while long, so a bar with both signals set performs a single transition.
   * A position still open after the last bar stays unrealized.
   */
  public run(series: PriceSeries, entrySignal: SignalSequence, exitSignal: SignalSequence): SimulationResult {
      const bars = series.bars;
      TradeSimulator.assertAligned('entry', entrySignal, bars.length);
      TradeSimulator.assertAligned('exit', exitSignal, bars.length);

      const portfolio = new Portfolio(this.params.initialBalance, this.params.positionSize);

      for (let i = 0; i < bars.length; i++) {
          const bar = bars[i];

          if (portfolio.state === 'FLAT') {
              if (entrySignal[i]) {
                  portfolio.openPosition(this.fillPrice(bars, i), bar.timestamp, i);
              }
          } else if (exitSignal[i]) {
              portfolio.closePosition(this.fillPrice(bars, i), bar.timestamp, i);
          }

          portfolio.markBar();
      }

      const finalBalance = portfolio.getBalance();
      return {
          trades: portfolio.ledger,
          equityCurve: portfolio.equityCurve,
          initialBalance: this.params.initialBalance,
          finalBalance,
          totalPnl: finalBalance - this.params.initialBalance,
          maxDrawdown: portfolio.getMaxDrawdown(),
          totalTrades: portfolio.ledger.filter((t) => t.type === 'exit').length,
          openPosition: portfolio.getOpenPosition(),
      };
  }

  // Market orders fill at this bar's close; limit orders at the next bar's open,
  // falling back to this close on the last bar.
  private fillPrice(bars: readonly Bar[], i: number): number {
      if (this.params.orderType === 'market' || i + 1 >= bars.length) {
          return bars[i].close;
      }
      return bars[i + 1].open;
  }

  private static assertAligned(label: string, signal: SignalSequence, length: number): void {
      if (signal.length !== length) {
          throw new SignalAlignmentError(
              `The ${label} signal has ${signal.length} values but the series has ${length} bars`
          );
      }
      const bad = signal.findIndex((value: unknown) => typeof value !== 'boolean');
      if (bad !== -1) {
          throw new SignalAlignmentError(`The ${label} signal has a non-boolean value at bar ${bad}`);
      }
  }
}
