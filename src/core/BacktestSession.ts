import { BacktestEngine } from '../backtest/BacktestEngine';
import type { BacktestEngineOptions } from '../backtest/BacktestEngine';
import type { StrategyBacktestResult } from '../backtest/types';
import { loadCsv, parseCsv } from '../data/CsvLoader';
import type { PriceSeries } from '../types/market';
import { logger } from '../utils/logger';
import { NoDataLoadedError } from './errors';

/**
 * Holds the one dataset a caller is working with. Each caller owns its
 * session; nothing here is shared between sessions.
 */
export class BacktestSession {
  private series: PriceSeries | null = null;
  private source: string | null = null;
  private readonly engine: BacktestEngine;

  constructor(options: BacktestEngineOptions = {}) {
    this.engine = new BacktestEngine(options);
  }

  public load(series: PriceSeries, source: string = 'memory'): void {
    this.series = series;
    this.source = source;
    logger.info({ source, bars: series.bars.length, columns: series.columns }, 'Series loaded');
  }

  public async loadCsvFile(filePath: string): Promise<PriceSeries> {
    const series = await loadCsv(filePath);
    this.load(series, filePath);
    return series;
  }

  public async loadCsvText(content: string, source: string = 'upload'): Promise<PriceSeries> {
    const series = await parseCsv(content);
    this.load(series, source);
    return series;
  }

  public hasData(): boolean {
    return this.series !== null;
  }

  public getSource(): string | null {
    return this.source;
  }

  public getSeries(): PriceSeries {
    if (this.series === null) {
      throw new NoDataLoadedError();
    }
    return this.series;
  }

  public run(request: unknown): StrategyBacktestResult {
    return this.engine.run(this.getSeries(), request);
  }

  public clear(): void {
    this.series = null;
    this.source = null;
  }
}
