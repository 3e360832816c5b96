import type { ExecutionParams, OrderType } from '../types/strategy';

export type PositionState = 'FLAT' | 'LONG';

export interface EntryRecord {
  type: 'entry';
  price: number;
  timestamp: number;
  barIndex: number;
}

export interface ExitRecord {
  type: 'exit';
  price: number;
  timestamp: number;
  barIndex: number;
  pnl: number;
  balance: number; // after this exit
}

export type LedgerEntry = EntryRecord | ExitRecord;

export interface SimulationParams {
  orderType: OrderType;
  initialBalance: number;
  positionSize: number;
}

export interface OpenPosition {
  entryPrice: number;
  entryTime: number;
  barIndex: number;
}

export interface SimulationResult {
  trades: LedgerEntry[];
  equityCurve: number[];
  initialBalance: number;
  finalBalance: number;
  totalPnl: number;
  /** Largest peak-to-trough fall of the balance, in currency units. */
  maxDrawdown: number;
  totalTrades: number;
  /** Position still held when the series ran out; never realized. */
  openPosition: OpenPosition | null;
}

export interface MetricsOptions {
  periodsPerYear?: number;
  riskFreeRate?: number;
  benchmarkReturns?: readonly number[];
}

export interface PerformanceSummary {
  totalTrades: number;
  totalPnl: number;
  winRate: number; // 0-100
  maxDrawdown: number;
  maxDrawdownPct: number;
  cagr: number; // percent
  sharpeRatio: number;
  sortinoRatio: number;
  calmarRatio: number;
  volatility: number; // annualized, percent
  valueAtRisk95: number; // percent
  beta: number | null; // null without a benchmark
  finalBalance: number;
}

export interface BacktestResult {
  trades: LedgerEntry[];
  equityCurve: number[];
  summary: PerformanceSummary;
}

export interface StrategyBacktestResult extends BacktestResult {
  /** Execution parameters as applied, including inert stop/take-profit values. */
  execution: ExecutionParams;
  entrySignal: boolean[];
  exitSignal: boolean[];
  openPosition: OpenPosition | null;
}
