export type OrderType = 'market' | 'limit';

export interface EmaSpec {
  name: 'ema';
  params: {
    period: number;
    source?: string;
    column?: string;
  };
}

export interface RsiSpec {
  name: 'rsi';
  params: {
    period: number;
    source?: string;
    column?: string;
  };
}

export interface MacdSpec {
  name: 'macd';
  params: {
    fastPeriod: number;
    slowPeriod: number;
    signalPeriod: number;
    source?: string;
    macdColumn?: string;
    signalColumn?: string;
    histogramColumn?: string;
  };
}

export type IndicatorSpec = EmaSpec | RsiSpec | MacdSpec;

export interface LogicBlock {
  /** Condition expressions, referenced from entry/exit logic as COND1..CONDn. */
  conditions: string[];
  entry: string;
  exit: string;
}

export interface ExecutionParams {
  orderType: OrderType;
  initialBalance: number;
  /** Units bought on entry and sold on exit. */
  positionSize: number;
  // Accepted and echoed back; the simulator does not act on them.
  stopLoss?: number;
  takeProfit?: number;
}

export interface StrategyRequest {
  indicators: IndicatorSpec[];
  logic: LogicBlock;
  execution: ExecutionParams;
  benchmarkReturns?: number[];
}
