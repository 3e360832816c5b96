import type { ExitRecord, LedgerEntry, OpenPosition, PositionState } from './types';

/**
 * Single-position account: realized balance, the open position (if any),
 * the append-only ledger and the per-bar equity curve.
 */
export class Portfolio {
  private balance: number;
  private readonly positionSize: number;
  private peak: number;
  private worstDrawdown = 0;
  private position: OpenPosition | null = null;
  public readonly ledger: LedgerEntry[] = [];
  public readonly equityCurve: number[] = [];

  constructor(initialBalance: number, positionSize: number) {
      this.balance = initialBalance;
      this.peak = initialBalance;
      this.positionSize = positionSize;
  }

  public get state(): PositionState {
      return this.position === null ? 'FLAT' : 'LONG';
  }

  public getBalance(): number {
      return this.balance;
  }

  public getMaxDrawdown(): number {
      return this.worstDrawdown;
  }

  public getOpenPosition(): OpenPosition | null {
      return this.position === null ? null : { ...this.position };
  }

  public openPosition(price: number, timestamp: number, barIndex: number): void {
      this.position = { entryPrice: price, entryTime: timestamp, barIndex };
      this.ledger.push({ type: 'entry', price, timestamp, barIndex });
  }

  /** Realizes the open position. The caller checks `state` first. */
  public closePosition(price: number, timestamp: number, barIndex: number): ExitRecord | null {
      if (this.position === null) return null;

      const pnl = (price - this.position.entryPrice) * this.positionSize;
      this.balance += pnl;

      const exit: ExitRecord = { type: 'exit', price, timestamp, barIndex, pnl, balance: this.balance };
      this.ledger.push(exit);
      this.position = null;
      return exit;
  }

  /** Samples the balance for the current bar and tracks the running peak. */
  public markBar(): void {
      this.equityCurve.push(this.balance);
      this.peak = Math.max(this.peak, this.balance);
      this.worstDrawdown = Math.max(this.worstDrawdown, this.peak - this.balance);
  }
}
