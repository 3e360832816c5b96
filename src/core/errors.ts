import type { ZodIssue } from 'zod';

export type BacktestErrorCode =
  | 'EXPRESSION_SYNTAX'
  | 'UNKNOWN_COLUMN'
  | 'UNKNOWN_CONDITION'
  | 'DUPLICATE_CONDITION'
  | 'SIGNAL_ALIGNMENT'
  | 'MISSING_COLUMN'
  | 'INVALID_SERIES'
  | 'INVALID_STRATEGY'
  | 'NO_DATA_LOADED'
  | 'ENGINE_FAILURE';

/**
 * Base class for every error the backtester raises on purpose.
 * Callers can switch on `code` instead of `instanceof` when the error
 * has crossed a serialization boundary.
 */
export abstract class BacktestError extends Error {
  public abstract readonly code: BacktestErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  public toJSON(): { code: BacktestErrorCode; name: string; message: string } {
    return { code: this.code, name: this.name, message: this.message };
  }
}

export class ExpressionSyntaxError extends BacktestError {
  public readonly code = 'EXPRESSION_SYNTAX';

  constructor(
    public readonly expression: string,
    public readonly position: number,
    reason: string
  ) {
    super(`${reason} at position ${position} in "${expression}"`);
  }
}

export class UnknownColumnError extends BacktestError {
  public readonly code = 'UNKNOWN_COLUMN';

  constructor(
    public readonly column: string,
    public readonly availableColumns: readonly string[],
    public readonly expression?: string
  ) {
    const where = expression === undefined ? '' : ` in "${expression}"`;
    super(`Unknown column '${column}'${where}. Available: ${availableColumns.join(', ')}`);
  }
}

export class UnknownConditionError extends BacktestError {
  public readonly code = 'UNKNOWN_CONDITION';

  constructor(
    public readonly condition: string,
    public readonly definedConditions: readonly string[],
    public readonly logic: string
  ) {
    const defined = definedConditions.length > 0 ? definedConditions.join(', ') : 'none';
    super(`Unknown condition '${condition}' in "${logic}". Defined: ${defined}`);
  }
}

export class DuplicateConditionError extends BacktestError {
  public readonly code = 'DUPLICATE_CONDITION';

  constructor(
    public readonly condition: string,
    public readonly names: readonly string[]
  ) {
    super(`Condition names ${names.map((name) => `'${name}'`).join(', ')} all resolve to '${condition}'`);
  }
}

export class SignalAlignmentError extends BacktestError {
  public readonly code = 'SIGNAL_ALIGNMENT';
}

export class MissingColumnError extends BacktestError {
  public readonly code = 'MISSING_COLUMN';

  constructor(public readonly missingColumns: readonly string[]) {
    super(`Missing required columns: ${missingColumns.join(', ')}`);
  }
}

export class InvalidSeriesError extends BacktestError {
  public readonly code = 'INVALID_SERIES';
}

export class InvalidStrategyError extends BacktestError {
  public readonly code = 'INVALID_STRATEGY';

  constructor(public readonly issues: readonly ZodIssue[]) {
    const summary = issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Invalid strategy request: ${summary}`);
  }
}

export class NoDataLoadedError extends BacktestError {
  public readonly code = 'NO_DATA_LOADED';

  constructor() {
    super('No price series has been loaded into this session');
  }
}

export class BacktestEngineError extends BacktestError {
  public readonly code = 'ENGINE_FAILURE';

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}
