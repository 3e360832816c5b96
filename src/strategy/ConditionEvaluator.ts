import { ExpressionSyntaxError, UnknownColumnError } from '../core/errors';
import type { PriceSeries, SignalSequence } from '../types/market';

// ─────────────────────────────────────────────────────────────────────────────
// Tokens
// ─────────────────────────────────────────────────────────────────────────────

export type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==' | '!=';
export type ArithmeticOperator = '+' | '-' | '*' | '/';

type ConditionToken =
  | { type: 'NUMBER'; value: number; position: number }
  | { type: 'IDENTIFIER'; value: string; position: number }
  | { type: 'ARITHMETIC'; value: ArithmeticOperator; position: number }
  | { type: 'COMPARISON'; value: ComparisonOperator; position: number }
  | { type: 'LPAREN'; position: number }
  | { type: 'RPAREN'; position: number }
  | { type: 'EOF'; position: number };

const COMPARISONS: readonly ComparisonOperator[] = ['<=', '>=', '==', '!=', '<', '>'];

export class ConditionTokenizer {
  private readonly input: string;
  private position = 0;

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): ConditionToken[] {
    const tokens: ConditionToken[] = [];

    while (this.position < this.input.length) {
      const char = this.input[this.position];

      if (/\s/.test(char)) {
        this.position++;
        continue;
      }

      if (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(this.input[this.position + 1] ?? ''))) {
        tokens.push(this.readNumber());
        continue;
      }

      if (/[A-Za-z_]/.test(char)) {
        const start = this.position;
        while (this.position < this.input.length && /[A-Za-z0-9_]/.test(this.input[this.position])) {
          this.position++;
        }
        tokens.push({ type: 'IDENTIFIER', value: this.input.slice(start, this.position), position: start });
        continue;
      }

      const comparison = COMPARISONS.find((op) => this.input.startsWith(op, this.position));
      if (comparison !== undefined) {
        tokens.push({ type: 'COMPARISON', value: comparison, position: this.position });
        this.position += comparison.length;
        continue;
      }

      if (char === '+' || char === '-' || char === '*' || char === '/') {
        tokens.push({ type: 'ARITHMETIC', value: char, position: this.position });
        this.position++;
        continue;
      }

      if (char === '(') {
        tokens.push({ type: 'LPAREN', position: this.position++ });
        continue;
      }
      if (char === ')') {
        tokens.push({ type: 'RPAREN', position: this.position++ });
        continue;
      }

      throw new ExpressionSyntaxError(this.input, this.position, `Unexpected character '${char}'`);
    }

    tokens.push({ type: 'EOF', position: this.position });
    return tokens;
  }

  private readNumber(): ConditionToken {
    const start = this.position;
    let seenDot = false;

    while (this.position < this.input.length) {
      const char = this.input[this.position];
      if (/[0-9]/.test(char)) {
        this.position++;
      } else if (char === '.' && !seenDot) {
        seenDot = true;
        this.position++;
      } else {
        break;
      }
    }

    return { type: 'NUMBER', value: Number(this.input.slice(start, this.position)), position: start };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// AST
// ─────────────────────────────────────────────────────────────────────────────

export type ArithmeticNode =
  | { type: 'Number'; value: number }
  | { type: 'Column'; name: string; position: number }
  | { type: 'Negate'; operand: ArithmeticNode }
  | { type: 'Binary'; operator: ArithmeticOperator; left: ArithmeticNode; right: ArithmeticNode };

export interface ConditionNode {
  type: 'Comparison';
  operator: ComparisonOperator;
  left: ArithmeticNode;
  right: ArithmeticNode;
}

// ─────────────────────────────────────────────────────────────────────────────
// Parser (recursive descent)
// ─────────────────────────────────────────────────────────────────────────────

export class ConditionParser {
  private readonly tokens: ConditionToken[];
  private readonly expression: string;
  private index = 0;

  constructor(expression: string) {
    this.expression = expression;
    this.tokens = new ConditionTokenizer(expression).tokenize();
  }

  // Condition = Arith CMP Arith EOF
  parse(): ConditionNode {
    const left = this.parseArithmetic();
    const token = this.current();
    if (token.type !== 'COMPARISON') {
      throw this.error(token, 'Expected a comparison operator');
    }
    this.index++;
    const right = this.parseArithmetic();

    const end = this.current();
    if (end.type === 'COMPARISON') {
      throw this.error(end, 'Chained comparisons are not supported');
    }
    if (end.type !== 'EOF') {
      throw this.error(end, 'Unexpected token');
    }

    return { type: 'Comparison', operator: token.value, left, right };
  }

  private current(): ConditionToken {
    return this.tokens[this.index];
  }

  // Arith = Term (('+' | '-') Term)*
  private parseArithmetic(): ArithmeticNode {
    let left = this.parseTerm();
    for (let token = this.current(); token.type === 'ARITHMETIC' && (token.value === '+' || token.value === '-'); token = this.current()) {
      this.index++;
      left = { type: 'Binary', operator: token.value, left, right: this.parseTerm() };
    }
    return left;
  }

  // Term = Factor (('*' | '/') Factor)*
  private parseTerm(): ArithmeticNode {
    let left = this.parseFactor();
    for (let token = this.current(); token.type === 'ARITHMETIC' && (token.value === '*' || token.value === '/'); token = this.current()) {
      this.index++;
      left = { type: 'Binary', operator: token.value, left, right: this.parseFactor() };
    }
    return left;
  }

  // Factor = '-' Factor | Primary
  private parseFactor(): ArithmeticNode {
    const token = this.current();
    if (token.type === 'ARITHMETIC' && token.value === '-') {
      this.index++;
      return { type: 'Negate', operand: this.parseFactor() };
    }
    return this.parsePrimary();
  }

  // Primary = Number | Column | '(' Arith ')'
  private parsePrimary(): ArithmeticNode {
    const token = this.current();

    switch (token.type) {
      case 'NUMBER':
        this.index++;
        return { type: 'Number', value: token.value };
      case 'IDENTIFIER':
        this.index++;
        if (this.current().type === 'LPAREN') {
          throw this.error(this.current(), `Function calls are not allowed ('${token.value}')`);
        }
        return { type: 'Column', name: token.value, position: token.position };
      case 'LPAREN': {
        this.index++;
        const inner = this.parseArithmetic();
        const close = this.current();
        if (close.type !== 'RPAREN') {
          throw this.error(close, "Expected ')'");
        }
        this.index++;
        return inner;
      }
      case 'EOF':
        throw this.error(token, 'Unexpected end of expression');
      default:
        throw this.error(token, 'Expected a number, column or (');
    }
  }

  private error(token: ConditionToken, reason: string): ExpressionSyntaxError {
    return new ExpressionSyntaxError(this.expression, token.position, reason);
  }
}

export const parseCondition = (expression: string): ConditionNode => new ConditionParser(expression).parse();

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation
// ─────────────────────────────────────────────────────────────────────────────

export const referencedColumns = (node: ConditionNode): string[] => {
  const names = new Set<string>();
  const visit = (n: ArithmeticNode): void => {
    switch (n.type) {
      case 'Column':
        names.add(n.name);
        break;
      case 'Negate':
        visit(n.operand);
        break;
      case 'Binary':
        visit(n.left);
        visit(n.right);
        break;
      case 'Number':
        break;
    }
  };
  visit(node.left);
  visit(node.right);
  return [...names];
};

/** Throws UnknownColumnError for the first column the series does not carry. */
export const validateColumns = (node: ConditionNode, series: PriceSeries, expression: string): void => {
  for (const name of referencedColumns(node)) {
    if (!series.columns.includes(name)) {
      throw new UnknownColumnError(name, series.columns, expression);
    }
  }
};

const evaluateArithmetic = (node: ArithmeticNode, bar: Readonly<Record<string, number>>): number => {
  switch (node.type) {
    case 'Number':
      return node.value;
    case 'Column':
      return bar[node.name];
    case 'Negate':
      return -evaluateArithmetic(node.operand, bar);
    case 'Binary': {
      const left = evaluateArithmetic(node.left, bar);
      const right = evaluateArithmetic(node.right, bar);
      switch (node.operator) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          return left / right;
      }
    }
  }
};

const compare = (operator: ComparisonOperator, left: number, right: number): boolean => {
  switch (operator) {
    case '<':
      return left < right;
    case '>':
      return left > right;
    case '<=':
      return left <= right;
    case '>=':
      return left >= right;
    case '==':
      return left === right;
    case '!=':
      // NaN on either side never satisfies a condition
      return !Number.isNaN(left) && !Number.isNaN(right) && left !== right;
  }
};

export const evaluateParsedCondition = (node: ConditionNode, series: PriceSeries): boolean[] =>
  series.bars.map((bar) => compare(node.operator, evaluateArithmetic(node.left, bar), evaluateArithmetic(node.right, bar)));

/**
 * Evaluates one comparison expression against every bar of the series.
 * Columns are matched by exact name.
 */
export const evaluateCondition = (series: PriceSeries, expression: string): SignalSequence => {
  const node = parseCondition(expression);
  validateColumns(node, series, expression);
  return evaluateParsedCondition(node, series);
};
