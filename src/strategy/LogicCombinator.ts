import {
  DuplicateConditionError,
  ExpressionSyntaxError,
  SignalAlignmentError,
  UnknownConditionError,
} from '../core/errors';
import type { PriceSeries, SignalSequence } from '../types/market';
import { evaluateParsedCondition, parseCondition, validateColumns } from './ConditionEvaluator';

/**
 * Boolean algebra over named conditions. The grammar has no literals,
 * arithmetic or column access: a logic string can only combine
 * conditions that were evaluated beforehand.
 *
 *   Or  = And ('OR' And)*
 *   And = Not ('AND' Not)*
 *   Not = 'NOT' Not | NAME | '(' Or ')'
 */
export type LogicNode =
  | { type: 'Ref'; name: string; position: number }
  | { type: 'Not'; operand: LogicNode }
  | { type: 'And'; left: LogicNode; right: LogicNode }
  | { type: 'Or'; left: LogicNode; right: LogicNode };

type LogicToken =
  | { type: 'NAME'; value: string; position: number }
  | { type: 'AND' | 'OR' | 'NOT' | 'LPAREN' | 'RPAREN' | 'EOF'; position: number };

export const conditionName = (index: number): string => `COND${index + 1}`;

const tokenizeLogic = (logic: string): LogicToken[] => {
  const tokens: LogicToken[] = [];
  let i = 0;

  while (i < logic.length) {
    const char = logic[i];
    if (/\s/.test(char)) {
      i++;
    } else if (char === '(') {
      tokens.push({ type: 'LPAREN', position: i++ });
    } else if (char === ')') {
      tokens.push({ type: 'RPAREN', position: i++ });
    } else if (/[A-Za-z_]/.test(char)) {
      const start = i;
      while (i < logic.length && /[A-Za-z0-9_]/.test(logic[i])) i++;
      const word = logic.slice(start, i).toUpperCase();
      if (word === 'AND' || word === 'OR' || word === 'NOT') {
        tokens.push({ type: word, position: start });
      } else {
        tokens.push({ type: 'NAME', value: word, position: start });
      }
    } else {
      throw new ExpressionSyntaxError(logic, i, `Unexpected character '${char}' in logic`);
    }
  }

  tokens.push({ type: 'EOF', position: logic.length });
  return tokens;
};

export const parseLogic = (logic: string): LogicNode => {
  const tokens = tokenizeLogic(logic);
  let index = 0;

  const fail = (token: LogicToken, reason: string): ExpressionSyntaxError =>
    new ExpressionSyntaxError(logic, token.position, reason);

  const parseOr = (): LogicNode => {
    let left = parseAnd();
    while (tokens[index].type === 'OR') {
      index++;
      left = { type: 'Or', left, right: parseAnd() };
    }
    return left;
  };

  const parseAnd = (): LogicNode => {
    let left = parseNot();
    while (tokens[index].type === 'AND') {
      index++;
      left = { type: 'And', left, right: parseNot() };
    }
    return left;
  };

  const parseNot = (): LogicNode => {
    const token = tokens[index];
    switch (token.type) {
      case 'NOT':
        index++;
        return { type: 'Not', operand: parseNot() };
      case 'NAME':
        index++;
        return { type: 'Ref', name: token.value, position: token.position };
      case 'LPAREN': {
        index++;
        const inner = parseOr();
        if (tokens[index].type !== 'RPAREN') {
          throw fail(tokens[index], "Expected ')'");
        }
        index++;
        return inner;
      }
      case 'EOF':
        throw fail(token, 'Unexpected end of logic');
      default:
        throw fail(token, `Unexpected ${token.type}`);
    }
  };

  const tree = parseOr();
  if (tokens[index].type !== 'EOF') {
    throw fail(tokens[index], 'Unexpected token after logic');
  }
  return tree;
};

export const referencedConditions = (node: LogicNode): string[] => {
  switch (node.type) {
    case 'Ref':
      return [node.name];
    case 'Not':
      return referencedConditions(node.operand);
    case 'And':
    case 'Or':
      return [...referencedConditions(node.left), ...referencedConditions(node.right)];
  }
};

/**
 * Upper-cases condition names so lookups match the logic's case-insensitive
 * keywords. Two names that differ only in case are rejected.
 */
const normalizeConditions = (
  conditions: Readonly<Record<string, SignalSequence>>,
  length: number
): Map<string, SignalSequence> => {
  const normalized = new Map<string, SignalSequence>();
  const original = new Map<string, string>();
  for (const [name, signal] of Object.entries(conditions)) {
    if (signal.length !== length) {
      throw new SignalAlignmentError(
        `Condition '${name}' has ${signal.length} values for ${length} bars`
      );
    }
    const key = name.toUpperCase();
    const previous = original.get(key);
    if (previous !== undefined) {
      throw new DuplicateConditionError(key, [previous, name]);
    }
    original.set(key, name);
    normalized.set(key, signal);
  }
  return normalized;
};

/** Resolves every reference before evaluation, so a bad name fails the whole logic string. */
export const validateLogic = (node: LogicNode, names: ReadonlySet<string>, logic: string): void => {
  for (const name of referencedConditions(node)) {
    if (!names.has(name)) {
      throw new UnknownConditionError(name, [...names], logic);
    }
  }
};

const evaluateAt = (node: LogicNode, signals: Map<string, SignalSequence>, i: number): boolean => {
  switch (node.type) {
    case 'Ref':
      return signals.get(node.name)?.[i] === true;
    case 'Not':
      return !evaluateAt(node.operand, signals, i);
    case 'And':
      return evaluateAt(node.left, signals, i) && evaluateAt(node.right, signals, i);
    case 'Or':
      return evaluateAt(node.left, signals, i) || evaluateAt(node.right, signals, i);
  }
};

/**
 * Combines named condition signals with AND/OR/NOT into a single signal
 * aligned with `series`.
 */
export const evaluateLogic = (
  series: PriceSeries,
  conditions: Readonly<Record<string, SignalSequence>>,
  logic: string
): SignalSequence => {
  const length = series.bars.length;
  const signals = normalizeConditions(conditions, length);
  const tree = parseLogic(logic);
  validateLogic(tree, new Set(signals.keys()), logic);

  const combined: boolean[] = new Array<boolean>(length);
  for (let i = 0; i < length; i++) {
    combined[i] = evaluateAt(tree, signals, i);
  }
  return combined;
};

/**
 * Evaluates the logic block's condition list in order and names the results
 * COND1..CONDn. All expressions are parsed and checked against the series
 * columns before any of them is evaluated.
 */
export const buildConditionSignals = (
  series: PriceSeries,
  expressions: readonly string[]
): Record<string, SignalSequence> => {
  const parsed = expressions.map((expression) => {
    const node = parseCondition(expression);
    validateColumns(node, series, expression);
    return node;
  });

  const signals: Record<string, SignalSequence> = {};
  parsed.forEach((node, index) => {
    signals[conditionName(index)] = evaluateParsedCondition(node, series);
  });
  return signals;
};
