import { z } from 'zod';
import { InvalidStrategyError } from '../core/errors';
import type { StrategyRequest } from '../types/strategy';
import { env } from './env';

const period = z.number().int().positive();
const columnName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain identifier');

const emaSchema = z.object({
  name: z.literal('ema'),
  params: z.object({
    period,
    source: columnName.optional(),
    column: columnName.optional(),
  }),
});

const rsiSchema = z.object({
  name: z.literal('rsi'),
  params: z.object({
    period: period.default(14),
    source: columnName.optional(),
    column: columnName.optional(),
  }),
});

const macdSchema = z.object({
  name: z.literal('macd'),
  params: z
    .object({
      fastPeriod: period.default(12),
      slowPeriod: period.default(26),
      signalPeriod: period.default(9),
      source: columnName.optional(),
      macdColumn: columnName.optional(),
      signalColumn: columnName.optional(),
      histogramColumn: columnName.optional(),
    })
    .default({}),
});

const indicatorSpecSchema = z.discriminatedUnion('name', [emaSchema, rsiSchema, macdSchema]);

const logicBlockSchema = z.object({
  conditions: z.array(z.string().min(1)).min(1),
  entry: z.string().min(1),
  exit: z.string().min(1),
});

const executionParamsSchema = z.object({
  orderType: z.enum(['market', 'limit']).default('market'),
  initialBalance: z.number().positive().default(env.DEFAULT_INITIAL_BALANCE),
  positionSize: z.number().positive().default(1),
  stopLoss: z.number().optional(),
  takeProfit: z.number().optional(),
});

export const strategyRequestSchema = z.object({
  indicators: z.array(indicatorSpecSchema).default([]),
  logic: logicBlockSchema,
  execution: executionParamsSchema.default({}),
  benchmarkReturns: z.array(z.number().finite()).optional(),
});

/** Validates an untrusted request body and fills in defaults. */
export const parseStrategyRequest = (input: unknown): StrategyRequest => {
  const parsed = strategyRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidStrategyError(parsed.error.issues);
  }
  return parsed.data;
};
