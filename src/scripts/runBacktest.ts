#!/usr/bin/env node
import { promises as fs } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { BacktestSession } from '../core/BacktestSession';
import { BacktestError } from '../core/errors';
import { logger } from '../utils/logger';

interface CliOptions {
  data: string;
  strategy: string;
  benchmark?: string;
  trades?: boolean;
}

const readJson = async (filePath: string): Promise<unknown> => JSON.parse(await fs.readFile(filePath, 'utf-8'));

const program = new Command()
  .name('runBacktest')
  .description('Backtest an entry/exit rule set against an OHLCV csv file')
  .requiredOption('-d, --data <csv>', 'OHLCV csv with a header row (timestamp, open, high, low, close, volume)')
  .requiredOption('-s, --strategy <json>', 'strategy request: indicators, logic and execution')
  .option('-b, --benchmark <json>', 'json array of benchmark returns used for beta')
  .option('-t, --trades', 'print the trade ledger as well as the summary');

async function runBacktest(options: CliOptions): Promise<void> {
  const session = new BacktestSession();
  await session.loadCsvFile(options.data);

  let request = await readJson(options.strategy);
  if (options.benchmark !== undefined) {
    const benchmarkReturns = z.array(z.number()).parse(await readJson(options.benchmark));
    request = { ...z.object({}).passthrough().parse(request), benchmarkReturns };
  }

  const result = session.run(request);

  console.log('\n📊 BACKTEST SUMMARY');
  console.table(result.summary);

  if (options.trades) {
    console.log('\n🧾 TRADES');
    console.table(result.trades);
  }
  if (result.openPosition !== null) {
    console.log(`\n⚠️  Position opened at ${result.openPosition.entryPrice} is still open (unrealized)`);
  }
}

program.parse();

runBacktest(program.opts<CliOptions>()).catch((error: unknown) => {
  if (error instanceof BacktestError) {
    logger.error({ code: error.code }, error.message);
  } else {
    logger.error({ err: error }, 'Backtest run failed');
  }
  process.exitCode = 1;
});
