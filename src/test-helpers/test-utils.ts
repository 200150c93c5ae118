import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AppConfig } from '../config/app-config';

export const TEST_STOCK_CODES = ['AAPL', 'MSFT', 'GOOG'];

export interface TestDataDir {
  dir: string;
  config: AppConfig;
  readLedger(): Promise<string>;
  cleanup(): Promise<void>;
}

/**
 * Temporary directory holding a stock code file and (optionally) a
 * pre-populated ledger file, plus a config pointing at both.
 */
export async function createTestDataDir(
  options: { stockCodes?: string[]; ledgerLines?: string[]; config?: Partial<AppConfig> } = {},
): Promise<TestDataDir> {
  const dir = await mkdtemp(join(tmpdir(), 'trade-ledger-'));
  const stockCodeFile = join(dir, 'stockcode.csv');
  const ordersFile = join(dir, 'orders.csv');

  await writeFile(stockCodeFile, (options.stockCodes ?? TEST_STOCK_CODES).map((code) => `${code}\n`).join(''));
  if (options.ledgerLines) {
    await writeFile(ordersFile, options.ledgerLines.map((line) => `${line}\n`).join(''));
  }

  const config: AppConfig = {
    stockCodeFile,
    ordersFile,
    nettingPolicy: 'same-action',
    logLevel: 'error',
    ...options.config,
  };

  return {
    dir,
    config,
    readLedger: () => readFile(config.ordersFile, 'utf8'),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
