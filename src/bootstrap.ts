import { NestFactory } from '@nestjs/core';
import { INestApplicationContext } from '@nestjs/common';
import { Readable, Writable } from 'node:stream';
import { ZodError } from 'zod';
import { AppModule } from './app.module';
import { loadAppConfig, toNestLogLevels } from './config/app-config';
import { OrderRunnerService } from './cli/order-runner.service';
import { OrderFileUnavailableError, StorageUnavailableError } from './common/errors';

export const USAGE = 'Usage: trade-ledger [orders-file]';

export interface ProcessIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

/**
 * No arguments: interactive prompt. One argument: batch file.
 * Resolves with the process exit code; failures are reported on `io.stderr`.
 */
export async function bootstrap(args: string[], io: ProcessIo, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  if (args.length > 1) {
    io.stderr.write(`${USAGE}\n`);
    return 1;
  }

  try {
    await run(args[0], io, env);
    return 0;
  } catch (err) {
    io.stderr.write(`Error: ${describeFailure(err)}\n`);
    return 1;
  }
}

async function run(ordersFile: string | undefined, io: ProcessIo, env: NodeJS.ProcessEnv): Promise<void> {
  const config = loadAppConfig(env);

  const app: INestApplicationContext = await NestFactory.createApplicationContext(
    AppModule.register(config),
    { logger: toNestLogLevels(config.logLevel), abortOnError: false },
  );

  try {
    const runner = app.get(OrderRunnerService);
    if (ordersFile === undefined) {
      await runner.runInteractive(io.stdin, io.stdout);
    } else {
      await runner.runBatch(ordersFile, io.stdout);
    }
  } finally {
    await app.close();
  }
}

export function describeFailure(err: unknown): string {
  if (err instanceof ZodError) {
    const issues = err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return `Invalid configuration. ${issues.join('; ')}`;
  }
  if (err instanceof StorageUnavailableError || err instanceof OrderFileUnavailableError) {
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}
