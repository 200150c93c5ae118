import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadEnv } from 'dotenv';
import { LogLevel } from '@nestjs/common';
import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

export const NETTING_POLICY_NAMES = ['same-action', 'opposing-action'] as const;
export type NettingPolicyName = (typeof NETTING_POLICY_NAMES)[number];

// Most severe first; a configured level enables itself and everything before it.
const LOG_LEVELS = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const;
type ConfiguredLogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  STOCKCODE_FILE: z.string().min(1).default('data/stockcode.csv'),
  ORDERS_FILE: z.string().min(1).default('data/orders.csv'),
  NETTING_POLICY: z.enum(NETTING_POLICY_NAMES).default('same-action'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('error'),
});

export interface AppConfig {
  stockCodeFile: string;
  ordersFile: string;
  nettingPolicy: NettingPolicyName;
  logLevel: ConfiguredLogLevel;
}

/**
 * Loads `.env` from the working directory (or `ENV_FILE`) without
 * overriding variables already set in the environment.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): void {
  const candidate = env.ENV_FILE ?? resolve(process.cwd(), '.env');
  if (existsSync(candidate)) {
    loadEnv({ path: candidate, override: false });
  }
}

/**
 * Validates environment variables into the typed application config.
 * @throws ZodError when a variable holds an unsupported value
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    stockCodeFile: parsed.STOCKCODE_FILE,
    ordersFile: parsed.ORDERS_FILE,
    nettingPolicy: parsed.NETTING_POLICY,
    logLevel: parsed.LOG_LEVEL,
  };
}

/** Expands a configured level into the level list Nest's logger expects. */
export function toNestLogLevels(level: ConfiguredLogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
