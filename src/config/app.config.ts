import { z } from 'zod';
import type { LogLevel } from '@nestjs/common';

export const APP_CONFIG = 'APP_CONFIG';

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

const ConfigSchema = z.object({
  PORT: z.string().optional().default('3000').transform(Number).pipe(z.number().int().positive()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  INITIAL_BALANCE: z
    .string()
    .optional()
    .default('100000')
    .refine((value) => DECIMAL_PATTERN.test(value), 'INITIAL_BALANCE must be a non-negative decimal'),
  NET_WORTH_HISTORY_LIMIT: z.string().optional().default('50').transform(Number).pipe(z.number().int().positive()),
  TRANSACTION_HISTORY_LIMIT: z.string().optional().default('50').transform(Number).pipe(z.number().int().positive()),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  initialBalance: string;
  netWorthHistoryLimit: number;
  transactionHistoryLimit: number;
}

/**
 * Parses environment variables into typed settings.
 * Throws with every offending variable listed so startup fails loudly.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }

  return {
    port: parsed.data.PORT,
    nodeEnv: parsed.data.NODE_ENV,
    logLevel: parsed.data.LOG_LEVEL,
    initialBalance: parsed.data.INITIAL_BALANCE,
    netWorthHistoryLimit: parsed.data.NET_WORTH_HISTORY_LIMIT,
    transactionHistoryLimit: parsed.data.TRANSACTION_HISTORY_LIMIT,
  };
}

const LEVEL_ORDER: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

// Nest takes the full list of enabled levels rather than a threshold
export function enabledLogLevels(threshold: LogLevel): LogLevel[] {
  const index = LEVEL_ORDER.indexOf(threshold);
  return index === -1 ? LEVEL_ORDER.slice(0, 3) : LEVEL_ORDER.slice(0, index + 1);
}
