// src/config.ts

import { z } from 'zod';
import { DEFAULT_TIMEOUT_SECONDS, MAX_TIMEOUT_SECONDS } from './constants/constants.js';
import { ModbusConfigError } from './errors.js';
import { LogLevel } from './types/modbus-types.js';

const emptyAsUnset = (value: unknown): unknown => (value === '' ? undefined : value);

const seconds = z.coerce.number().gt(0).max(MAX_TIMEOUT_SECONDS);

const EnvSchema = z.object({
  MODBUS_LOG_LEVEL: z.preprocess(
    emptyAsUnset,
    z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info')
  ),
  MODBUS_DEFAULT_TIMEOUT: z.preprocess(emptyAsUnset, seconds.default(DEFAULT_TIMEOUT_SECONDS)),
  MODBUS_REQUEST_TIMEOUT: z.preprocess(emptyAsUnset, seconds.optional()),
  MODBUS_LOG_COLORS: z.preprocess(
    emptyAsUnset,
    z
      .enum(['true', 'false'])
      .default('false')
      .transform(value => value === 'true')
  ),
});

export interface GatewayConfig {
  logLevel: LogLevel;
  /** Connect timeout, seconds */
  defaultTimeout: number;
  /** Per-transaction deadline, seconds */
  requestTimeout: number;
  logColors: boolean;
}

/**
 * Reads the gateway settings from environment variables.
 * @throws ModbusConfigError naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ModbusConfigError(issue.path.join('.'), issue.message);
  }
  const config = parsed.data;
  return {
    logLevel: config.MODBUS_LOG_LEVEL,
    defaultTimeout: config.MODBUS_DEFAULT_TIMEOUT,
    requestTimeout: config.MODBUS_REQUEST_TIMEOUT ?? config.MODBUS_DEFAULT_TIMEOUT,
    logColors: config.MODBUS_LOG_COLORS,
  };
}
