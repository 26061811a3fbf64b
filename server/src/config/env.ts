import dotenv from 'dotenv';
import { isAbsolute, join, resolve } from 'path';

// Load environment variables
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Directory holding the tax-year file sets (<year>/...).
 * Defaults to data/tax under the working directory.
 */
export function getTaxDataDir(): string {
  const configured = process.env.TAX_DATA_DIR;
  if (!configured) {
    return join(process.cwd(), 'data', 'tax');
  }
  return isAbsolute(configured) ? configured : resolve(process.cwd(), configured);
}

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}
