/**
 * Secure Logger Service
 *
 * Sanitizes sensitive data before logging so that employee identifiers
 * passed along with payroll inputs (SSNs, bank details, employer account
 * numbers) never reach the log output.
 */

import { getLogLevel, type LogLevel } from '../config/env.js';

export type { LogLevel };

// Patterns to detect and sanitize sensitive data
const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string; name: string }> = [
  // SSN patterns (XXX-XX-XXXX)
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '***-**-****', name: 'SSN' },

  // EIN (XX-XXXXXXX)
  { pattern: /\b\d{2}-\d{7}\b/g, replacement: '**-*******', name: 'EIN' },

  // Bank account numbers (4-17 digits near account context)
  { pattern: /\b\d{4,17}\b(?=.*(?:account|acct|routing|bank))/gi, replacement: '****REDACTED****', name: 'Bank Account' },
];

// Keys to redact entirely from objects
const SENSITIVE_KEYS = new Set([
  'ssn',
  'socialsecuritynumber',
  'ein',
  'fein',
  'floridaaccountnumber',
  'bankaccountnumber',
  'bankroutingnumber',
  'accountnumber',
  'routingnumber',
]);

interface LoggerOptions {
  level?: LogLevel;
  enableConsole?: boolean;
  sanitize?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private readonly level: LogLevel;
  private readonly enableConsole: boolean;
  private readonly sanitize: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? getLogLevel();
    this.enableConsole = options.enableConsole ?? true;
    this.sanitize = options.sanitize ?? true;
  }

  private sanitizeString(value: string): string {
    if (!this.sanitize) return value;

    let sanitized = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  /**
   * Deep sanitize an object, redacting sensitive keys and values
   */
  sanitizeObject(obj: unknown, depth = 0): unknown {
    if (!this.sanitize) return obj;
    if (depth > 10) return '[MAX DEPTH]';

    if (obj === null || obj === undefined) {
      return obj;
    }

    if (typeof obj === 'string') {
      return this.sanitizeString(obj);
    }

    if (typeof obj === 'number' || typeof obj === 'boolean') {
      return obj;
    }

    if (obj instanceof Error) {
      return {
        name: obj.name,
        message: this.sanitizeString(obj.message),
        stack: obj.stack ? this.sanitizeString(obj.stack) : undefined,
      };
    }

    if (Array.isArray(obj)) {
      return obj.map(item => this.sanitizeObject(item, depth + 1));
    }

    if (typeof obj === 'object') {
      const sanitized: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        if (SENSITIVE_KEYS.has(key.toLowerCase())) {
          sanitized[key] = '[REDACTED]';
        } else {
          sanitized[key] = this.sanitizeObject(value, depth + 1);
        }
      }
      return sanitized;
    }

    return String(obj);
  }

  private formatArgs(args: unknown[]): unknown[] {
    return args.map(arg => this.sanitizeObject(arg));
  }

  private shouldLog(level: LogLevel): boolean {
    return this.enableConsole && LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private formatPrefix(level: LogLevel): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatPrefix('debug'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatPrefix('info'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatPrefix('warn'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatPrefix('error'), this.sanitizeString(message), ...this.formatArgs(args));
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ContextLogger {
    return new ContextLogger(this, context);
  }
}

/**
 * Context-aware logger that prefixes all messages with context
 */
class ContextLogger {
  constructor(
    private parent: Logger,
    private context: Record<string, unknown>
  ) {}

  private formatMessage(message: string): string {
    const contextStr = Object.entries(this.context)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return `[${contextStr}] ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    this.parent.debug(this.formatMessage(message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.parent.info(this.formatMessage(message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.parent.warn(this.formatMessage(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.parent.error(this.formatMessage(message), ...args);
  }
}

// Export singleton instance
export const logger = new Logger();

// Export class for custom instances
export { Logger, ContextLogger };

export function createModuleLogger(moduleName: string): ContextLogger {
  return logger.child({ module: moduleName });
}
