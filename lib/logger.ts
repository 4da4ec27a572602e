/**
 * Process logger
 * Prefixed console output for the bot, the pipeline and the consent CLI
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

interface LogContext {
  [key: string]: unknown;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  green: '\x1b[32m',
} as const;

const levelStyle: Record<LogLevel, { color: string; label: string }> = {
  debug: { color: colors.gray, label: 'DEBUG' },
  info: { color: colors.cyan, label: 'INFO' },
  warn: { color: colors.yellow, label: 'WARN' },
  error: { color: colors.red, label: 'ERROR' },
};

// Shared by every logger so a single setLogLevel call applies everywhere
let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimumLevel);
}

export class Logger {
  private readonly prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  private header(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
    const { color, label } = levelStyle[level];

    return `${colors.gray}[${timestamp}]${colors.reset} ${color}[${label}]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}`;
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const contextStr = context
      ? `${colors.green}\n${JSON.stringify(context, null, 2)}${colors.reset}`
      : '';
    return this.header(level, message) + contextStr;
  }

  debug(message: string, context?: LogContext): void {
    if (!isEnabled('debug')) return;
    // eslint-disable-next-line no-console
    console.debug(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!isEnabled('info')) return;
    // eslint-disable-next-line no-console
    console.info(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!isEnabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  private formatError(error: unknown): string {
    if (!(error instanceof Error)) {
      return `\n${colors.red}Error details:${colors.reset}\n${JSON.stringify(error, null, 2)}`;
    }

    let output = `\n${colors.red}${error.name}: ${error.message}${colors.reset}`;

    // Stack without its first line, which repeats the message
    if (error.stack) {
      const stackLines = error.stack.split('\n').slice(1);
      output += `\n${colors.gray}${stackLines.join('\n')}${colors.reset}`;
    }

    if (error.cause) {
      output += `\n\n${colors.yellow}Caused by:${colors.reset}`;
      output += this.formatError(error.cause);
    }

    return output;
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!isEnabled('error')) return;

    let output = this.header('error', message);

    // ExtendedError details are folded into the context block
    let mergedContext: LogContext = { ...context };
    if (
      error &&
      typeof error === 'object' &&
      'details' in error &&
      typeof error.details === 'object' &&
      error.details !== null
    ) {
      mergedContext = { ...mergedContext, ...error.details };
    }

    if (Object.keys(mergedContext).length > 0) {
      output += `\n${colors.green}Context:${colors.reset}\n${JSON.stringify(mergedContext, null, 2)}`;
    }

    if (error) {
      output += this.formatError(error);
    }

    console.error(output);
  }
}

export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}
