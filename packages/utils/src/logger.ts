/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace.
 * Diagnostics only: menus and conversion results are printed by the CLI.
 */

import pino from 'pino';

const DEFAULT_LEVEL = 'warn';

/**
 * A level name pino accepts; anything else falls back to the default.
 * The environment is only validated later, by the CLI configuration.
 */
export function resolveLogLevel(value: string | undefined): string {
  if (value === undefined) {
    return DEFAULT_LEVEL;
  }
  return value === 'silent' || Object.hasOwn(pino.levels.values, value) ? value : DEFAULT_LEVEL;
}

/**
 * Pretty, colorized output only when developing
 */
export function isPrettyLogging(nodeEnv: string | undefined): boolean {
  return nodeEnv === 'development';
}

const NODE_ENV = process.env['NODE_ENV'] ?? 'production';
const PRETTY = isPrettyLogging(NODE_ENV);

export const logger = pino({
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'mediaconv',
    env: NODE_ENV,
  },
  // stdout belongs to the interactive menus
  transport: PRETTY ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      destination: 2,
    },
  } : undefined,
}, PRETTY ? undefined : pino.destination(2));

export type Logger = typeof logger;

const children = new Set<Logger>();

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  children.add(child);
  return child;
}

/**
 * Change the level of the root logger and of every child created so far
 */
export function setLogLevel(level: string): void {
  const resolved = resolveLogLevel(level);
  logger.level = resolved;
  for (const child of children) {
    child.level = resolved;
  }
}
