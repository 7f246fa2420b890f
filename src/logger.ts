import pino from 'pino';

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/**
 * JSON logger writing to stderr, keeping stdout free for command output.
 */
export function createLogger(options: LoggerOptions = {}) {
  const { level = 'info', name = 'region-query' } = options;

  return pino({
    name,
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
  }, pino.destination(2)); // fd 2 = stderr
}

export type Logger = ReturnType<typeof createLogger>;
