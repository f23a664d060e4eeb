import chalk from 'chalk';
import { getConfig, type TaskWaitConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMetadata = Record<string, unknown>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Formats one diagnostic line. Metadata is appended as JSON.
 */
export function formatLogLine(
  namespace: string,
  level: LogLevel,
  message: string,
  metadata?: LogMetadata
): string {
  const parts = [
    chalk.dim(`[taskwait:${namespace}]`),
    levelColors[level](level),
    message,
  ];
  if (metadata && Object.keys(metadata).length > 0) {
    parts.push(JSON.stringify(metadata));
  }
  return `${parts.join(' ')}\n`;
}

const reportedConfigs = new WeakSet<TaskWaitConfig>();

function loadConfig(): TaskWaitConfig {
  const config = getConfig();
  if (!reportedConfigs.has(config)) {
    reportedConfigs.add(config);
    for (const warning of config.warnings ?? []) {
      process.stderr.write(formatLogLine('config', 'warn', warning));
    }
  }
  return config;
}

/**
 * Creates a logger that writes to stderr, so that the wait output on stdout
 * stays clean. Debug lines are dropped unless `TASKWAIT_DEBUG` is set.
 */
export function createLogger(namespace: string): Logger {
  const write = (
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): void => {
    if (level === 'debug' && !loadConfig().debug) return;
    process.stderr.write(formatLogLine(namespace, level, message, metadata));
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, metadata) => write('error', message, metadata),
  };
}

export const waitLogger = createLogger('wait');
