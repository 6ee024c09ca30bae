/**
 * Process-wide diagnostics. Logging never influences codec results.
 */

import pino from 'pino';
import { defaultLogLevel, readEnvironment, type LogLevel } from './config.ts';

const namespaces = ['grammar', 'huffman', 'encoder', 'detector', 'keySearch', 'profile'] as const;

type Namespace = (typeof namespaces)[number];
type LogMeta = Record<string, unknown>;
type LogFn = (message: string, meta?: LogMeta, error?: Error) => void;
type NamespaceLogger = Record<'debug' | 'info' | 'warn' | 'error', LogFn>;

const rootLogger = pino({
  level: defaultLogLevel(readEnvironment()),
  formatters: {
    level: (label) => ({ level: label.toUpperCase() }),
  },
});

function createLogFn(namespace: Namespace, level: keyof NamespaceLogger): LogFn {
  return (message, meta, error) => {
    const record: LogMeta = { namespace, ...meta };
    if (error) {
      record.err = { name: error.name, message: error.message, stack: error.stack };
    }
    rootLogger[level](record, message);
  };
}

function createNamespaceLogger(namespace: Namespace): NamespaceLogger {
  return {
    debug: createLogFn(namespace, 'debug'),
    info: createLogFn(namespace, 'info'),
    warn: createLogFn(namespace, 'warn'),
    error: createLogFn(namespace, 'error'),
  };
}

export const log: Record<Namespace, NamespaceLogger> = {
  grammar: createNamespaceLogger('grammar'),
  huffman: createNamespaceLogger('huffman'),
  encoder: createNamespaceLogger('encoder'),
  detector: createNamespaceLogger('detector'),
  keySearch: createNamespaceLogger('keySearch'),
  profile: createNamespaceLogger('profile'),
};

/**
 * Explicit process-start initialisation; overrides the level taken from the
 * environment.
 */
export function initLogging(options: { level?: LogLevel } = {}): void {
  rootLogger.level = options.level ?? defaultLogLevel(readEnvironment());
}

export function currentLogLevel(): string {
  return rootLogger.level;
}

export { namespaces };
export type { Namespace, NamespaceLogger };
