/**
 * Component logger
 *
 * Thin wrapper over the console that stamps every line with a
 * `[Component]` prefix and appends structured context as JSON. Components
 * receive a Logger at construction so tests can hand in spies.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

function formatContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) return '';
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return ' [unserializable context]';
  }
}

export function createLogger(component: string, sink: LogSink = console): Logger {
  const prefix = `[${component}]`;
  return {
    info: (message, context) => sink.log(`${prefix} ${message}${formatContext(context)}`),
    warn: (message, context) => sink.warn(`${prefix} ${message}${formatContext(context)}`),
    error: (message, context) => sink.error(`${prefix} ${message}${formatContext(context)}`),
  };
}

/** Render an unknown thrown value as a message, the way the consumer records it. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
