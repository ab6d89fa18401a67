import { Logging } from 'homebridge';

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;
type LogLevel = Parameters<Logging['log']>[0];

/**
 * Console-backed `Logging` for running outside a Homebridge host. Debug lines
 * are dropped unless `debugEnabled` is set.
 */
export function createConsoleLogger(prefix: string, debugEnabled: boolean, sink: LogSink = console): Logging {
  const write = (level: string, message: string, parameters: unknown[]) => {
    if (level === 'debug' && !debugEnabled) {
      return;
    }
    const tag = `[${level.toUpperCase()}]`;
    if (level === 'error') {
      sink.error(`[${prefix}]`, tag, message, ...parameters);
    } else if (level === 'warn') {
      sink.warn(`[${prefix}]`, tag, message, ...parameters);
    } else {
      sink.log(`[${prefix}]`, tag, message, ...parameters);
    }
  };

  return Object.assign(
    (message: string, ...parameters: unknown[]) => write('info', message, parameters),
    {
      prefix,
      info: (message: string, ...parameters: unknown[]) => write('info', message, parameters),
      success: (message: string, ...parameters: unknown[]) => write('success', message, parameters),
      warn: (message: string, ...parameters: unknown[]) => write('warn', message, parameters),
      error: (message: string, ...parameters: unknown[]) => write('error', message, parameters),
      debug: (message: string, ...parameters: unknown[]) => write('debug', message, parameters),
      log: (level: LogLevel, message: string, ...parameters: unknown[]) => write(level, message, parameters),
    },
  );
}
