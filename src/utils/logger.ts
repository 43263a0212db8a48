import pino from 'pino';

export type LoggerLevel = 'silent' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LoggerFormat = 'json' | 'terminal';

export interface LoggerOptions {
  level: LoggerLevel;
  format?: LoggerFormat;
}

let instance: pino.Logger = pino({level: 'info'});


export function configure(options: LoggerOptions): void {

  if (options.format === 'terminal') {
    instance = pino({
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    });
  } else {
    instance = pino({level: options.level});
  }

}


// Lets the rest of the app log in the form logger.warn('Something happened', err)
function toBindings(details?: unknown): Record<string, unknown> {
  if (details === undefined) return {};
  if (details instanceof Error) return {err: details};
  return {data: details};
}

export function debug(message: string, details?: unknown): void {
  instance.debug(toBindings(details), message);
}

export function info(message: string, details?: unknown): void {
  instance.info(toBindings(details), message);
}

export function warn(message: string, details?: unknown): void {
  instance.warn(toBindings(details), message);
}

export function error(message: string, details?: unknown): void {
  instance.error(toBindings(details), message);
}
