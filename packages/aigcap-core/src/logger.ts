import { pino, type Logger } from 'pino';

let silent: Logger | null = null;

/**
 * Logger used by core components when the caller injects none.
 */
export function silentLogger(): Logger {
  if (!silent) {
    silent = pino({ enabled: false });
  }
  return silent;
}
