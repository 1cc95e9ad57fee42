/**
 * Console-backed logger.
 *
 * Components log with a bracketed prefix (e.g. `[GitHubClient]`) and accept an
 * injected Logger so tests can silence or inspect output.
 */

import type { Logger } from '../../integrations/github/types.js';

export type { Logger };

export function createLogger(options: { debug?: boolean } = {}): Logger {
  return {
    log: (...args: unknown[]) => console.log(...args),
    warn: (...args: unknown[]) => console.warn(...args),
    error: (...args: unknown[]) => console.error(...args),
    debug: options.debug ? (...args: unknown[]) => console.debug(...args) : () => undefined,
  };
}

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
