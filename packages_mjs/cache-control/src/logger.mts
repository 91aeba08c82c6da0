/**
 * Package logger
 */

import { pino, type Logger } from 'pino';

function createRootLogger(): Logger {
  const level = process.env['HTTP_CACHE_LOG_LEVEL'] || 'info';

  if (process.env['HTTP_CACHE_LOG_PRETTY']) {
    return pino({
      name: 'http-cache',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      },
    });
  }

  return pino({ name: 'http-cache', level });
}

export const logger: Logger = createRootLogger();

/**
 * Child logger tagged with a component name
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
