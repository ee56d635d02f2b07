import { pino, type Logger } from 'pino';

import { defaultConfig } from './config.js';

/** Silent unless LOG_LEVEL asks otherwise; scripts may also pass their own logger. */
export const logger: Logger = pino({ name: 'edition-pages', level: defaultConfig().logLevel });

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
