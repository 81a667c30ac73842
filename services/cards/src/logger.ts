import pino from 'pino';
import { config } from './config';

export type Logger = pino.Logger;

export const logger: Logger = pino({ name: 'card-cache', level: config.logLevel });

export function childLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
