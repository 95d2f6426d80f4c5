import { pino, type Logger } from 'pino';
import { env } from './env.js';

export const createLogger = (name: string): Logger => pino({ name, level: env.LOG_LEVEL });
