/**
 * Structured logging.
 */

import { pino, type DestinationStream, type Logger } from 'pino';
import { loadConfig, type LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
	/** Defaults to SLOTWISE_LOG_LEVEL */
	level?: LogLevel;
	/** Defaults to stdout */
	destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const level = options.level ?? loadConfig().logLevel;
	const settings = { name: 'slotwise', level };

	return options.destination ? pino(settings, options.destination) : pino(settings);
}
