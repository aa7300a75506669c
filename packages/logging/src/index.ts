import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { prettyFactory } from 'pino-pretty';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
	SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const DEFAULT_SERVICE_NAME = 'tidkit';

const PRETTY_OPTIONS = {
	translateTime: 'SYS:standard',
	ignore: 'pid,hostname',
};

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level (default: info) */
	level?: LogLevel;
	/** Service name for structured logs (default: tidkit) */
	serviceName?: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
	/** Where to write log lines (default: stdout) */
	destination?: DestinationStream;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig = {}): Logger {
	const options: LoggerOptions = {
		level: config.level ?? LogLevel.INFO,
		base: {
			service: config.serviceName ?? DEFAULT_SERVICE_NAME,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty && config.destination) {
		// transports run in a worker thread and cannot write to an in-process stream
		const prettify = prettyFactory({ ...PRETTY_OPTIONS, colorize: false });
		const destination = config.destination;
		return pino(options, {
			write: (line: string) => destination.write(prettify(line)),
		});
	}

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: { ...PRETTY_OPTIONS, colorize: true },
			},
		});
	}

	return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Create a child logger bound to a codec component
 */
export function createChildLogger(parent: Logger, component: string, bindings: Record<string, unknown> = {}): Logger {
	return parent.child({ component, ...bindings });
}

let defaultLogger: Logger = createLogger();

/**
 * Replace the logger used when none is passed explicitly
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

export function getLogger(): Logger {
	return defaultLogger;
}
