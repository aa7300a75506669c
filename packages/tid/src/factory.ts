/**
 * Configured Tid factory.
 *
 * Binds a default version, an optional derivation secret and a logger, so
 * callers do not thread them through every call. The factory logs what it
 * produces at debug level and every rejected input at warn level; the codec
 * functions in tid.ts stay silent.
 *
 * @example
 * ```typescript
 * const tids = loadTidFactory(); // reads TID_DEFAULT_VERSION, TID_SECRET, LOG_LEVEL
 * const id = tids.generate();
 * const same = tids.parse(id.toString());
 * ```
 */

import { CommonEnvSchemas, parseEnv, z, type Env } from '@tidkit/config';
import { createChildLogger, createLogger, getLogger, type Logger } from '@tidkit/logging';
import { TidError, isTidError } from './errors.js';
import { Tid, type TidInput } from './tid.js';
import { TidVersion, isTidVersion } from './versions.js';

const versionSchema = CommonEnvSchemas.nonNegativeInt.pipe(z.number().int().min(0).max(5));

export const tidEnvSchema = z.object({
	TID_DEFAULT_VERSION: versionSchema.prefault('0'),
	TID_SECRET: CommonEnvSchemas.optionalString,
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,
});

export type TidEnv = z.infer<typeof tidEnvSchema>;

export interface TidFactoryOptions {
	/** Version used by generate() when none is given (default: 0) */
	defaultVersion?: number;
	/** Secret for derive(); without one derive() falls back to a plain hash */
	secret?: TidInput;
	/** Parent logger (default: the shared default logger) */
	logger?: Logger;
}

export interface TidFactory {
	readonly defaultVersion: TidVersion;
	readonly keyed: boolean;
	generate(version?: number): Tid;
	derive(seed: TidInput): Tid;
	parse(text: string): Tid;
	fromInteger(value: bigint | number): Tid;
}

/**
 * Create a factory bound to the given options.
 *
 * @throws TidError if the default version is not defined
 */
export function createTidFactory(options: TidFactoryOptions = {}): TidFactory {
	const defaultVersion = options.defaultVersion ?? TidVersion.RANDOM;
	if (!isTidVersion(defaultVersion)) {
		throw new TidError(`Unsupported default Tid version ${defaultVersion}`, 'unsupported_version', defaultVersion);
	}

	const { secret } = options;
	const keyed = secret !== undefined;
	const logger = createChildLogger(options.logger ?? getLogger(), 'tid');

	function logRejection<T>(operation: string, input: string | number | bigint, run: () => T): T {
		try {
			return run();
		} catch (error) {
			if (isTidError(error)) {
				logger.warn({ operation, reason: error.reason, input: String(input) }, error.message);
			}
			throw error;
		}
	}

	return {
		defaultVersion,
		keyed,

		generate(version = defaultVersion) {
			const tid = logRejection('generate', version, () => Tid.generate(version));
			logger.debug({ tid: tid.toString(), version: tid.version() }, 'Generated Tid');
			return tid;
		},

		derive(seed) {
			const tid = Tid.deriveFromSeed(seed, secret);
			logger.debug({ tid: tid.toString(), keyed }, 'Derived Tid');
			return tid;
		},

		parse(text) {
			return logRejection('parse', text, () => Tid.fromString(text));
		},

		fromInteger(value) {
			return logRejection('fromInteger', value, () => Tid.fromInteger(value));
		},
	};
}

/**
 * Create a factory from environment variables.
 *
 * @param env - Environment to read (default: process.env)
 * @param logger - Parent logger; built from LOG_LEVEL and LOG_PRETTY when omitted
 */
export function loadTidFactory(env: Env = process.env, logger?: Logger): TidFactory {
	const config = parseEnv(tidEnvSchema, env);

	return createTidFactory({
		defaultVersion: config.TID_DEFAULT_VERSION,
		secret: config.TID_SECRET,
		logger: logger ?? createLogger({ level: config.LOG_LEVEL, pretty: config.LOG_PRETTY }),
	});
}
