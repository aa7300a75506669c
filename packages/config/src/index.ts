import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

export type Env = Record<string, string | undefined>;

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error listing every invalid variable.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Env = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => {
			const key = issue.path.map(String).join('.');
			return `  ${key}: ${issue.message}`;
		});

		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Non-negative integer from string */
	nonNegativeInt: z
		.string()
		.regex(/^\d+$/, 'Expected a non-negative integer')
		.transform((v) => Number(v))
		.pipe(z.number().int().min(0)),

	/** Optional non-blank string */
	optionalString: z.string().trim().min(1).optional(),
};

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
