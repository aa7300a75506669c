/**
 * @tidkit/tid
 *
 * Compact, sortable, human-readable identifiers packed into 63-bit integers.
 *
 * @example
 * ```typescript
 * import { generate, fromString, TidVersion } from '@tidkit/tid';
 *
 * const id = generate(TidVersion.HOURS);
 * const text = id.toString(); // e.g. "4ha4-a44oar"
 * fromString(text).equals(id); // true
 * id.earliestDate(); // start of the ~18 hour window it was created in
 * ```
 */

// Tid codec
export {
	Tid,
	type TidInput,
	generate,
	deriveFromSeed,
	hashGenerate,
	hmacGenerate,
	fromInteger,
	fromString,
	isValidInteger,
	isValidString,
	compare,
} from './tid.js';

// Version table
export {
	TidVersion,
	type TidVersionKey,
	type VersionConfig,
	VERSION_CONFIGS,
	VERSION_BITS,
	MAX_TID,
	isTidVersion,
} from './versions.js';

// String form
export { SEPARATOR, formatString, encodeBase36, decodeBase36, toCompactBase36 } from './base36.js';

// Errors
export { TidError, type TidErrorReason, isTidError } from './errors.js';

// Configured factory
export {
	tidEnvSchema,
	type TidEnv,
	type TidFactory,
	type TidFactoryOptions,
	createTidFactory,
	loadTidFactory,
} from './factory.js';
