/**
 * Reason codes for Tid errors.
 */
export type TidErrorReason =
	| 'empty' // blank string after removing separators
	| 'invalid_characters' // characters outside the base-36 alphabet
	| 'invalid_integer' // non-integer or unsafe number
	| 'negative' // integer below zero
	| 'out_of_range' // integer wider than 63 bits
	| 'unsupported_version' // reserved version code
	| 'future_time'; // decoded timestamp after the current time

/**
 * Error thrown when a Tid cannot be generated, parsed or validated.
 */
export class TidError extends Error {
	constructor(
		message: string,
		public readonly reason: TidErrorReason,
		public readonly input?: string | number | bigint,
	) {
		super(message);
		this.name = 'TidError';
	}
}

export function isTidError(error: unknown): error is TidError {
	return error instanceof TidError;
}
