/**
 * Base-36 string form of Tid integers.
 *
 * Digits are 0-9 and lowercase a-z. For readability the digits are grouped
 * into dash-separated chunks of four, e.g. 28740015009630 -> "a6qz-aw3fi".
 * A trailing chunk of one or two characters is merged into the chunk before
 * it, so "ABCDEFGHI" becomes "ABCD-EFGHI" rather than "ABCD-EFGH-I".
 *
 * These helpers do not check the Tid layout; see `Tid.fromString` for that.
 */

import { TidError } from './errors.js';
import { MAX_TID } from './versions.js';

export const SEPARATOR = '-';

const CHUNK_SIZE = 4;
const MIN_TRAILING_CHUNK = 3;
const RADIX = 36n;

const BASE36_PATTERN = /^[0-9a-z]+$/i;
const NON_ALPHANUMERIC = /[^0-9a-z]/gi;
const SEPARATORS = new RegExp(SEPARATOR, 'g');

/**
 * Group a string into dash-separated chunks of four.
 * Any non-alphanumeric characters, including misplaced dashes, are discarded first.
 */
export function formatString(input: string): string {
	const clean = input.replace(NON_ALPHANUMERIC, '');
	const chunks: string[] = [];

	for (let i = 0; i < clean.length; i += CHUNK_SIZE) {
		chunks.push(clean.slice(i, i + CHUNK_SIZE));
	}

	if (chunks.length > 1) {
		const last = chunks[chunks.length - 1] ?? '';
		if (last.length < MIN_TRAILING_CHUNK) {
			const previous = chunks[chunks.length - 2] ?? '';
			chunks.splice(-2, 2, previous + last);
		}
	}

	return chunks.join(SEPARATOR);
}

/**
 * Encode a non-negative integer as an ungrouped lowercase base-36 string.
 */
export function toCompactBase36(value: bigint): string {
	if (value < 0n) {
		throw new TidError(`Cannot encode negative value ${value}`, 'negative', value);
	}
	return value.toString(36);
}

/**
 * Encode a non-negative integer as a grouped base-36 string.
 */
export function encodeBase36(value: bigint): string {
	return formatString(toCompactBase36(value));
}

/**
 * Decode a base-36 string, with or without separators, to an integer.
 *
 * @throws TidError if the string is empty, contains characters outside the
 * base-36 alphabet, or decodes to more than 63 bits
 */
export function decodeBase36(input: string): bigint {
	const digits = input.replace(SEPARATORS, '');

	if (digits === '') {
		throw new TidError('Invalid empty Tid string', 'empty', input);
	}
	if (!BASE36_PATTERN.test(digits)) {
		throw new TidError(`Invalid Tid characters in '${input}'`, 'invalid_characters', input);
	}

	let value = 0n;
	for (const char of digits.toLowerCase()) {
		value = value * RADIX + BigInt(Number.parseInt(char, 36));
		if (value > MAX_TID) {
			throw new TidError(`Tid string '${input}' exceeds 63 bits`, 'out_of_range', input);
		}
	}

	return value;
}
