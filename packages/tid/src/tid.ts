/**
 * Tid (Time-ordered ID) codec
 *
 * A Tid is a non-negative integer of at most 63 bits, laid out as
 * (most significant bit first):
 * - timestamp: Unix seconds with `droppedBits` low bits removed (absent in version 0)
 * - entropy: `entropyBits` random bits
 * - version: 4 bits selecting the layout (see versions.ts)
 *
 * Rendered as grouped base-36 strings (e.g. "4ha4-a44oar"). Tids of the same
 * version sort by their time floor in integer form.
 *
 * Version 0 Tids carry no time at all. They always set bit 62, so their
 * string form is a stable 13 characters.
 */

import crypto from 'node:crypto';
import { decodeBase36, encodeBase36, toCompactBase36 } from './base36.js';
import { TidError } from './errors.js';
import {
	MAX_TID,
	TOP_BIT,
	TidVersion,
	VERSION_BITS,
	VERSION_CONFIGS,
	VERSION_MASK,
	isTidVersion,
	type VersionConfig,
} from './versions.js';

/** Random bits in a version 0 Tid, excluding the forced top bit */
const RANDOM_VERSION_BITS = 58;

/** Bits discarded from a 64-bit digest to leave 58 */
const DIGEST_SHIFT = 6n;

export type TidInput = string | Uint8Array;

/**
 * Current Unix time in whole seconds.
 */
function nowSeconds(): bigint {
	return BigInt(Math.floor(Date.now() / 1000));
}

function mask(bits: number): bigint {
	return (1n << BigInt(bits)) - 1n;
}

/**
 * Generate a cryptographically random value of the given bit width.
 */
function randomBits(bits: number): bigint {
	const bytes = crypto.randomBytes(Math.ceil(bits / 8));
	let value = 0n;
	for (const byte of bytes) {
		value = (value << 8n) | BigInt(byte);
	}
	return value & mask(bits);
}

/**
 * Pack 58 random bits as a version 0 Tid with bit 62 set.
 */
function packRandom(random: bigint): bigint {
	return (random << VERSION_BITS) | BigInt(TidVersion.RANDOM) | TOP_BIT;
}

/**
 * Earliest Unix time a Tid of the given layout could have been generated at.
 */
function decodeEarliestTime(value: bigint, config: VersionConfig): bigint {
	if (config.droppedBits === null) {
		return 0n;
	}
	return ((value >> VERSION_BITS) >> BigInt(config.entropyBits)) << BigInt(config.droppedBits);
}

function toBigIntInput(value: bigint | number): bigint {
	if (typeof value === 'bigint') {
		return value;
	}
	if (!Number.isSafeInteger(value)) {
		throw new TidError(`Tid integer must be a safe integer, got ${value}`, 'invalid_integer', value);
	}
	return BigInt(value);
}

/**
 * Validate a raw integer against the Tid layout and return its version.
 */
function validate(value: bigint): TidVersion {
	if (value < 0n) {
		throw new TidError('Tid integer must not be negative', 'negative', value);
	}
	if (value > MAX_TID) {
		throw new TidError('Tid integer must fit in 63 bits', 'out_of_range', value);
	}

	const version = Number(value & VERSION_MASK);
	if (!isTidVersion(version)) {
		throw new TidError(`Unsupported Tid version ${version}`, 'unsupported_version', value);
	}

	if (decodeEarliestTime(value, VERSION_CONFIGS[version]) > nowSeconds()) {
		throw new TidError('Tid timestamp is in the future', 'future_time', value);
	}

	return version;
}

/**
 * Tid class for working with time-ordered IDs
 */
export class Tid {
	private readonly value: bigint;
	private readonly config: VersionConfig;
	private readonly versionCode: TidVersion;

	private constructor(value: bigint, version: TidVersion) {
		this.value = value;
		this.versionCode = version;
		this.config = VERSION_CONFIGS[version];
	}

	/**
	 * Generate a new Tid of the given version.
	 *
	 * @throws TidError if the version is not defined
	 */
	static generate(version: number = TidVersion.RANDOM): Tid {
		if (!isTidVersion(version)) {
			throw new TidError(`Unsupported Tid version ${version}`, 'unsupported_version', version);
		}

		const config = VERSION_CONFIGS[version];
		if (config.droppedBits === null) {
			return new Tid(packRandom(randomBits(RANDOM_VERSION_BITS)), TidVersion.RANDOM);
		}

		const entropyBits = BigInt(config.entropyBits);
		let value = nowSeconds() >> BigInt(config.droppedBits);
		value = (value << entropyBits) | randomBits(config.entropyBits);
		value = (value << VERSION_BITS) | BigInt(version);

		return Tid.fromInteger(value);
	}

	/**
	 * Derive a version 0 Tid deterministically from a seed.
	 *
	 * Without a secret the seed is hashed with SHA-256, so anyone who can guess
	 * the seed can reproduce the Tid. With a secret HMAC-SHA256 is used instead.
	 */
	static deriveFromSeed(seed: TidInput, secret?: TidInput): Tid {
		const digest =
			secret === undefined
				? crypto.createHash('sha256').update(seed).digest()
				: crypto.createHmac('sha256', secret).update(seed).digest();

		const random = digest.readBigUInt64BE(0) >> DIGEST_SHIFT;
		return new Tid(packRandom(random), TidVersion.RANDOM);
	}

	/**
	 * Create a Tid from its integer form.
	 *
	 * @throws TidError if the integer is negative, wider than 63 bits, has an
	 * undefined version, or implies a creation time in the future
	 */
	static fromInteger(value: bigint | number): Tid {
		const int = toBigIntInput(value);
		return new Tid(int, validate(int));
	}

	/**
	 * Parse a Tid from its string form. Separators and letter case are ignored.
	 *
	 * @throws TidError if the string is not a valid Tid
	 */
	static fromString(text: string): Tid {
		return Tid.fromInteger(decodeBase36(text));
	}

	/**
	 * Get the version code (lowest 4 bits)
	 */
	version(): TidVersion {
		return this.versionCode;
	}

	/**
	 * Get the start of the window this Tid was generated in, as Unix seconds.
	 * Always 0 for version 0.
	 */
	earliestTime(): number {
		return Number(decodeEarliestTime(this.value, this.config));
	}

	/**
	 * Get the earliest time with every entropy bit set, as Unix seconds.
	 * This is 2^58 - 1 for version 0.
	 */
	latestTime(): number {
		return Number(decodeEarliestTime(this.value, this.config) | mask(this.config.entropyBits));
	}

	/**
	 * Get the last second of the resolution bucket this Tid was generated in,
	 * as Unix seconds. Always 0 for version 0.
	 */
	windowEnd(): number {
		const { droppedBits } = this.config;
		if (droppedBits === null) {
			return 0;
		}
		return Number(decodeEarliestTime(this.value, this.config) | mask(droppedBits));
	}

	earliestDate(): Date {
		return new Date(this.earliestTime() * 1000);
	}

	windowEndDate(): Date {
		return new Date(this.windowEnd() * 1000);
	}

	/**
	 * Get the width of the entropy field for this Tid's version
	 */
	entropyBits(): number {
		return this.config.entropyBits;
	}

	/**
	 * Get the random component. For version 0 this is every bit above the
	 * version tag, including the forced top bit.
	 */
	randomBits(): bigint {
		const random = this.value >> VERSION_BITS;
		if (this.config.droppedBits === null) {
			return random;
		}
		return random & mask(this.config.entropyBits);
	}

	/**
	 * Get the Tid as a BigInt
	 */
	toBigInt(): bigint {
		return this.value;
	}

	valueOf(): bigint {
		return this.value;
	}

	/**
	 * Get the Tid as a grouped base-36 string (e.g. "4ha4-a44oar")
	 */
	toString(): string {
		return encodeBase36(this.value);
	}

	/**
	 * Get the Tid as base-36 without separators
	 */
	toCompactString(): string {
		return toCompactBase36(this.value);
	}

	/**
	 * Tids serialize to JSON as their string form.
	 */
	toJSON(): string {
		return this.toString();
	}

	equals(other: Tid): boolean {
		return this.value === other.value;
	}
}

/**
 * Generate a new Tid of the given version.
 * This is the primary function for generating IDs.
 */
export function generate(version: number = TidVersion.RANDOM): Tid {
	return Tid.generate(version);
}

export function deriveFromSeed(seed: TidInput, secret?: TidInput): Tid {
	return Tid.deriveFromSeed(seed, secret);
}

/**
 * Derive a Tid from a plain SHA-256 hash of the seed.
 * Use when determinism matters but guessing resistance does not.
 */
export function hashGenerate(seed: TidInput): Tid {
	return Tid.deriveFromSeed(seed);
}

/**
 * Derive a Tid from an HMAC-SHA256 of the seed keyed by a secret.
 */
export function hmacGenerate(seed: TidInput, secret: TidInput): Tid {
	return Tid.deriveFromSeed(seed, secret);
}

export function fromInteger(value: bigint | number): Tid {
	return Tid.fromInteger(value);
}

export function fromString(text: string): Tid {
	return Tid.fromString(text);
}

/**
 * Check whether an integer is a valid Tid
 */
export function isValidInteger(value: bigint | number): boolean {
	try {
		Tid.fromInteger(value);
		return true;
	} catch {
		return false;
	}
}

/**
 * Check whether a string is a valid Tid
 */
export function isValidString(text: string): boolean {
	try {
		Tid.fromString(text);
		return true;
	} catch {
		return false;
	}
}

/**
 * Order two Tids by integer value, for use with Array.prototype.sort
 */
export function compare(a: Tid, b: Tid): number {
	const left = a.toBigInt();
	const right = b.toBigInt();
	if (left === right) {
		return 0;
	}
	return left < right ? -1 : 1;
}
