/**
 * Tid version table.
 *
 * The low 4 bits of every Tid select one of these layouts. Time-bearing
 * versions trade timestamp precision for entropy: the more low-order seconds
 * are dropped, the more random bits fit beside the remaining timestamp.
 *
 * | Version | Dropped bits | Resolution  | Entropy bits |
 * |---------|--------------|-------------|--------------|
 * | 0       | -            | no time     | 58 (+ top)   |
 * | 1       | 0            | 1 second    | 14           |
 * | 2       | 8            | ~4.25 min   | 22           |
 * | 3       | 16           | ~18 hours   | 30           |
 * | 4       | 18           | ~3 days     | 32           |
 * | 5       | 20           | ~12 days    | 34           |
 */

/**
 * Named version codes.
 */
export const TidVersion = {
	/** Entirely random, no time information */
	RANDOM: 0,
	/** Full second resolution */
	SECOND: 1,
	/** ~4.25 minute resolution */
	MINUTES: 2,
	/** ~18 hour resolution */
	HOURS: 3,
	/** ~3 day resolution */
	DAYS: 4,
	/** ~12 day resolution */
	WEEKS: 5,
} as const;

export type TidVersionKey = keyof typeof TidVersion;
export type TidVersion = (typeof TidVersion)[TidVersionKey];

/**
 * Bit layout of a single version.
 */
export interface VersionConfig {
	/** Low-order timestamp bits discarded, or null for the random version */
	readonly droppedBits: number | null;
	/** Width of the entropy field */
	readonly entropyBits: number;
}

export const VERSION_BITS = 4n;
export const VERSION_MASK = (1n << VERSION_BITS) - 1n;

/** Largest integer a Tid may hold (2^63 - 1) */
export const MAX_TID = (1n << 63n) - 1n;

/** Bit 62, always set on random and derived Tids */
export const TOP_BIT = 1n << 62n;

export const VERSION_CONFIGS = Object.freeze({
	0: Object.freeze({ droppedBits: null, entropyBits: 58 }),
	1: Object.freeze({ droppedBits: 0, entropyBits: 14 }),
	2: Object.freeze({ droppedBits: 8, entropyBits: 22 }),
	3: Object.freeze({ droppedBits: 16, entropyBits: 30 }),
	4: Object.freeze({ droppedBits: 18, entropyBits: 32 }),
	5: Object.freeze({ droppedBits: 20, entropyBits: 34 }),
}) satisfies Readonly<Record<TidVersion, VersionConfig>>;

/**
 * Check whether a number is a defined version code.
 */
export function isTidVersion(version: number): version is TidVersion {
	return Number.isInteger(version) && Object.prototype.hasOwnProperty.call(VERSION_CONFIGS, version);
}

