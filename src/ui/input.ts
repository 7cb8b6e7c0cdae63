import { VOLUME_RANGE } from "../config/constants";

const DIGITS = /^\d+$/;

/**
 * Parse a non-negative integer typed by the user; signs, decimals and blanks are rejected
 */
export function parseWholeNumber(input: string): number | null {
	const trimmed = input.trim();
	return DIGITS.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * 1-based choice into a list of `length` items.
 * Returns the zero-based index, or null to abandon ("0", out of range, not a number).
 */
export function parseSelection(input: string, length: number): number | null {
	const choice = parseWholeNumber(input);
	if (choice === null || choice < 1 || choice > length) {
		return null;
	}
	return choice - 1;
}

/**
 * Volume percent in [0, 100], or null
 */
export function parseVolume(input: string): number | null {
	const volume = parseWholeNumber(input);
	if (volume === null || volume < VOLUME_RANGE.MIN || volume > VOLUME_RANGE.MAX) {
		return null;
	}
	return volume;
}
