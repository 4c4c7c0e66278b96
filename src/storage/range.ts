import type { ByteRange } from "../models/object";

const UNIT_PREFIX = "bytes=";
const DIGITS = /^\d+$/;

function parseOffset(value: string): number | null {
	if (!DIGITS.test(value)) return null;
	const parsed = Number(value);
	return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Parse a single-range `Range` header against an object of `total` bytes.
 *
 * Supported forms:
 * - `bytes=start-`     -> start..total-1
 * - `bytes=-N`         -> the last min(N, total) bytes
 * - `bytes=start-end`  -> start..end
 *
 * Returns null for anything else, including multiple ranges. Callers answer
 * null with 416, they do not fall back to the full body.
 */
export function parseRange(header: string, total: number): ByteRange | null {
	const value = header.trim();
	if (!value.startsWith(UNIT_PREFIX)) return null;

	const byteSpec = value.slice(UNIT_PREFIX.length);
	if (byteSpec.includes(",")) return null;

	const parts = byteSpec.split("-");
	if (parts.length !== 2) return null;
	const [startText, endText] = parts;

	if (startText === "") {
		const suffix = parseOffset(endText);
		if (suffix === null || suffix === 0 || total === 0) return null;
		const length = Math.min(suffix, total);
		return { start: total - length, end: total - 1 };
	}

	const start = parseOffset(startText);
	if (start === null) return null;

	if (endText === "") {
		if (start >= total) return null;
		return { start, end: total - 1 };
	}

	const end = parseOffset(endText);
	if (end === null || start > end || end >= total) return null;
	return { start, end };
}

export function formatContentRange(range: ByteRange, total: number): string {
	return `bytes ${range.start}-${range.end}/${total}`;
}

export function formatUnsatisfiedRange(total: number): string {
	return `bytes */${total}`;
}
