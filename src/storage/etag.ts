import type { BigIntStats } from "node:fs";

import type { ObjectMetadata } from "../models/object";

const NANOS_PER_SECOND = 1_000_000_000n;

/**
 * Weak validator for an object version.
 *
 * A pure function of size and modification time, so two reads of an
 * unchanged file agree and any write that touches size or mtime differs.
 */
export function makeEtag(meta: ObjectMetadata): string {
	return `W/"${meta.size}-${meta.modifiedSeconds}-${meta.modifiedNanos}"`;
}

/**
 * Extract object metadata from a bigint stat (nanosecond mtime).
 */
export function metadataFromStats(stats: BigIntStats): ObjectMetadata {
	const mtimeNs = stats.mtimeNs < 0n ? 0n : stats.mtimeNs;
	return {
		size: Number(stats.size),
		modifiedSeconds: Number(mtimeNs / NANOS_PER_SECOND),
		modifiedNanos: Number(mtimeNs % NANOS_PER_SECOND),
	};
}

/**
 * Compare a conditional header value against the current validator.
 */
export function etagMatches(header: string | undefined, etag: string): boolean {
	return header !== undefined && header.trim() === etag;
}
