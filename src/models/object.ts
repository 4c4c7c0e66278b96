/**
 * Filesystem-derived metadata for a stored object.
 * Read on every request, never cached.
 */
export interface ObjectMetadata {
	size: number;
	modifiedSeconds: number;
	modifiedNanos: number;
}

/**
 * One entry of a listing, as serialized to clients
 */
export interface ListedObject {
	key: string;
	size: number;
	/** Unix timestamp (seconds) of last write */
	modified: number;
}

/**
 * Inclusive byte span of an object
 */
export interface ByteRange {
	start: number;
	end: number;
}

/**
 * An object resolved on disk together with its current validator
 */
export interface StoredObject {
	key: string;
	path: string;
	metadata: ObjectMetadata;
	etag: string;
}

export type PutOutcome = "created" | "overwritten";

export interface PutResult {
	outcome: PutOutcome;
	/** The object as written, with its new validator */
	object: StoredObject;
}

/**
 * Conditional headers honored by Put
 */
export interface WriteConditions {
	ifMatch?: string;
	ifNoneMatch?: string;
}

/**
 * Conditional and range headers honored by Head/Get
 */
export interface ReadConditions {
	ifNoneMatch?: string;
	range?: string;
}

export type HeadResult =
	| { readonly _tag: "NotModified"; readonly object: StoredObject }
	| { readonly _tag: "Found"; readonly object: StoredObject };

export type GetResult =
	| { readonly _tag: "NotModified"; readonly object: StoredObject }
	| {
			readonly _tag: "Content";
			readonly object: StoredObject;
			/** Present when a Range header was satisfied */
			readonly range?: ByteRange;
			readonly body: ReadableStream<Uint8Array>;
	  };

export interface ListOptions {
	prefix?: string;
	recursive: boolean;
}
