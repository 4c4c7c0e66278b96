const DEFAULT_CONTENT_TYPE = "application/octet-stream";

const CONTENT_TYPES: Readonly<Record<string, string>> = {
	png: "image/png",
	jpg: "image/jpeg",
	jpeg: "image/jpeg",
	gif: "image/gif",
	webp: "image/webp",
	svg: "image/svg+xml",
	txt: "text/plain; charset=utf-8",
	json: "application/json",
	html: "text/html; charset=utf-8",
	css: "text/css; charset=utf-8",
	js: "application/javascript",
	pdf: "application/pdf",
	mp4: "video/mp4",
	mp3: "audio/mpeg",
	wav: "audio/wav",
};

/** Last non-empty segment of a key, so `dir/` names `dir` as it is stored */
export function fileName(key: string): string {
	const segments = key.split(/[/\\]/).filter((segment) => segment.length > 0);
	return segments.at(-1) ?? "file";
}

/**
 * Infer a content type from the key's extension (case-insensitive).
 */
export function contentTypeFor(key: string): string {
	const name = fileName(key);
	const dot = name.lastIndexOf(".");
	if (dot <= 0 || dot === name.length - 1) return DEFAULT_CONTENT_TYPE;

	const extension = name.slice(dot + 1).toLowerCase();
	return Object.hasOwn(CONTENT_TYPES, extension)
		? CONTENT_TYPES[extension]
		: DEFAULT_CONTENT_TYPE;
}

/**
 * `attachment` unless the caller asked for an inline view.
 */
export function contentDisposition(key: string, download: boolean): string {
	const disposition = download ? "attachment" : "inline";
	const name = fileName(key).replace(/["\\]/g, "\\$&");
	return `${disposition}; filename="${name}"`;
}
