// src/services/telemetry.ts
/**
 * Wide Event / Canonical Log Line implementation
 *
 * Instead of scattered log lines, we emit ONE comprehensive event per
 * request with all context: identifiers, timing per phase, outcome and the
 * error that ended the request, if any.
 *
 * The app's request middleware owns the builder; handlers and the auth
 * middleware add phases and metadata. The finalized event goes to an
 * EventSink, which in production is consoleSink.
 */

export const SERVICE_NAME = "bucket-gateway";
export const SERVICE_VERSION = "0.1.0";

/**
 * Wide event structure for one HTTP request
 */
export interface RequestEvent {
	// Identifiers
	timestamp: string;
	requestId: string;
	method: string;
	path: string;

	// Service info
	service: typeof SERVICE_NAME;
	version: string;

	// Timing
	durationMs?: number;
	phases?: Record<string, number>; // phase name -> duration in ms

	// Outcome
	status?: number;
	outcome: "success" | "error";

	// Error details (if outcome === "error")
	error?: {
		type: string;
		code: string;
		message: string;
	};

	// Additional context (object key, principal subject, ...)
	metadata?: Record<string, unknown>;
}

export type EventSink = (event: RequestEvent) => void;

/**
 * Emit one JSON line per request. Server errors log at error level,
 * client errors at warn.
 */
export const consoleSink: EventSink = (event) => {
	const status = event.status ?? 0;
	const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";
	const line = JSON.stringify({ level, type: "http.request", ...event });

	if (level === "error") console.error(line);
	else console.log(line);
};

/**
 * Mutable event builder - accumulates context throughout request lifecycle
 */
export class RequestEventBuilder {
	private event: RequestEvent;
	private startTime: number;
	private phaseTimers: Map<string, number> = new Map();

	constructor(requestId: string, method: string, path: string) {
		this.startTime = Date.now();
		this.event = {
			requestId,
			method,
			path,
			timestamp: new Date().toISOString(),
			service: SERVICE_NAME,
			version: SERVICE_VERSION,
			outcome: "success",
		};
	}

	get requestId(): string {
		return this.event.requestId;
	}

	setStatus(status: number): this {
		this.event.status = status;
		if (status >= 400) this.event.outcome = "error";
		return this;
	}

	setError(error: NonNullable<RequestEvent["error"]>): this {
		this.event.error = error;
		this.event.outcome = "error";
		return this;
	}

	setMetadata(metadata: Record<string, unknown>): this {
		this.event.metadata = { ...this.event.metadata, ...metadata };
		return this;
	}

	startPhase(name: string): this {
		this.phaseTimers.set(name, Date.now());
		return this;
	}

	endPhase(name: string): this {
		const start = this.phaseTimers.get(name);
		if (start !== undefined) {
			const duration = Date.now() - start;
			this.event.phases = { ...this.event.phases, [name]: duration };
			this.phaseTimers.delete(name);
		}
		return this;
	}

	finalize(): RequestEvent {
		this.event.durationMs = Date.now() - this.startTime;
		return this.event;
	}
}
