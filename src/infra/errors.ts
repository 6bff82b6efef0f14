/**
 * Relay error taxonomy.
 *
 * Every failure the relay reports to a user or a caller is one of these kinds.
 * Transports never throw RelayErrors themselves; they throw TransportError and
 * the ResilientCaller maps the signal onto the taxonomy.
 */

export type RelayErrorKind =
	| "rate_limited"
	| "non_retriable"
	| "transient_failure"
	| "authorization_denied"
	| "state_conflict"
	| "validation_failed"
	| "forward_failed";

export abstract class RelayError extends Error {
	abstract readonly kind: RelayErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Retries exhausted while the remote kept signalling rate limiting. */
export class RateLimitedError extends RelayError {
	readonly kind = "rate_limited" as const;

	constructor(
		public readonly operation: string,
		public readonly attempts: number,
		options?: { cause?: unknown },
	) {
		super(`${operation}: rate limited after ${attempts} attempt(s)`, options);
	}
}

/** Permanent failure (bad request, bad credentials, forbidden). Never retried. */
export class NonRetriableError extends RelayError {
	readonly kind = "non_retriable" as const;

	constructor(
		public readonly operation: string,
		public readonly status: number | undefined,
		options?: { cause?: unknown },
	) {
		super(
			`${operation}: request rejected${status !== undefined ? ` (HTTP ${status})` : ""}`,
			options,
		);
	}
}

/** Retries exhausted on an unclassified failure. */
export class TransientFailureError extends RelayError {
	readonly kind = "transient_failure" as const;

	constructor(
		public readonly operation: string,
		public readonly attempts: number,
		options?: { cause?: unknown },
	) {
		super(`${operation}: failed after ${attempts} attempt(s)`, options);
	}
}

export class AuthorizationDeniedError extends RelayError {
	readonly kind = "authorization_denied" as const;

	constructor(public readonly userId: string) {
		super(`user ${userId} is not authorized`);
	}
}

export type StateConflictReason = "expired" | "not_found" | "wrong_state";

const STATE_CONFLICT_MESSAGES: Record<StateConflictReason, string> = {
	expired: "confirmation expired",
	not_found: "no pending confirmation",
	wrong_state: "confirmation is not in a state that allows this action",
};

/**
 * A transition was requested from a state that does not allow it
 * (stale button press, double confirm). Returned as a value, not thrown.
 */
export class StateConflictError extends RelayError {
	readonly kind = "state_conflict" as const;

	constructor(
		public readonly key: string,
		public readonly reason: StateConflictReason,
	) {
		super(`${STATE_CONFLICT_MESSAGES[reason]}: ${key}`);
	}
}

export class ValidationFailedError extends RelayError {
	readonly kind = "validation_failed" as const;
}

export class ForwardFailedError extends RelayError {
	readonly kind = "forward_failed" as const;

	constructor(
		public readonly messageId: string,
		options?: { cause?: unknown },
	) {
		super(`failed to forward inbound message ${messageId}`, options);
	}
}

export function isRelayError(err: unknown): err is RelayError {
	return err instanceof RelayError;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Transport signals
// ═══════════════════════════════════════════════════════════════════════════════

export type TransportSignal = "rate_limited" | "non_retriable" | "other";

/**
 * Thrown by transports (X client, Telegram delivery) to tell the
 * ResilientCaller how a failure should be treated.
 */
export class TransportError extends Error {
	readonly status?: number;
	/** Milliseconds until the remote rate-limit window resets, when known. */
	readonly resetAfterMs?: number;

	constructor(
		message: string,
		public readonly signal: TransportSignal,
		details: { status?: number; resetAfterMs?: number; cause?: unknown } = {},
	) {
		super(message, { cause: details.cause });
		this.name = "TransportError";
		this.status = details.status;
		this.resetAfterMs = details.resetAfterMs;
	}
}

export function isTransportError(err: unknown): err is TransportError {
	return err instanceof TransportError;
}

export type Result<T, E = RelayError> = { success: true; data: T } | { success: false; error: E };
