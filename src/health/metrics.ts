import type { RelayErrorKind } from "../infra/errors.js";

export type HealthState = "healthy" | "degraded" | "unhealthy";

export type MetricsSnapshot = {
	startedAt: string;
	uptimeSeconds: number;
	posts: { sent: number; failed: number; failureRate: number };
	inbound: { forwarded: number; failed: number; fetchErrors: number };
	errors: Partial<Record<RelayErrorKind, number>>;
};

const DEGRADED_FAILURE_RATE = 0.2;
const UNHEALTHY_FAILURE_RATE = 0.5;

/**
 * Process-lifetime counters for posts, inbound forwarding and errors.
 */
export class MetricsCollector {
	private readonly startedAt: number;
	private postsSent = 0;
	private postsFailed = 0;
	private forwarded = 0;
	private forwardFailed = 0;
	private fetchErrors = 0;
	private readonly errors: Partial<Record<RelayErrorKind, number>> = {};

	constructor(private readonly now: () => number = Date.now) {
		this.startedAt = now();
	}

	recordPostSent(): void {
		this.postsSent++;
	}

	recordPostFailed(kind: RelayErrorKind): void {
		this.postsFailed++;
		this.recordError(kind);
	}

	recordForwarded(): void {
		this.forwarded++;
	}

	recordForwardFailed(): void {
		this.forwardFailed++;
		this.recordError("forward_failed");
	}

	recordFetchError(kind: RelayErrorKind): void {
		this.fetchErrors++;
		this.recordError(kind);
	}

	recordError(kind: RelayErrorKind): void {
		this.errors[kind] = (this.errors[kind] ?? 0) + 1;
	}

	/** Share of post attempts that failed; 0 before any attempt. */
	postFailureRate(): number {
		const total = this.postsSent + this.postsFailed;
		return total === 0 ? 0 : this.postsFailed / total;
	}

	healthState(): HealthState {
		const rate = this.postFailureRate();
		if (rate > UNHEALTHY_FAILURE_RATE) return "unhealthy";
		if (rate > DEGRADED_FAILURE_RATE) return "degraded";
		return "healthy";
	}

	snapshot(): MetricsSnapshot {
		return {
			startedAt: new Date(this.startedAt).toISOString(),
			uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
			posts: {
				sent: this.postsSent,
				failed: this.postsFailed,
				failureRate: this.postFailureRate(),
			},
			inbound: {
				forwarded: this.forwarded,
				failed: this.forwardFailed,
				fetchErrors: this.fetchErrors,
			},
			errors: { ...this.errors },
		};
	}
}
