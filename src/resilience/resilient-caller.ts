/**
 * ResilientCaller: the single choke point for outbound API calls.
 *
 * Each call is spaced per operation name, retried with exponential backoff on
 * rate-limit and transient failures, and its result optionally cached for a
 * short TTL. Failures come back as a Result carrying a RelayError.
 */

import {
	NonRetriableError,
	RateLimitedError,
	type RelayError,
	type Result,
	TransientFailureError,
	isRelayError,
	isTransportError,
} from "../infra/errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { retryAsync } from "../infra/retry.js";
import { getChildLogger } from "../logging.js";
import { sleep as defaultSleep } from "../utils.js";

const logger = getChildLogger({ module: "resilient-caller" });

export type ResilientCallerConfig = {
	/** Minimum gap between attempt starts of the same operation. */
	minIntervalMs: number;
	/** Retries after the first attempt. */
	maxRetries: number;
	backoffFactor: number;
	maxBackoffMs: number;
	cacheEnabled: boolean;
	cacheTtlMs: number;
};

export type ResilientCallerDeps = {
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
};

export type CallOptions = {
	/** Set false for reads that must always hit the remote (DM polling). */
	cache?: boolean;
};

type CacheEntry = {
	value: unknown;
	storedAt: number;
};

const MAX_KEY_PART_LENGTH = 100;
const CREDENTIAL_KEY = /(password|token|secret|key|authorization)$/i;

function safeScalar(value: unknown): string | undefined {
	if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
		return undefined;
	}
	const str = String(value);
	return str.length < MAX_KEY_PART_LENGTH ? str : undefined;
}

/**
 * Build the cache key for an operation invocation.
 *
 * Only short scalars take part. Object inputs contribute their short scalar
 * fields sorted by key, skipping credential-like names, so no secret ever
 * ends up inside a key.
 */
export function buildCacheKey(operation: string, inputs: readonly unknown[]): string {
	const parts: string[] = [operation];
	for (const input of inputs) {
		const scalar = safeScalar(input);
		if (scalar !== undefined) {
			parts.push(scalar);
			continue;
		}
		if (input === null || typeof input !== "object" || Array.isArray(input)) continue;

		const fields = Object.entries(input)
			.filter(([name]) => !CREDENTIAL_KEY.test(name))
			.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
		for (const [name, value] of fields) {
			const fieldValue = safeScalar(value);
			if (fieldValue !== undefined) parts.push(`${name}=${fieldValue}`);
		}
	}
	return JSON.stringify(parts);
}

export class ResilientCaller {
	private readonly lastStart = new Map<string, number>();
	private readonly cache = new Map<string, CacheEntry>();
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(
		private readonly config: ResilientCallerConfig,
		deps: ResilientCallerDeps = {},
	) {
		this.now = deps.now ?? Date.now;
		this.sleep = deps.sleep ?? defaultSleep;
	}

	async call<T>(
		operation: string,
		thunk: () => Promise<T>,
		cacheKeyInputs: readonly unknown[] = [],
		options: CallOptions = {},
	): Promise<Result<T>> {
		const useCache = this.config.cacheEnabled && options.cache !== false;
		const cacheKey = buildCacheKey(operation, cacheKeyInputs);

		if (useCache) {
			const hit = this.cache.get(cacheKey);
			if (hit && this.now() - hit.storedAt < this.config.cacheTtlMs) {
				logger.debug({ operation }, "cache hit");
				// Keys embed the operation name, and each operation yields one result type
				return { success: true, data: hit.value as T };
			}
		}

		let attempts = 0;
		try {
			const value = await retryAsync(
				async () => {
					await this.waitForSlot(operation);
					attempts++;
					return thunk();
				},
				{
					maxAttempts: this.config.maxRetries + 1,
					baseDelayMs: this.config.minIntervalMs,
					maxDelayMs: this.config.maxBackoffMs,
					factor: this.config.backoffFactor,
					jitter: 0,
					sleep: this.sleep,
					shouldRetry: (err) =>
						!isRelayError(err) && !(isTransportError(err) && err.signal === "non_retriable"),
					retryAfterMs: (err) =>
						isTransportError(err) && err.signal === "rate_limited" ? err.resetAfterMs : undefined,
					onRetry: (err, info) => {
						logger.warn(
							{
								operation,
								attempt: info.attempt,
								maxAttempts: info.maxAttempts,
								delayMs: info.delayMs,
								error: formatErrorSafe(err),
							},
							"outbound call failed; backing off",
						);
					},
				},
			);

			if (useCache) {
				this.pruneCache();
				this.cache.set(cacheKey, { value, storedAt: this.now() });
			}
			return { success: true, data: value };
		} catch (err) {
			const error = this.classify(operation, err, attempts);
			logger.error(
				{ operation, attempts, kind: error.kind, error: formatErrorSafe(err) },
				"outbound call failed",
			);
			return { success: false, error };
		}
	}

	get cacheSize(): number {
		return this.cache.size;
	}

	/**
	 * Reserve the next start slot for an operation, then wait for it.
	 * The reservation is synchronous so concurrent callers queue up.
	 */
	private async waitForSlot(operation: string): Promise<void> {
		const now = this.now();
		const last = this.lastStart.get(operation);
		const start = last === undefined ? now : Math.max(now, last + this.config.minIntervalMs);
		this.lastStart.set(operation, start);
		if (start > now) {
			await this.sleep(start - now);
		}
	}

	private pruneCache(): void {
		const now = this.now();
		for (const [key, entry] of this.cache) {
			if (now - entry.storedAt >= this.config.cacheTtlMs) {
				this.cache.delete(key);
			}
		}
	}

	private classify(operation: string, err: unknown, attempts: number): RelayError {
		if (isRelayError(err)) return err;
		if (isTransportError(err)) {
			if (err.signal === "non_retriable") {
				return new NonRetriableError(operation, err.status, { cause: err });
			}
			if (err.signal === "rate_limited") {
				return new RateLimitedError(operation, attempts, { cause: err });
			}
		}
		return new TransientFailureError(operation, attempts, { cause: err });
	}
}
