import { sleep as defaultSleep } from "../utils.js";

/** Exponential backoff parameters. */
export type RetryConfig = {
	/** Total attempts, the first one included. */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	factor: number;
	/** Fraction of the delay to randomize by, in either direction. */
	jitter: number;
};

export type RetryInfo = {
	/** 1-based number of the attempt that just failed. */
	attempt: number;
	maxAttempts: number;
	delayMs: number;
};

export type RetryOptions = Partial<RetryConfig> & {
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	onRetry?: (err: unknown, info: RetryInfo) => void;
	/** Wait the remote asked for. It may shorten the backoff but never lengthens it. */
	retryAfterMs?: (err: unknown) => number | undefined;
	sleep?: (ms: number) => Promise<void>;
};

const clamp = (value: number, min: number, max = Number.POSITIVE_INFINITY): number =>
	Math.min(max, Math.max(min, value));

export function resolveRetryConfig(opts: Partial<RetryConfig> = {}): RetryConfig {
	return {
		maxAttempts: clamp(opts.maxAttempts ?? 3, 1),
		baseDelayMs: clamp(opts.baseDelayMs ?? 1000, 0),
		maxDelayMs: clamp(opts.maxDelayMs ?? 30_000, 0),
		factor: clamp(opts.factor ?? 2, 1),
		jitter: clamp(opts.jitter ?? 0.25, 0, 1),
	};
}

/** Delay after the given failed attempt (1-based), capped and jittered. */
export function computeRetryDelay(config: RetryConfig, attempt: number): number {
	const capped = Math.min(config.baseDelayMs * config.factor ** (attempt - 1), config.maxDelayMs);
	const spread = config.jitter === 0 ? 0 : (Math.random() - 0.5) * 2 * capped * config.jitter;
	return Math.max(0, Math.round(capped + spread));
}

function nextDelay(config: RetryConfig, attempt: number, hint: number | undefined): number {
	const computed = computeRetryDelay(config, attempt);
	return hint !== undefined && hint >= 0 ? Math.min(hint, computed) : computed;
}

/**
 * Run `fn` until it resolves or attempts run out, sleeping with exponential
 * backoff in between. The last error is rethrown.
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
	const config = resolveRetryConfig(opts);
	const sleep = opts.sleep ?? defaultSleep;

	let attempt = 0;
	while (true) {
		attempt++;
		try {
			return await fn();
		} catch (err) {
			if (attempt >= config.maxAttempts) throw err;

			const info: RetryInfo = { attempt, maxAttempts: config.maxAttempts, delayMs: 0 };
			if (opts.shouldRetry && !opts.shouldRetry(err, info)) throw err;

			info.delayMs = nextDelay(config, attempt, opts.retryAfterMs?.(err));
			opts.onRetry?.(err, info);
			if (info.delayMs > 0) await sleep(info.delayMs);
		}
	}
}
