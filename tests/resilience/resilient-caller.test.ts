import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import {
	NonRetriableError,
	RateLimitedError,
	TransientFailureError,
	TransportError,
	ValidationFailedError,
} from "../../src/infra/errors.js";
import {
	buildCacheKey,
	type ResilientCallerConfig,
	ResilientCaller,
} from "../../src/resilience/resilient-caller.js";

const CONFIG: ResilientCallerConfig = {
	minIntervalMs: 1000,
	maxRetries: 3,
	backoffFactor: 2,
	maxBackoffMs: 300_000,
	cacheEnabled: true,
	cacheTtlMs: 300_000,
};

function createCaller(overrides: Partial<ResilientCallerConfig> = {}) {
	let clock = 0;
	const sleep = vi.fn(async (ms: number) => {
		clock += ms;
	});
	const caller = new ResilientCaller({ ...CONFIG, ...overrides }, { now: () => clock, sleep });
	return {
		caller,
		sleep,
		advance: (ms: number) => {
			clock += ms;
		},
	};
}

function rateLimited(resetAfterMs?: number): TransportError {
	return new TransportError("X POST /2/tweets failed (429)", "rate_limited", {
		status: 429,
		resetAfterMs,
	});
}

describe("ResilientCaller", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("retries through rate limiting with exponential backoff", async () => {
		const { caller, sleep } = createCaller();
		const thunk = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(rateLimited())
			.mockRejectedValueOnce(rateLimited())
			.mockResolvedValue("ok");

		const result = await caller.call("create_post", thunk, [], { cache: false });

		expect(result).toEqual({ success: true, data: "ok" });
		expect(thunk).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls).toEqual([[1000], [2000]]);
	});

	it("does not retry a non-retriable failure", async () => {
		const { caller, sleep } = createCaller();
		const thunk = vi
			.fn<() => Promise<string>>()
			.mockRejectedValue(new TransportError("unauthorized", "non_retriable", { status: 401 }));

		const result = await caller.call("create_post", thunk);

		expect(thunk).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
		expect(result.success).toBe(false);
		if (result.success) return;
		expect(result.error).toBeInstanceOf(NonRetriableError);
		expect(result.error.kind).toBe("non_retriable");
		expect(result.error.message).toBe("create_post: request rejected (HTTP 401)");
	});

	it("reports rate_limited once retries run out under rate limiting", async () => {
		const { caller } = createCaller({ maxRetries: 2 });
		const thunk = vi.fn<() => Promise<string>>().mockRejectedValue(rateLimited());

		const result = await caller.call("fetch_direct_messages", thunk, [], { cache: false });

		expect(thunk).toHaveBeenCalledTimes(3);
		expect(result.success).toBe(false);
		if (result.success) return;
		expect(result.error).toBeInstanceOf(RateLimitedError);
		expect(result.error.message).toBe("fetch_direct_messages: rate limited after 3 attempt(s)");
	});

	it("reports transient_failure once retries run out on other errors", async () => {
		const { caller } = createCaller({ maxRetries: 1 });
		const thunk = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("socket hang up"));

		const result = await caller.call("create_post", thunk, [], { cache: false });

		expect(thunk).toHaveBeenCalledTimes(2);
		expect(result.success).toBe(false);
		if (result.success) return;
		expect(result.error).toBeInstanceOf(TransientFailureError);
		expect(result.error.kind).toBe("transient_failure");
	});

	it("passes relay errors through unchanged without retrying", async () => {
		const { caller } = createCaller();
		const error = new ValidationFailedError("text too long");
		const thunk = vi.fn<() => Promise<string>>().mockRejectedValue(error);

		const result = await caller.call("create_post", thunk);

		expect(thunk).toHaveBeenCalledTimes(1);
		expect(result).toEqual({ success: false, error });
	});

	it("shortens the wait to the reset hint but keeps the spacing", async () => {
		const { caller, sleep } = createCaller();
		const thunk = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(rateLimited(250))
			.mockResolvedValue("ok");

		await caller.call("create_post", thunk, [], { cache: false });

		// backoff 1000 shortened to 250, then 750 more to honor the 1000ms spacing
		expect(sleep.mock.calls).toEqual([[250], [750]]);
	});

	it("spaces consecutive calls of the same operation only", async () => {
		const { caller, sleep } = createCaller();
		const ok = async () => "ok";

		await caller.call("create_post", ok, [], { cache: false });
		await caller.call("create_post", ok, [], { cache: false });
		await caller.call("verify_credentials", ok, [], { cache: false });

		expect(sleep.mock.calls).toEqual([[1000]]);
	});

	it("queues concurrent calls of the same operation one interval apart", async () => {
		vi.useFakeTimers({ now: 0 });
		const caller = new ResilientCaller(CONFIG, {
			now: () => Date.now(),
			sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
		});
		const starts: number[] = [];
		const post = (text: string) =>
			caller.call(
				"create_post",
				async () => {
					starts.push(Date.now());
					return text;
				},
				[text],
				{ cache: false },
			);

		const all = Promise.all([post("a"), post("b"), post("c")]);
		await vi.advanceTimersByTimeAsync(2000);

		expect(await all).toEqual([
			{ success: true, data: "a" },
			{ success: true, data: "b" },
			{ success: true, data: "c" },
		]);
		expect(starts).toEqual([0, 1000, 2000]);
	});

	it("serves cached results within the TTL", async () => {
		const { caller, advance } = createCaller();
		const thunk = vi.fn(async () => ({ id: "42" }));

		await caller.call("verify_credentials", thunk, ["42"]);
		const second = await caller.call("verify_credentials", thunk, ["42"]);
		expect(second).toEqual({ success: true, data: { id: "42" } });
		expect(thunk).toHaveBeenCalledTimes(1);
		expect(caller.cacheSize).toBe(1);

		advance(300_000);
		await caller.call("verify_credentials", thunk, ["42"]);
		expect(thunk).toHaveBeenCalledTimes(2);
	});

	it("bypasses the cache when asked", async () => {
		const { caller } = createCaller();
		const thunk = vi.fn(async () => "fresh");

		await caller.call("fetch_direct_messages", thunk, [50], { cache: false });
		await caller.call("fetch_direct_messages", thunk, [50], { cache: false });

		expect(thunk).toHaveBeenCalledTimes(2);
		expect(caller.cacheSize).toBe(0);
	});

	it("does not cache failures", async () => {
		const { caller } = createCaller({ maxRetries: 0 });
		const thunk = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new Error("boom"))
			.mockResolvedValue("ok");

		const first = await caller.call("verify_credentials", thunk);
		const second = await caller.call("verify_credentials", thunk);

		expect(first.success).toBe(false);
		expect(second).toEqual({ success: true, data: "ok" });
	});
});

describe("buildCacheKey", () => {
	it("keeps short scalars and sorted non-credential fields", () => {
		const key = buildCacheKey("verify_credentials", [
			{ userId: "42", accessToken: "test-secret", apiKey: "test-key", baseUrl: "https://api.x.com" },
			5,
			["ignored"],
			"x".repeat(100),
		]);

		expect(key).toBe('["verify_credentials","baseUrl=https://api.x.com","userId=42","5"]');
		expect(key).not.toContain("test-secret");
	});

	it("distinguishes operations with the same inputs", () => {
		expect(buildCacheKey("a", [1])).not.toBe(buildCacheKey("b", [1]));
	});
});
