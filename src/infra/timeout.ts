/**
 * Deadlines for outbound calls.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

function hasDeadline(timeoutMs: number): boolean {
	return timeoutMs > 0 && Number.isFinite(timeoutMs);
}

function startTimer(timeoutMs: number, onFire: () => void): ReturnType<typeof setTimeout> {
	const timer = setTimeout(onFire, timeoutMs);
	// A pending deadline must not keep the CLI alive
	timer.unref();
	return timer;
}

export type FetchDeadline = {
	timeoutMs: number;
	fetchImpl?: typeof fetch;
};

/**
 * fetch() that aborts the request itself once the deadline passes.
 */
export async function fetchWithTimeout(
	url: string | URL,
	init: RequestInit,
	{ timeoutMs, fetchImpl = fetch }: FetchDeadline,
): Promise<Response> {
	if (!hasDeadline(timeoutMs)) {
		return fetchImpl(url, init);
	}

	const controller = new AbortController();
	const timer = startTimer(timeoutMs, () => {
		controller.abort(new TimeoutError(`fetch timed out after ${timeoutMs}ms`, timeoutMs));
	});

	try {
		return await fetchImpl(url, { ...init, signal: controller.signal });
	} finally {
		clearTimeout(timer);
	}
}
