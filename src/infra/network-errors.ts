/**
 * Classify failures from Telegram and X calls.
 *
 * Errors thrown by fetch wrap the socket error in `cause`, and aggregate
 * errors carry `errors`, so every check looks at the whole nested set.
 */

import { isTransportError } from "./errors.js";

const SOCKET_CODES: ReadonlySet<string> = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGE =
	/fetch failed|network error|socket hang up|other side closed|terminated|econnreset|etimedout|econnrefused|request to .* failed|client network socket disconnected|write epipe|timed out after/i;

const ABORT_MESSAGE = /(this|the) operation was aborted|signal is aborted/i;

type Fields = {
	name?: unknown;
	code?: unknown;
	message?: unknown;
};

/**
 * Flatten an error and everything nested under `cause`, `reason` and
 * `errors` into one list. Cycles are visited once.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const out: unknown[] = [];
	const visited = new Set<object>();

	const visit = (value: unknown, depth: number): void => {
		if (value == null || depth > maxDepth) return;
		if (typeof value !== "object") {
			out.push(value);
			return;
		}
		if (visited.has(value)) return;
		visited.add(value);
		out.push(value);

		const nested: unknown[] = [];
		if ("cause" in value) nested.push(value.cause);
		if ("reason" in value) nested.push(value.reason);
		if ("errors" in value && Array.isArray(value.errors)) nested.push(...value.errors);
		for (const child of nested) visit(child, depth + 1);
	};

	visit(err, 0);
	return out;
}

function fieldsOf(value: unknown): Fields {
	if (typeof value === "string") return { message: value };
	if (typeof value !== "object" || value === null) return {};
	return {
		name: "name" in value ? value.name : undefined,
		code: "code" in value ? value.code : undefined,
		message: "message" in value ? value.message : undefined,
	};
}

function messageOf(value: unknown): string | null {
	const { message } = fieldsOf(value);
	return typeof message === "string" ? message : null;
}

function anyCandidate(err: unknown, test: (candidate: unknown) => boolean): boolean {
	return collectErrorCandidates(err).some(test);
}

function isTransientCandidate(candidate: unknown): boolean {
	const { name, code } = fieldsOf(candidate);
	if (name === "TimeoutError") return true;
	if (typeof code === "string" && SOCKET_CODES.has(code)) return true;
	if (isTransportError(candidate) && candidate.status !== undefined) {
		// X answers 5xx and 408 while degraded
		if (candidate.status >= 500 || candidate.status === 408) return true;
	}
	const message = messageOf(candidate);
	return message !== null && TRANSIENT_MESSAGE.test(message);
}

/** True when the failure is a network or server hiccup worth another attempt. */
export function isTransientNetworkError(err: unknown): boolean {
	return anyCandidate(err, isTransientCandidate);
}

/** True for cancellations, which are expected while shutting down. */
export function isAbortError(err: unknown): boolean {
	return anyCandidate(err, (candidate) => {
		const { name, code } = fieldsOf(candidate);
		if (name === "AbortError" || code === "ABORT_ERR") return true;
		const message = messageOf(candidate);
		return message !== null && ABORT_MESSAGE.test(message);
	});
}

/**
 * One-line description of an error for logs and chat replies.
 * URLs are masked since X and Telegram URLs can carry tokens.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	let text: string;
	try {
		if (err instanceof Error) {
			text = `${err.name}: ${err.message}`;
			if (err.cause) text += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
		} else {
			text = String(err);
		}
	} catch {
		return "error (could not format)";
	}

	const masked = text.replace(/https?:\/\/\S+/g, "[URL]");
	return masked.length <= maxLength ? masked : `${masked.slice(0, maxLength - 3)}...`;
}
