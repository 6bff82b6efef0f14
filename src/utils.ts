import os from "node:os";
import path from "node:path";

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that resolves early (without throwing) once the signal aborts.
 * Used by background loops so that stop() does not wait out a full interval.
 */
export function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
	if (signal.aborted || ms <= 0) {
		return Promise.resolve();
	}
	return new Promise((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Count characters the way X does for the length limit: by code point,
 * so a surrogate pair (most emoji) counts once.
 */
export function codePointLength(text: string): number {
	return Array.from(text).length;
}

export const CONFIG_DIR = process.env.POSTGATE_DATA_DIR ?? path.join(os.homedir(), ".postgate");
