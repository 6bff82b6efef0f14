import { getChildLogger } from "../logging.js";
import { isRelayError } from "./errors.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "transient" | "relay" | "abort" | "unknown";

type Rule = {
	category: RejectionCategory;
	matches: (err: unknown, text: string) => boolean;
};

const CONFIG_TEXT =
	/is not configured|missing required|invalid configuration|zoderror|enoent|cannot find module/;
const FATAL_TEXT = /out of memory|assertion|maximum call stack/;

// First match wins
const RULES: readonly Rule[] = [
	{ category: "abort", matches: (err) => isAbortError(err) },
	{ category: "transient", matches: (err) => isTransientNetworkError(err) },
	// A post or forward that escaped its handler concerns one action, not the process
	{ category: "relay", matches: (err) => isRelayError(err) },
	{ category: "config", matches: (_err, text) => CONFIG_TEXT.test(text) },
	{ category: "fatal", matches: (_err, text) => FATAL_TEXT.test(text) },
];

export function categorize(err: unknown): RejectionCategory {
	const text = formatErrorSafe(err, 1000).toLowerCase();
	return RULES.find((rule) => rule.matches(err, text))?.category ?? "unknown";
}

/**
 * Route stray rejections by category. Config and fatal problems end the
 * process; aborts are dropped; everything else is logged and the relay keeps running.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const bindings = { process: processLabel, category };
		const formatted = formatErrorSafe(reason);

		if (category === "abort") {
			logger.debug(bindings, `ignored aborted operation: ${formatted}`);
			return;
		}
		if (category === "config" || category === "fatal") {
			logger.fatal(bindings, `unhandled ${category} error, exiting: ${formatted}`);
			process.exit(1);
		}
		if (category === "unknown") {
			logger.error(bindings, `unhandled rejection: ${formatted}`);
			return;
		}
		logger.warn(bindings, `unhandled rejection, continuing: ${formatted}`);
	});
}
