import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

export const DEFAULT_LOG_FILE = path.join(CONFIG_DIR, "logs", "postgate.log");

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

export type LoggerResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

// Subset of the SonicBoom stream returned by pino.destination()
type Sink = pino.DestinationStream & {
	flushSync?: () => void;
	end?: () => void;
};

/*
 * Modules take their child loggers at import time, before --config and
 * --verbose are applied. The root logger is therefore built once at "trace";
 * the effective level is checked per call and the file behind it can be swapped.
 */
let root: Logger | null = null;
let sink: { file: string; stream: Sink } | null = null;
let threshold = pino.levels.values.info ?? 30;
let override: LoggerSettings | null = null;

function resolveSettings(): LoggerResolvedSettings {
	const configured = override ?? loadConfig().logging;
	return {
		level: isVerbose() ? "debug" : (configured.level ?? "info"),
		file: configured.file ?? DEFAULT_LOG_FILE,
	};
}

/** Log lines can include chat and post ids, so the file stays owner-only. */
function openSink(file: string): Sink {
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	fs.writeFileSync(file, "", { flag: "a", mode: 0o600 });
	fs.chmodSync(file, 0o600);
	return pino.destination({ dest: file, sync: true });
}

function release(stream: Sink): void {
	try {
		stream.flushSync?.();
		stream.end?.();
	} catch (err) {
		process.stderr.write(`postgate: failed to close log file: ${String(err)}\n`);
	}
}

function applySettings(settings: LoggerResolvedSettings): void {
	threshold =
		settings.level === "silent"
			? Number.POSITIVE_INFINITY
			: (pino.levels.values[settings.level] ?? threshold);
	if (sink && sink.file !== settings.file) {
		release(sink.stream);
		sink = null;
	}
}

// The file is opened on the first line written, not when a module asks for a logger
const forwarder: pino.DestinationStream = {
	write(line: string) {
		if (!sink) {
			const { file } = resolveSettings();
			sink = { file, stream: openSink(file) };
		}
		sink.stream.write(line);
	},
};

export function getLogger(): Logger {
	applySettings(resolveSettings());
	root ??= pino(
		{
			level: "trace",
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
			hooks: {
				logMethod(args, method, level) {
					if (level >= threshold) method.apply(this, args);
				},
			},
		},
		forwarder,
	);
	return root;
}

export function getChildLogger(bindings: Bindings = {}): Logger {
	return getLogger().child(bindings);
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

/** Bypass the config file (tests). */
export function setLoggerOverride(settings: LoggerSettings | null): void {
	override = settings;
	closeLogger();
	applySettings(resolveSettings());
}

export function closeLogger(): void {
	if (sink) release(sink.stream);
	sink = null;
}
