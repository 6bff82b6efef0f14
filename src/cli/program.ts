import fs from "node:fs";
import { Command } from "commander";

import { registerDedupCommands } from "../commands/dedup.js";
import { registerRelayCommand } from "../commands/relay.js";
import { registerStatusCommand } from "../commands/status.js";
import { setConfigPath } from "../config/path.js";
import { setVerbose } from "../globals.js";
import { getLogger } from "../logging.js";

function readVersion(): string {
	// Two levels up from both src/cli and dist/cli
	const raw = fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
	const pkg: { version?: unknown } = JSON.parse(raw);
	return typeof pkg.version === "string" ? pkg.version : "0.0.0";
}

export function createProgram(): Command {
	const program = new Command()
		.name("postgate")
		.description("Telegram to X posting relay with confirmation and DM forwarding")
		.version(readVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	// Global flags must land before a command reads config or writes a log line
	program.hook("preAction", (command) => {
		const { config, verbose } = command.opts<{ config?: string; verbose?: boolean }>();
		if (config) setConfigPath(config);
		if (verbose) setVerbose(true);
		getLogger();
	});

	registerRelayCommand(program);
	registerStatusCommand(program);
	registerDedupCommands(program);
	return program;
}
