#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { formatErrorSafe } from "./infra/network-errors.js";
import { closeLogger } from "./logging.js";

try {
	await createProgram().parseAsync(process.argv);
} catch (err) {
	console.error(`Error: ${formatErrorSafe(err)}`);
	process.exitCode = 1;
} finally {
	// The sync pino destination holds the file descriptor open
	closeLogger();
}
