import type { Command } from "commander";

import { loadConfig, resolveRelaySettings } from "../config/config.js";
import { DedupStore } from "../inbound/dedup-store.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "cmd-dedup" });

function openStore(): DedupStore {
	return new DedupStore(resolveRelaySettings(loadConfig()).dedup);
}

export function registerDedupCommands(program: Command): void {
	const dedup = program
		.command("dedup")
		.description("Inspect or compact the store of already-forwarded X direct messages");

	dedup
		.command("stats")
		.description("Show how many message IDs are remembered")
		.option("--json", "Output as JSON")
		.action((opts: { json?: boolean }) => {
			try {
				const stats = openStore().stats();
				if (opts.json) {
					console.log(JSON.stringify(stats, null, 2));
					return;
				}
				console.log(`File: ${stats.filePath}`);
				console.log(`Records: ${stats.count}`);
				console.log(`Retention: ${stats.maxAgeDays} days`);
				console.log(`Oldest: ${stats.oldest ?? "-"}`);
				console.log(`Newest: ${stats.newest ?? "-"}`);
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "dedup stats failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exit(1);
			}
		});

	dedup
		.command("compact")
		.description("Drop message IDs older than the retention window")
		.action(() => {
			try {
				const store = openStore();
				const removed = store.compact();
				console.log(`Removed ${removed} record(s); ${store.count()} remaining.`);
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "dedup compact failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exit(1);
			}
		});
}
