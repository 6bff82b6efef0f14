import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { registerDedupCommands } from "../../src/commands/dedup.js";
import { resetConfigCache } from "../../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../../src/config/path.js";

describe("dedup commands", () => {
	let dir: string;
	let storeFile: string;
	let output: string[];

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "postgate-cmd-"));
		storeFile = path.join(dir, "processed.json");
		const configFile = path.join(dir, "postgate.json");
		fs.writeFileSync(configFile, JSON.stringify({ inbound: { store: { file: storeFile, maxAgeDays: 7 } } }));
		setConfigPath(configFile);
		resetConfigCache();
		output = [];
		vi.spyOn(console, "log").mockImplementation((line?: unknown) => {
			output.push(String(line));
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
		resetConfigPath();
		resetConfigCache();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	function program(): Command {
		const cmd = new Command().exitOverride();
		registerDedupCommands(cmd);
		return cmd;
	}

	it("prints store stats as JSON", async () => {
		const recent = new Date(Date.now() - 60_000).toISOString();
		fs.writeFileSync(storeFile, JSON.stringify({ version: 1, records: { "dm-1": recent } }));

		await program().parseAsync(["dedup", "stats", "--json"], { from: "user" });

		expect(JSON.parse(output.join("\n"))).toEqual({
			count: 1,
			filePath: storeFile,
			maxAgeDays: 7,
			oldest: recent,
			newest: recent,
		});
	});

	it("compacts records past the retention window", async () => {
		const old = new Date(Date.now() - 30 * 24 * 60 * 60 * 1000).toISOString();
		const recent = new Date(Date.now() - 60_000).toISOString();
		fs.writeFileSync(storeFile, JSON.stringify({ version: 1, records: { old, recent } }));

		await program().parseAsync(["dedup", "compact"], { from: "user" });

		// Old records are already dropped on load, so compact has nothing left to remove
		expect(output).toEqual(["Removed 0 record(s); 1 remaining."]);
		expect(Object.keys(JSON.parse(fs.readFileSync(storeFile, "utf8")).records)).toEqual(["recent"]);
	});
});
