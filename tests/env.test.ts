import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resetConfigCache } from "../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../src/config/path.js";
import { readEnv, telegramTokenSource } from "../src/env.js";
import type { RuntimeEnv } from "../src/runtime.js";

describe("env", () => {
	let dir: string;
	let savedToken: string | undefined;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "postgate-env-"));
		setConfigPath(path.join(dir, "postgate.json"));
		resetConfigCache();
		savedToken = process.env.TELEGRAM_BOT_TOKEN;
		delete process.env.TELEGRAM_BOT_TOKEN;
	});

	afterEach(() => {
		if (savedToken === undefined) delete process.env.TELEGRAM_BOT_TOKEN;
		else process.env.TELEGRAM_BOT_TOKEN = savedToken;
		resetConfigPath();
		resetConfigCache();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	function recordingRuntime() {
		const errors: string[] = [];
		const runtime: RuntimeEnv = {
			log: () => {},
			error: (message) => {
				errors.push(message);
			},
			exit: (code) => {
				throw new Error(`exit ${code}`);
			},
		};
		return { runtime, errors };
	}

	it("reports where the bot token comes from", () => {
		expect(telegramTokenSource("test-token")).toBe("config");
		expect(telegramTokenSource(undefined)).toBeNull();
		process.env.TELEGRAM_BOT_TOKEN = "test-token";
		expect(telegramTokenSource(undefined)).toBe("env");
	});

	it("prefers the config file token", () => {
		fs.writeFileSync(path.join(dir, "postgate.json"), '{ telegram: { botToken: "config-token" } }');
		process.env.TELEGRAM_BOT_TOKEN = "env-token";

		expect(readEnv(recordingRuntime().runtime)).toEqual({ telegramBotToken: "config-token" });
	});

	it("falls back to TELEGRAM_BOT_TOKEN", () => {
		process.env.TELEGRAM_BOT_TOKEN = "env-token";

		expect(readEnv(recordingRuntime().runtime)).toEqual({ telegramBotToken: "env-token" });
	});

	it("explains how to set a token and exits when none is found", () => {
		const { runtime, errors } = recordingRuntime();

		expect(() => readEnv(runtime)).toThrow("exit 1");
		expect(errors[0]).toBe("Telegram bot token not found.");
		expect(errors).toContain("  export TELEGRAM_BOT_TOKEN=your-token-here");
	});
});
