import { z } from "zod";
import { getConfigPath, loadConfig } from "./config/config.js";
import { defaultRuntime, type RuntimeEnv } from "./runtime.js";

const RelayEnvSchema = z.object({
	telegramBotToken: z.string().min(1),
});

export type RelayEnv = z.infer<typeof RelayEnvSchema>;

export type TokenSource = "config" | "env";

/**
 * Where the Telegram bot token comes from, if anywhere.
 * The config file wins over TELEGRAM_BOT_TOKEN.
 */
export function telegramTokenSource(configToken: string | undefined): TokenSource | null {
	if (configToken) return "config";
	if (process.env.TELEGRAM_BOT_TOKEN) return "env";
	return null;
}

/**
 * Read and validate the secrets the relay needs to start.
 *
 * SECURITY: the config file (0600, in the data dir) is preferred;
 * TELEGRAM_BOT_TOKEN is accepted for container deployments.
 */
export function readEnv(runtime: RuntimeEnv = defaultRuntime): RelayEnv {
	const config = loadConfig();
	const token = config.telegram.botToken ?? process.env.TELEGRAM_BOT_TOKEN;

	const result = RelayEnvSchema.safeParse({ telegramBotToken: token ?? "" });
	if (!result.success) {
		runtime.error("Telegram bot token not found.");
		runtime.error("");
		runtime.error("Option 1 - Config file:");
		runtime.error(`  Add to ${getConfigPath()}:`);
		runtime.error('  { "telegram": { "botToken": "your-token-here" } }');
		runtime.error("");
		runtime.error("Option 2 - Environment variable:");
		runtime.error("  export TELEGRAM_BOT_TOKEN=your-token-here");
		runtime.error("");
		runtime.error("Get a token from @BotFather on Telegram");
		return runtime.exit(1);
	}

	return result.data;
}
