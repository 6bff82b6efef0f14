import type { Command } from "commander";
import type { FastifyInstance } from "fastify";

import { loadConfig, type RelaySettings, resolveRelaySettings } from "../config/config.js";
import { readEnv } from "../env.js";
import { buildHealthServer } from "../health/server.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";
import { RelayCore } from "../relay/core.js";
import { createPostExecutor } from "../relay/post-executor.js";
import { AccessControl } from "../security/access.js";
import { createXClient, resolveXCredentials } from "../social/x-client.js";
import { createTelegramBot, formatBotInfo } from "../telegram/client.js";
import { createChatDelivery, createTelegramPhotoFetcher } from "../telegram/delivery.js";
import { registerRelayHandlers } from "../telegram/handlers.js";

const logger = getChildLogger({ module: "cmd-relay" });

export type RelayOptions = {
	dryRun?: boolean;
};

export type StartupLimits = {
	settings: RelaySettings;
	warnings: string[];
};

/**
 * Turn off DM forwarding when it cannot work: without a target chat there is
 * nowhere to deliver, and without an X token (dry run) every poll would be
 * rejected as unauthorized.
 */
export function applyStartupLimits(settings: RelaySettings, options: { hasXToken: boolean }): StartupLimits {
	if (!settings.inbound.enabled) return { settings, warnings: [] };
	const warnings: string[] = [];
	if (!settings.inbound.targetChatId) {
		warnings.push("inbound.targetChatId is not set; DM forwarding disabled.");
	}
	if (!options.hasXToken) {
		warnings.push("No X access token (dry run); DM forwarding disabled.");
	}
	if (warnings.length === 0) return { settings, warnings };
	return { settings: { ...settings, inbound: { ...settings.inbound, enabled: false } }, warnings };
}

export function registerRelayCommand(program: Command): void {
	program
		.command("relay")
		.description("Start the Telegram to X relay")
		.option("--dry-run", "Log posts instead of publishing them")
		.action(async (opts: RelayOptions) => {
			try {
				const cfg = loadConfig();
				const env = readEnv();
				const dryRun = opts.dryRun ?? cfg.x.dryRun;
				const resolved = resolveRelaySettings(cfg);

				const x = createXClient(cfg.x, { dryRun });
				if (!x) {
					console.error("\n❌ X access token not found.\n");
					console.error("Set X_USER_ACCESS_TOKEN (or x.userAccessToken in the config file),");
					console.error("or start with --dry-run to try the relay without posting.\n");
					process.exit(1);
				}

				const { settings, warnings } = applyStartupLimits(resolved, {
					hasXToken: Boolean(resolveXCredentials(cfg.x).accessToken),
				});
				for (const warning of warnings) {
					console.warn(`⚠️  ${warning}`);
				}

				installUnhandledRejectionHandler("relay");

				const { bot, botInfo } = await createTelegramBot({ token: env.telegramBotToken });
				const core = new RelayCore({
					settings,
					postExecutor: createPostExecutor(
						x,
						createTelegramPhotoFetcher(bot.api, env.telegramBotToken),
					),
					fetchInbound: (pageSize) => x.fetchDirectMessages(pageSize),
					deliver: createChatDelivery(bot.api, settings.inbound.targetChatId),
					verifyCredentials: () => x.verifyCredentials(),
				});
				const access = new AccessControl(cfg.telegram.authorizedUserIds);
				const albums = registerRelayHandlers(bot, {
					core,
					access,
					dryRun,
					maxImageBytes: cfg.telegram.maxImageBytes,
					mediaGroupDelayMs: cfg.telegram.mediaGroupDelaySeconds * 1000,
				});

				console.log("Starting postgate relay...");
				console.log(formatBotInfo(botInfo));
				console.log(`Mode: ${dryRun ? "dry run (nothing is published)" : "live"}`);
				console.log(`Confirmation: ${settings.confirmation.enabled ? "enabled" : "disabled"}`);
				console.log(`DM forwarding: ${settings.inbound.enabled ? "enabled" : "disabled"}`);
				if (access.size === 0) {
					console.log(
						"Warning: No authorized users configured - bot will DENY everyone. Add IDs to telegram.authorizedUserIds.",
					);
				}

				let health: FastifyInstance | null = null;
				if (cfg.health.enabled) {
					health = await buildHealthServer({ core, logLevel: cfg.logging.level });
					await health.listen({ host: cfg.health.host, port: cfg.health.port });
					console.log(`Health server: http://${cfg.health.host}:${cfg.health.port}`);
				}

				core.start();

				let stopping: Promise<void> | null = null;
				const shutdown = (): Promise<void> => {
					stopping ??= (async () => {
						console.log("\nShutting down...");
						// Stop taking updates first, then background work, then the health server
						await bot.stop();
						albums.clear();
						await core.shutdown();
						if (health) {
							await health.close();
						}
					})();
					return stopping;
				};
				const onSignal = () => {
					shutdown().catch((err) => {
						logger.error({ error: formatErrorSafe(err) }, "shutdown failed");
						process.exitCode = 1;
					});
				};
				process.once("SIGINT", onSignal);
				process.once("SIGTERM", onSignal);

				await bot.start({
					drop_pending_updates: false,
					onStart: () => logger.info("telegram polling started"),
				});

				// bot.start() resolves once polling stops
				await shutdown();
				console.log("Relay stopped.");
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "relay command failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exit(1);
			}
		});
}
