import fs from "node:fs";
import type { Command } from "commander";

import { getConfigPath, loadConfig, resolveRelaySettings } from "../config/config.js";
import { telegramTokenSource } from "../env.js";
import { DedupStore } from "../inbound/dedup-store.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { resolveXCredentials } from "../social/x-client.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show postgate configuration and dedup store state")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusOptions) => {
			try {
				const configPath = getConfigPath();
				const hasConfig = fs.existsSync(configPath);
				const cfg = loadConfig();
				const settings = resolveRelaySettings(cfg);
				const tokenSource = telegramTokenSource(cfg.telegram.botToken);
				const xCredentials = resolveXCredentials(cfg.x);
				const dedup = new DedupStore(settings.dedup).stats();

				const status = {
					config: {
						path: configPath,
						exists: hasConfig,
					},
					environment: {
						telegramToken: tokenSource ? `set (${tokenSource})` : "not set",
						xAccessToken: xCredentials.accessToken ? "set" : "not set",
						xUserId: xCredentials.userId ?? "not set",
					},
					telegram: {
						authorizedUsers: cfg.telegram.authorizedUserIds.map(String),
					},
					settings: {
						dryRun: cfg.x.dryRun,
						confirmation: settings.confirmation,
						rateLimit: settings.resilience,
						inbound: settings.inbound,
						health: cfg.health,
					},
					dedup,
				};

				if (opts.json) {
					console.log(JSON.stringify(status, null, 2));
					return;
				}

				console.log("=== postgate status ===\n");

				console.log("Configuration:");
				console.log(`  Path: ${status.config.path}`);
				console.log(`  Exists: ${status.config.exists ? "yes" : "no"}`);
				console.log();

				console.log("Credentials:");
				console.log(`  TELEGRAM_BOT_TOKEN: ${status.environment.telegramToken}`);
				console.log(`  X access token: ${status.environment.xAccessToken}`);
				console.log(`  X user id: ${status.environment.xUserId}`);
				console.log();

				console.log("Telegram:");
				if (status.telegram.authorizedUsers.length > 0) {
					console.log(`  Authorized users: ${status.telegram.authorizedUsers.join(", ")}`);
				} else {
					// SECURITY: empty list means deny all
					console.log("  Authorized users: none (every request is denied)");
				}
				console.log();

				const { confirmation, rateLimit, inbound } = status.settings;
				console.log("Relay:");
				console.log(`  Dry run: ${status.settings.dryRun ? "yes" : "no"}`);
				console.log(
					`  Confirmation: ${confirmation.enabled ? "enabled" : "disabled"} (expires after ${confirmation.timeoutMs / 1000}s)`,
				);
				console.log(
					`  Rate limit: ${rateLimit.minIntervalMs}ms spacing, ${rateLimit.maxRetries} retries, backoff x${rateLimit.backoffFactor}`,
				);
				console.log(
					`  DM forwarding: ${inbound.enabled ? "enabled" : "disabled"} (every ${inbound.pollIntervalMs / 1000}s to ${inbound.targetChatId ?? "no chat"})`,
				);
				console.log(
					`  Health server: ${status.settings.health.enabled ? `${status.settings.health.host}:${status.settings.health.port}` : "disabled"}`,
				);
				console.log();

				console.log("Dedup store:");
				console.log(`  File: ${dedup.filePath}`);
				console.log(`  Records: ${dedup.count} (kept ${dedup.maxAgeDays} days)`);
				if (dedup.oldest && dedup.newest) {
					console.log(`  Range: ${dedup.oldest} .. ${dedup.newest}`);
				}
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "status command failed");
				console.error(`Error: ${formatErrorSafe(err)}`);
				process.exit(1);
			}
		});
}
