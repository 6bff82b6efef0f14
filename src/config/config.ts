import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { z } from "zod";

import type { ConfirmationRegistryOptions } from "../confirmation/registry.js";
import type { DedupStoreOptions } from "../inbound/dedup-store.js";
import type { InboundPollerOptions } from "../inbound/poller.js";
import type { ResilientCallerConfig } from "../resilience/resilient-caller.js";
import { CONFIG_DIR } from "../utils.js";
import { resolveConfigPath } from "./path.js";

const DEFAULT_STORE_FILE = path.join(CONFIG_DIR, "processed-dm-ids.json");

// Telegram IDs arrive as numbers from grammY but are often written as strings in config
const TelegramIdSchema = z.union([z.number().int(), z.string().regex(/^-?\d+$/)]);

const TelegramConfigSchema = z.object({
	// Bot token may also come from TELEGRAM_BOT_TOKEN
	botToken: z.string().optional(),
	// Users allowed to submit posts and run commands. Empty = nobody.
	authorizedUserIds: z.array(TelegramIdSchema).default([]),
	// Quiet period before the parts of an album are posted as one
	mediaGroupDelaySeconds: z.number().positive().default(1),
	// Largest image accepted when sent as a file
	maxImageBytes: z.number().int().positive().default(5 * 1024 * 1024),
});

const XConfigSchema = z.object({
	apiBase: z.string().url().default("https://api.x.com"),
	// Numeric ID of the posting account; falls back to X_USER_ID
	userId: z.string().optional(),
	// OAuth2 user-context token (tweet.write, dm.read); falls back to X_USER_ACCESS_TOKEN
	userAccessToken: z.string().optional(),
	requestTimeoutSeconds: z.number().positive().default(30),
	// Log posts instead of publishing them
	dryRun: z.boolean().default(false),
});

const ConfirmationConfigSchema = z.object({
	enabled: z.boolean().default(true),
	timeoutSeconds: z.number().int().positive().default(300),
	sweepIntervalSeconds: z.number().int().positive().default(60),
	maxTextLength: z.number().int().min(1).max(280).default(280),
	maxMediaItems: z.number().int().min(0).max(4).default(4),
});

const RateLimitConfigSchema = z.object({
	minIntervalSeconds: z.number().min(0).default(1),
	maxRetries: z.number().int().min(0).default(3),
	backoffFactor: z.number().min(1).default(2),
	maxBackoffSeconds: z.number().positive().default(300),
	cache: z
		.object({
			enabled: z.boolean().default(true),
			ttlSeconds: z.number().min(0).default(300),
		})
		.default({}),
});

const InboundConfigSchema = z.object({
	enabled: z.boolean().default(true),
	pollIntervalSeconds: z.number().int().positive().default(60),
	pageSize: z.number().int().min(1).max(100).default(50),
	errorBackoffCapSeconds: z.number().int().positive().default(300),
	// Chat that receives forwarded DMs
	targetChatId: TelegramIdSchema.optional(),
	store: z
		.object({
			file: z.string().optional(),
			maxAgeDays: z.number().int().positive().default(7),
		})
		.default({}),
});

const HealthConfigSchema = z.object({
	enabled: z.boolean().default(false),
	host: z.string().default("127.0.0.1"),
	port: z.number().int().min(1).max(65535).default(8000),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const PostgateConfigSchema = z.object({
	telegram: TelegramConfigSchema.default({}),
	x: XConfigSchema.default({}),
	confirmation: ConfirmationConfigSchema.default({}),
	rateLimit: RateLimitConfigSchema.default({}),
	inbound: InboundConfigSchema.default({}),
	health: HealthConfigSchema.default({}),
	logging: LoggingConfigSchema.default({}),
});

export type PostgateConfig = z.infer<typeof PostgateConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type XConfig = z.infer<typeof XConfigSchema>;
export type ConfirmationConfig = z.infer<typeof ConfirmationConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type InboundConfig = z.infer<typeof InboundConfigSchema>;
export type HealthConfig = z.infer<typeof HealthConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

type CacheEntry = {
	path: string;
	mtimeMs: number;
	config: PostgateConfig;
};

let cache: CacheEntry | null = null;

/**
 * Validate a raw config object, filling in every default.
 * Throws a ZodError describing each invalid field.
 */
export function parseConfig(raw: unknown): PostgateConfig {
	return PostgateConfigSchema.parse(raw ?? {});
}

/**
 * Read the JSON5 config file. A missing file means all defaults; the parsed
 * result is reused until the file's mtime changes.
 */
export function loadConfig(): PostgateConfig {
	const configPath = resolveConfigPath();

	const stat = fs.statSync(configPath, { throwIfNoEntry: false });
	if (!stat) {
		return parseConfig({});
	}
	if (cache?.path === configPath && cache.mtimeMs === stat.mtimeMs) {
		return cache.config;
	}

	const config = parseConfig(JSON5.parse(fs.readFileSync(configPath, "utf-8")));
	cache = { path: configPath, mtimeMs: stat.mtimeMs, config };
	return config;
}

export function getConfigPath(): string {
	return resolveConfigPath();
}

export function resetConfigCache(): void {
	cache = null;
}

/**
 * Millisecond-based settings consumed by the relay core.
 */
export type RelaySettings = {
	confirmation: ConfirmationRegistryOptions & { enabled: boolean };
	resilience: ResilientCallerConfig;
	inbound: Omit<InboundPollerOptions, "now"> & {
		enabled: boolean;
		targetChatId?: string;
	};
	dedup: DedupStoreOptions;
};

export function resolveRelaySettings(cfg: PostgateConfig): RelaySettings {
	return {
		confirmation: {
			enabled: cfg.confirmation.enabled,
			timeoutMs: cfg.confirmation.timeoutSeconds * 1000,
			sweepIntervalMs: cfg.confirmation.sweepIntervalSeconds * 1000,
			maxTextLength: cfg.confirmation.maxTextLength,
			maxMediaItems: cfg.confirmation.maxMediaItems,
		},
		resilience: {
			minIntervalMs: cfg.rateLimit.minIntervalSeconds * 1000,
			maxRetries: cfg.rateLimit.maxRetries,
			backoffFactor: cfg.rateLimit.backoffFactor,
			maxBackoffMs: cfg.rateLimit.maxBackoffSeconds * 1000,
			cacheEnabled: cfg.rateLimit.cache.enabled,
			cacheTtlMs: cfg.rateLimit.cache.ttlSeconds * 1000,
		},
		inbound: {
			enabled: cfg.inbound.enabled,
			pollIntervalMs: cfg.inbound.pollIntervalSeconds * 1000,
			pageSize: cfg.inbound.pageSize,
			errorBackoffCapMs: cfg.inbound.errorBackoffCapSeconds * 1000,
			targetChatId:
				cfg.inbound.targetChatId === undefined ? undefined : String(cfg.inbound.targetChatId),
		},
		dedup: {
			filePath: cfg.inbound.store.file ?? DEFAULT_STORE_FILE,
			maxAgeDays: cfg.inbound.store.maxAgeDays,
		},
	};
}
