import type { XConfig } from "../config/config.js";
import type { PostReceipt } from "../confirmation/workflow.js";
import type { InboundMedia, InboundMessage } from "../inbound/types.js";
import { TransportError } from "../infra/errors.js";
import { fetchWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { codePointLength } from "../utils.js";

const logger = getChildLogger({ module: "x-client" });

const DM_PAGE_MAX = 100;

/**
 * X API v2 response shapes (only the fields we read).
 */
type XTweetResponse = {
	data?: { id: string; text: string };
};

type XMediaUploadResponse = {
	data?: { id: string; media_key?: string };
};

type XDmEvent = {
	id: string;
	event_type?: string;
	text?: string;
	sender_id?: string;
	created_at?: string;
	attachments?: { media_keys?: string[] };
};

type XUser = { id: string; name?: string; username?: string };

type XMedia = {
	media_key: string;
	type: string;
	url?: string;
	preview_image_url?: string;
};

type XDmEventsResponse = {
	data?: XDmEvent[];
	includes?: { users?: XUser[]; media?: XMedia[] };
	meta?: { result_count?: number; next_token?: string };
};

type XMeResponse = {
	data?: XUser;
};

export type XIdentity = {
	id: string;
	username?: string;
	name?: string;
};

function safeJsonParse(input: string): unknown {
	try {
		return JSON.parse(input);
	} catch {
		return null;
	}
}

/**
 * Convert the `x-rate-limit-reset` header (epoch seconds) into milliseconds
 * from now, floored at 0. Missing or malformed headers yield undefined.
 */
export function parseRateLimitReset(value: string | null, now: number): number | undefined {
	if (!value) return undefined;
	const epochSeconds = Number(value);
	if (!Number.isFinite(epochSeconds)) return undefined;
	return Math.max(0, epochSeconds * 1000 - now);
}

/**
 * Map an HTTP failure onto the transport signal the ResilientCaller acts on.
 */
export function classifyHttpFailure(
	status: number,
	message: string,
	headers: Headers,
	now: number,
): TransportError {
	if (status === 429) {
		return new TransportError(message, "rate_limited", {
			status,
			resetAfterMs: parseRateLimitReset(headers.get("x-rate-limit-reset"), now),
		});
	}
	if (status === 400 || status === 401 || status === 403) {
		return new TransportError(message, "non_retriable", { status });
	}
	return new TransportError(message, "other", { status });
}

export function postUrl(postId: string): string {
	return `https://x.com/i/web/status/${postId}`;
}

export type XClientOptions = {
	/** Numeric ID of the account we post as; its own DMs are not forwarded. */
	userId?: string;
	/** OAuth2 user-context access token (or app bearer token for reads). */
	accessToken?: string;
	baseUrl?: string;
	timeoutMs?: number;
	/** Log instead of calling the write endpoints. */
	dryRun?: boolean;
	fetchImpl?: typeof fetch;
	now?: () => number;
};

/**
 * X API v2 client used by the relay. Every failure is thrown as a
 * TransportError so callers can route it through the ResilientCaller.
 */
export class XClient {
	readonly dryRun: boolean;
	private readonly userId?: string;
	private readonly accessToken?: string;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: typeof fetch;
	private readonly now: () => number;
	private dryRunCounter = 0;

	constructor(options: XClientOptions) {
		this.userId = options.userId;
		this.accessToken = options.accessToken;
		this.baseUrl = (options.baseUrl ?? "https://api.x.com").replace(/\/+$/, "");
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.dryRun = options.dryRun ?? false;
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.now = options.now ?? Date.now;
	}

	private async request<T>(path: string, init: RequestInit): Promise<T | null> {
		const url = `${this.baseUrl}${path}`;
		const headers = new Headers(init.headers ?? {});
		if (this.accessToken) {
			headers.set("Authorization", `Bearer ${this.accessToken}`);
		}
		// FormData bodies carry their own multipart boundary
		if (typeof init.body === "string" && !headers.has("Content-Type")) {
			headers.set("Content-Type", "application/json");
		}

		const response = await fetchWithTimeout(
			url,
			{ ...init, headers },
			{ timeoutMs: this.timeoutMs, fetchImpl: this.fetchImpl },
		);
		const raw = await response.text();
		const payload = raw ? safeJsonParse(raw) : null;

		if (!response.ok) {
			const detail =
				(payload && typeof payload === "object" && "errors" in payload
					? JSON.stringify((payload as { errors?: unknown[] }).errors?.slice(0, 2) ?? "unknown")
					: raw) || response.statusText;
			const method = init.method ?? "GET";
			throw classifyHttpFailure(
				response.status,
				`X ${method} ${path.split("?")[0]} failed (${response.status}): ${detail}`,
				response.headers,
				this.now(),
			);
		}

		// Response shapes are declared above; X does not validate them for us either
		return payload as T | null;
	}

	async createPost(text: string, mediaIds: readonly string[] = []): Promise<PostReceipt> {
		if (this.dryRun) {
			const id = `dry-run-${++this.dryRunCounter}`;
			logger.info(
				{ id, textLength: codePointLength(text), media: mediaIds.length },
				"dry run: post not sent",
			);
			return { id, url: postUrl(id) };
		}

		const body: Record<string, unknown> = { text };
		if (mediaIds.length > 0) {
			body.media = { media_ids: [...mediaIds] };
		}
		const result = await this.request<XTweetResponse>("/2/tweets", {
			method: "POST",
			body: JSON.stringify(body),
		});

		const id = result?.data?.id;
		if (!id) {
			throw new TransportError("X accepted the post but returned no id", "other", { status: 502 });
		}
		logger.info({ postId: id }, "X post created");
		return { id, url: postUrl(id) };
	}

	/** Upload one image and return its media id. */
	async uploadMedia(bytes: Uint8Array, mimeType: string): Promise<string> {
		if (this.dryRun) {
			const id = `dry-run-media-${++this.dryRunCounter}`;
			logger.info({ id, size: bytes.byteLength, mimeType }, "dry run: media not uploaded");
			return id;
		}

		const form = new FormData();
		form.append("media", new Blob([bytes], { type: mimeType }));
		form.append("media_category", "tweet_image");
		const result = await this.request<XMediaUploadResponse>("/2/media/upload", {
			method: "POST",
			body: form,
		});

		const id = result?.data?.id;
		if (!id) {
			throw new TransportError("X media upload returned no id", "other", { status: 502 });
		}
		return id;
	}

	/**
	 * Fetch the most recent direct messages received by this account,
	 * in the order X returns them.
	 */
	async fetchDirectMessages(pageSize: number): Promise<InboundMessage[]> {
		const params = new URLSearchParams({
			max_results: String(Math.min(Math.max(pageSize, 1), DM_PAGE_MAX)),
			event_types: "MessageCreate",
			"dm_event.fields": "id,event_type,text,sender_id,created_at,attachments",
			expansions: "sender_id,attachments.media_keys",
			"user.fields": "name,username",
			"media.fields": "type,url,preview_image_url",
		});
		const result = await this.request<XDmEventsResponse>(`/2/dm_events?${params}`, {
			method: "GET",
		});

		const events = result?.data;
		if (!events || !Array.isArray(events)) {
			return [];
		}

		const users = new Map<string, XUser>();
		for (const user of result?.includes?.users ?? []) {
			users.set(user.id, user);
		}
		const media = new Map<string, XMedia>();
		for (const item of result?.includes?.media ?? []) {
			media.set(item.media_key, item);
		}

		const messages: InboundMessage[] = [];
		for (const event of events) {
			if (event.event_type && event.event_type !== "MessageCreate") continue;
			if (!event.sender_id) continue;
			// Messages we sent ourselves show up in the same stream
			if (this.userId && event.sender_id === this.userId) continue;

			const sender = users.get(event.sender_id);
			const attachments: InboundMedia[] = (event.attachments?.media_keys ?? []).map((key) => {
				const item = media.get(key);
				return item
					? { type: item.type, url: item.url ?? item.preview_image_url }
					: { type: "unknown" };
			});

			messages.push({
				id: event.id,
				text: event.text ?? "",
				senderId: event.sender_id,
				timestamp: event.created_at,
				media: attachments,
				sender: sender ? { username: sender.username, name: sender.name } : undefined,
			});
		}
		return messages;
	}

	/** Identity of the account behind the configured token. */
	async verifyCredentials(): Promise<XIdentity> {
		const result = await this.request<XMeResponse>("/2/users/me", { method: "GET" });
		const user = result?.data;
		if (!user?.id) {
			throw new TransportError("X /2/users/me returned no user", "other", { status: 502 });
		}
		return { id: user.id, username: user.username, name: user.name };
	}
}

export type XCredentials = {
	accessToken?: string;
	userId?: string;
};

/**
 * Resolve X credentials. The config file wins over environment variables,
 * as it does for the Telegram bot token.
 */
export function resolveXCredentials(config: XConfig): XCredentials {
	return {
		accessToken:
			config.userAccessToken ?? process.env.X_USER_ACCESS_TOKEN ?? process.env.X_BEARER_TOKEN,
		userId: config.userId ?? process.env.X_USER_ID,
	};
}

/**
 * Create an X client from config.
 * Returns null when no access token is available and dry-run is off.
 */
export function createXClient(
	config: XConfig,
	overrides: { dryRun?: boolean; fetchImpl?: typeof fetch } = {},
): XClient | null {
	const credentials = resolveXCredentials(config);
	const dryRun = overrides.dryRun ?? config.dryRun;
	if (!credentials.accessToken && !dryRun) {
		logger.warn("no X access token configured; X client disabled");
		return null;
	}
	if (!credentials.userId) {
		logger.warn("X user id not set; the account's own DMs will not be filtered");
	}

	return new XClient({
		userId: credentials.userId,
		accessToken: credentials.accessToken,
		baseUrl: config.apiBase,
		timeoutMs: config.requestTimeoutSeconds * 1000,
		dryRun,
		fetchImpl: overrides.fetchImpl,
	});
}
