import type { Api } from "grammy";

import type { DeliverToChat, InboundMedia } from "../inbound/types.js";
import { TransportError } from "../infra/errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { fetchWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { TELEGRAM_MESSAGE_LIMIT } from "./constants.js";

const logger = getChildLogger({ module: "telegram-delivery" });

const DOWNLOAD_TIMEOUT_MS = 30_000;

/** The slice of grammY's Api used to deliver forwarded DMs. */
export interface ChatApi {
	sendMessage(chatId: string, text: string): Promise<unknown>;
	sendPhoto(chatId: string, photo: string, other: { caption: string }): Promise<unknown>;
	sendVideo(chatId: string, video: string, other: { caption: string }): Promise<unknown>;
	sendAnimation(chatId: string, animation: string, other: { caption: string }): Promise<unknown>;
}

/**
 * Trim text to one Telegram message, by code point. A forward is a single
 * sendMessage so it either arrived or it did not.
 */
export function fitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string {
	const codePoints = Array.from(text);
	if (codePoints.length <= limit) return text;
	return `${codePoints.slice(0, limit - 1).join("")}…`;
}

async function sendNativeMedia(api: ChatApi, chatId: string, item: InboundMedia, url: string): Promise<void> {
	switch (item.type.toLowerCase()) {
		case "photo":
		case "image":
			await api.sendPhoto(chatId, url, { caption: "📎 Photo from an X direct message" });
			return;
		case "video":
			await api.sendVideo(chatId, url, { caption: "📎 Video from an X direct message" });
			return;
		case "animated_gif":
		case "gif":
			await api.sendAnimation(chatId, url, { caption: "📎 GIF from an X direct message" });
			return;
		default:
			await api.sendMessage(chatId, `📎 Media (${item.type}): ${url}`);
	}
}

/**
 * Attachments follow the text. They never fail the forward: the text already
 * lists every URL, and failing here would deliver the text a second time.
 */
async function sendAttachments(api: ChatApi, chatId: string, media: readonly InboundMedia[]): Promise<void> {
	for (const item of media) {
		if (!item.url) {
			logger.debug({ type: item.type }, "attachment has no url; skipped");
			continue;
		}
		try {
			await sendNativeMedia(api, chatId, item, item.url);
			continue;
		} catch (err) {
			logger.warn({ type: item.type, error: formatErrorSafe(err) }, "sending attachment failed; sending link");
		}
		try {
			await api.sendMessage(chatId, `📎 Media link (${item.type}): ${item.url}`);
		} catch (err) {
			logger.error({ type: item.type, error: formatErrorSafe(err) }, "sending attachment link failed");
		}
	}
}

/**
 * Deliver forwarded DMs to a fixed chat. Resolves false when no target chat
 * is configured; a failed text send propagates to the caller.
 */
export function createChatDelivery(api: ChatApi, chatId: string | undefined): DeliverToChat {
	return async (text, media = []) => {
		if (!chatId) {
			logger.warn("inbound.targetChatId is not configured; cannot deliver");
			return false;
		}
		// Flood waits are retried inside the client; the request itself is bounded there too
		await api.sendMessage(chatId, fitMessage(text));
		await sendAttachments(api, chatId, media);
		return true;
	};
}

export type PhotoFetcher = (fileId: string) => Promise<Uint8Array>;

/**
 * Download a Telegram file by id (images attached to pending posts).
 */
export function createTelegramPhotoFetcher(
	api: Pick<Api, "getFile">,
	token: string,
	fetchImpl: typeof fetch = fetch,
	timeoutMs = DOWNLOAD_TIMEOUT_MS,
): PhotoFetcher {
	return async (fileId) => {
		const file = await api.getFile(fileId);
		if (!file.file_path) {
			throw new TransportError(`Telegram returned no path for file ${fileId}`, "non_retriable");
		}
		const response = await fetchWithTimeout(
			`https://api.telegram.org/file/bot${token}/${file.file_path}`,
			{},
			{ timeoutMs, fetchImpl },
		);
		if (!response.ok) {
			throw new TransportError(`Telegram file download failed (${response.status})`, "other", {
				status: response.status,
			});
		}
		return new Uint8Array(await response.arrayBuffer());
	};
}
