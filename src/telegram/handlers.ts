/**
 * Telegram update handlers for the relay: submissions, confirmation buttons
 * and commands.
 *
 * The decision logic lives in plain functions returning the reply to send,
 * so it can be exercised without a bot.
 */

import { type Bot, type Context, GrammyError, type InlineKeyboard } from "grammy";

import type { MediaRef } from "../confirmation/types.js";
import { toIdentity } from "../confirmation/types.js";
import { AuthorizationDeniedError } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import type { RelayCore } from "../relay/core.js";
import type { AccessControl } from "../security/access.js";
import {
	CALLBACK_PATTERN,
	type ConfirmationAction,
	confirmationKeyboard,
	parseCallbackData,
	retryKeyboard,
} from "./keyboards.js";
import { type MediaGroupBatch, MediaGroupCollector } from "./media-group.js";
import {
	CANCELLED_TEXT,
	EDIT_PROMPT_TEXT,
	EXPIRED_TEXT,
	HELP_TEXT,
	NOT_FOUND_TEXT,
	describeError,
	renderPollSummary,
	renderPollerStatus,
	renderPostFailed,
	renderPosted,
	renderPreview,
	renderRelayStatus,
} from "./messages.js";

const logger = getChildLogger({ module: "telegram-handlers" });

export type RelayReply = {
	text: string;
	keyboard?: InlineKeyboard;
};

export type RelayHandlerContext = {
	core: RelayCore;
	access: AccessControl;
	dryRun: boolean;
	/** Largest image accepted as a document attachment */
	maxImageBytes?: number;
	/** Quiet period before an album is treated as complete */
	mediaGroupDelayMs?: number;
	now?: () => number;
};

export type IncomingPost = {
	userId: number | string;
	chatId: number | string;
	messageId: number | string;
	text: string;
	media?: MediaRef[];
};

export type IncomingDocument = {
	fileId: string;
	mimeType?: string;
	fileSize?: number;
};

const DEFAULT_MAX_IMAGE_BYTES = 5 * 1024 * 1024;
const DEFAULT_MEDIA_GROUP_DELAY_MS = 1000;

export type ActionResult = {
	/** Short toast shown by answerCallbackQuery */
	notice: string;
	/** Replacement for the message carrying the buttons, if it should change */
	reply: RelayReply | null;
};

/**
 * A confirmation key starts with the requester's user id; only they may act on it.
 */
export function isOwnKey(userId: number | string, key: string): boolean {
	return key.startsWith(`${userId}_`);
}

/** Telegram refuses an edit that leaves the message exactly as it was. */
export function isMessageNotModified(err: unknown): boolean {
	return err instanceof GrammyError && err.description.includes("message is not modified");
}

/**
 * Handle a text or photo message from an authorized user: resubmit an entry
 * under edit, post directly, or open a new confirmation.
 */
export async function handleIncomingPost(
	ctx: RelayHandlerContext,
	input: IncomingPost,
): Promise<RelayReply> {
	const now = (ctx.now ?? Date.now)();
	const media = input.media ?? [];
	const requesterId = String(input.userId);
	const channelId = String(input.chatId);

	const resubmitted = ctx.core.resubmitEditing(
		requesterId,
		channelId,
		input.text,
		media.length > 0 ? media : undefined,
	);
	if (resubmitted) {
		if (!resubmitted.success) return { text: `⚠️ ${describeError(resubmitted.error)}` };
		return {
			text: renderPreview(resubmitted.data, now),
			keyboard: confirmationKeyboard(resubmitted.data.key),
		};
	}

	if (!ctx.core.confirmationEnabled) {
		const outcome = await ctx.core.postDirect(input.text, media);
		if (!outcome.success) return { text: renderPostFailed(outcome.error) };
		return { text: renderPosted(outcome.url, ctx.dryRun) };
	}

	const created = ctx.core.createConfirmation(
		toIdentity(requesterId, channelId, input.messageId),
		input.text,
		media,
	);
	if (!created.success) return { text: `⚠️ ${describeError(created.error)}` };
	return { text: renderPreview(created.data, now), keyboard: confirmationKeyboard(created.data.key) };
}

/**
 * Only images can be posted; a document is accepted when Telegram reports an
 * image MIME type and a size within the limit. Returns the refusal, or null.
 */
export function checkImageDocument(
	document: IncomingDocument,
	maxBytes = DEFAULT_MAX_IMAGE_BYTES,
): string | null {
	if (!document.mimeType?.startsWith("image/")) {
		return "⚠️ Only images can be attached. Send a photo or an image file.";
	}
	if (document.fileSize !== undefined && document.fileSize > maxBytes) {
		const limitMb = (maxBytes / (1024 * 1024)).toFixed(1);
		return `⚠️ Image is too large. The limit is ${limitMb} MB.`;
	}
	return null;
}

function documentRef(document: IncomingDocument): MediaRef {
	return { kind: "document", fileId: document.fileId, mimeType: document.mimeType };
}

async function runConfirm(
	ctx: RelayHandlerContext,
	action: "confirm" | "retry",
	key: string,
): Promise<ActionResult> {
	const outcome = action === "confirm" ? await ctx.core.confirm(key) : await ctx.core.retry(key);
	switch (outcome.status) {
		case "posted":
			return { notice: "Posted", reply: { text: renderPosted(outcome.receipt.url, ctx.dryRun) } };
		case "failed":
			return {
				notice: "Post failed",
				reply: {
					text: renderPostFailed(outcome.error, outcome.attempt),
					keyboard: retryKeyboard(outcome.key),
				},
			};
		case "conflict":
			return {
				notice: "Nothing to post",
				reply: { text: outcome.error.reason === "expired" ? EXPIRED_TEXT : NOT_FOUND_TEXT },
			};
	}
}

/**
 * Apply a confirmation button press.
 */
export async function handleConfirmationAction(
	ctx: RelayHandlerContext,
	userId: number | string,
	action: ConfirmationAction,
	key: string,
): Promise<ActionResult> {
	if (!isOwnKey(userId, key)) {
		return { notice: "Only the person who sent this post can decide on it.", reply: null };
	}

	switch (action) {
		case "confirm":
		case "retry":
			return runConfirm(ctx, action, key);
		case "edit": {
			const editing = ctx.core.setEditing(key);
			if (!editing.success) {
				const text = editing.error.reason === "expired" ? EXPIRED_TEXT : NOT_FOUND_TEXT;
				return { notice: "Cannot edit", reply: { text } };
			}
			return { notice: "Send the new text", reply: { text: EDIT_PROMPT_TEXT } };
		}
		case "cancel":
		case "abandon": {
			const removed = action === "cancel" ? ctx.core.cancel(key) : ctx.core.abandon(key);
			return removed
				? { notice: "Cancelled", reply: { text: CANCELLED_TEXT } }
				: { notice: "Already handled", reply: { text: NOT_FOUND_TEXT } };
		}
	}
}

export async function renderStatusCommand(ctx: RelayHandlerContext): Promise<string> {
	const status = renderRelayStatus({
		registry: ctx.core.registryStats(),
		metrics: ctx.core.metrics.snapshot(),
		poller: ctx.core.pollerStatus(),
		confirmationEnabled: ctx.core.confirmationEnabled,
		dryRun: ctx.dryRun,
	});
	const identity = await ctx.core.xIdentity();
	if (!identity) return status;
	const account = identity.success
		? `@${identity.data.username ?? identity.data.id}`
		: `unavailable (${describeError(identity.error)})`;
	return `${status}\nX account: ${account}`;
}

export async function runDmCheck(ctx: RelayHandlerContext): Promise<string> {
	const result = await ctx.core.pollNow();
	if (!result.success) return `⚠️ DM check failed: ${describeError(result.error)}`;
	return renderPollSummary(result.data);
}

async function denyUnauthorized(ctx: Context, err: AuthorizationDeniedError): Promise<void> {
	const text = describeError(err);
	if (ctx.callbackQuery) {
		await ctx.answerCallbackQuery({ text, show_alert: true });
	} else if (ctx.message) {
		await ctx.reply(text);
	}
}

/**
 * Register every relay handler on the bot. Call before starting polling.
 * Returns the album collector so the caller can clear it on shutdown.
 */
export function registerRelayHandlers(bot: Bot, relay: RelayHandlerContext): MediaGroupCollector {
	const albums = new MediaGroupCollector(
		relay.mediaGroupDelayMs ?? DEFAULT_MEDIA_GROUP_DELAY_MS,
		async (batch: MediaGroupBatch) => {
			const reply = await handleIncomingPost(relay, batch);
			await bot.api.sendMessage(batch.chatId, reply.text, { reply_markup: reply.keyboard });
		},
	);

	// SECURITY: every update passes the allow-list before any handler runs
	bot.use(async (ctx, next) => {
		try {
			relay.access.assertAuthorized(ctx.from?.id);
		} catch (err) {
			if (err instanceof AuthorizationDeniedError) {
				await denyUnauthorized(ctx, err);
				return;
			}
			throw err;
		}
		await next();
	});

	bot.command(["start", "help"], async (ctx) => {
		await ctx.reply(HELP_TEXT);
	});

	bot.command("status", async (ctx) => {
		await ctx.reply(await renderStatusCommand(relay));
	});

	bot.command("dm_status", async (ctx) => {
		await ctx.reply(renderPollerStatus(relay.core.pollerStatus(), relay.core.dedupStats()));
	});

	bot.command("dm_check", async (ctx) => {
		await ctx.reply("Checking X direct messages…");
		await ctx.reply(await runDmCheck(relay));
	});

	bot.callbackQuery(CALLBACK_PATTERN, async (ctx) => {
		const parsed = parseCallbackData(ctx.callbackQuery.data);
		if (!parsed) {
			await ctx.answerCallbackQuery();
			return;
		}
		const userId = ctx.callbackQuery.from.id;
		const slow = parsed.action === "confirm" || parsed.action === "retry";
		// Posting may take a while with retries; acknowledge the press right away
		if (slow && isOwnKey(userId, parsed.key)) {
			await ctx.answerCallbackQuery({ text: "Posting…" });
		}

		const result = await handleConfirmationAction(relay, userId, parsed.action, parsed.key);
		if (!slow || !isOwnKey(userId, parsed.key)) {
			await ctx.answerCallbackQuery({ text: result.notice });
		}
		if (result.reply) {
			try {
				await ctx.editMessageText(result.reply.text, { reply_markup: result.reply.keyboard });
			} catch (err) {
				if (!isMessageNotModified(err)) throw err;
				logger.debug({ key: parsed.key }, "confirmation message already up to date");
			}
		}
		logger.info({ userId, action: parsed.action, key: parsed.key }, "confirmation action handled");
	});

	// Catch-all so stale buttons don't spin forever
	bot.on("callback_query:data", async (ctx) => {
		logger.debug({ data: ctx.callbackQuery.data }, "unhandled callback query");
		await ctx.answerCallbackQuery();
	});

	bot.on("message:text", async (ctx) => {
		if (ctx.message.text.startsWith("/")) {
			await ctx.reply("Unknown command. Send /help for the list.");
			return;
		}
		const userId = ctx.message.from?.id;
		if (userId === undefined) return;
		const reply = await handleIncomingPost(relay, {
			userId,
			chatId: ctx.message.chat.id,
			messageId: ctx.message.message_id,
			text: ctx.message.text,
		});
		await ctx.reply(reply.text, { reply_markup: reply.keyboard });
	});

	bot.on("message:photo", async (ctx) => {
		const userId = ctx.message.from?.id;
		if (userId === undefined) return;
		const sizes = ctx.message.photo;
		const largest = sizes[sizes.length - 1];
		if (!largest) return;
		const media: MediaRef = { kind: "photo", fileId: largest.file_id };
		if (ctx.message.media_group_id) {
			albums.add({
				groupId: ctx.message.media_group_id,
				userId,
				chatId: ctx.message.chat.id,
				messageId: ctx.message.message_id,
				caption: ctx.message.caption,
				media,
			});
			return;
		}
		const reply = await handleIncomingPost(relay, {
			userId,
			chatId: ctx.message.chat.id,
			messageId: ctx.message.message_id,
			text: ctx.message.caption ?? "",
			media: [media],
		});
		await ctx.reply(reply.text, { reply_markup: reply.keyboard });
	});

	bot.on("message:document", async (ctx) => {
		const userId = ctx.message.from?.id;
		if (userId === undefined) return;
		const { document } = ctx.message;
		const incoming: IncomingDocument = {
			fileId: document.file_id,
			mimeType: document.mime_type,
			fileSize: document.file_size,
		};
		const refusal = checkImageDocument(incoming, relay.maxImageBytes);
		if (refusal) {
			await ctx.reply(refusal);
			return;
		}
		if (ctx.message.media_group_id) {
			albums.add({
				groupId: ctx.message.media_group_id,
				userId,
				chatId: ctx.message.chat.id,
				messageId: ctx.message.message_id,
				caption: ctx.message.caption,
				media: documentRef(incoming),
			});
			return;
		}
		const reply = await handleIncomingPost(relay, {
			userId,
			chatId: ctx.message.chat.id,
			messageId: ctx.message.message_id,
			text: ctx.message.caption ?? "",
			media: [documentRef(incoming)],
		});
		await ctx.reply(reply.text, { reply_markup: reply.keyboard });
	});

	logger.debug("relay handlers registered");
	return albums;
}
