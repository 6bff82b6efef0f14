import { ForwardFailedError, type Result } from "../infra/errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { DeliverToChat, InboundMessage } from "./types.js";

const logger = getChildLogger({ module: "forwarder" });

export function formatSender(message: InboundMessage): string {
	const username = message.sender?.username;
	if (!username) return `user_${message.senderId}`;
	const name = message.sender?.name;
	return name ? `@${username} (${name})` : `@${username}`;
}

/** `YYYY-MM-DD HH:MM:SS UTC`, or "unknown time" when absent or unparseable. */
export function formatTimestamp(timestamp: string | undefined): string {
	if (!timestamp) return "unknown time";
	const ms = Date.parse(timestamp);
	if (Number.isNaN(ms)) return "unknown time";
	return `${new Date(ms).toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatInboundMessage(message: InboundMessage): string {
	const lines = [
		"New direct message on X",
		`From: ${formatSender(message)}`,
		`Time: ${formatTimestamp(message.timestamp)}`,
		"",
		message.text.trim() ? message.text : "[no text]",
		"",
		`Message ID: ${message.id}`,
	];
	if (message.media.length > 0) {
		lines.push("Media:");
		for (const item of message.media) {
			lines.push(`- ${item.type}: ${item.url ?? "(no url)"}`);
		}
	}
	return lines.join("\n");
}

/**
 * Turns one inbound message into one chat delivery.
 */
export class Forwarder {
	constructor(private readonly deliver: DeliverToChat) {}

	async forward(message: InboundMessage): Promise<Result<void, ForwardFailedError>> {
		const text = formatInboundMessage(message);
		try {
			const delivered = await this.deliver(text, message.media);
			if (!delivered) {
				return { success: false, error: new ForwardFailedError(message.id) };
			}
			return { success: true, data: undefined };
		} catch (err) {
			logger.warn({ messageId: message.id, error: formatErrorSafe(err) }, "delivery threw");
			return { success: false, error: new ForwardFailedError(message.id, { cause: err }) };
		}
	}
}
