/**
 * Inline keyboards for the confirmation flow.
 *
 * Callback data format: "pg:<action>:<confirmation key>"
 */

import { InlineKeyboard } from "grammy";

export type ConfirmationAction = "confirm" | "edit" | "cancel" | "retry" | "abandon";

const ACTIONS: readonly ConfirmationAction[] = ["confirm", "edit", "cancel", "retry", "abandon"];

// Telegram rejects callback_data longer than 64 bytes
const MAX_CALLBACK_DATA_BYTES = 64;

export const CALLBACK_PATTERN = /^pg:(confirm|edit|cancel|retry|abandon):(.+)$/;

export function encodeCallbackData(action: ConfirmationAction, key: string): string {
	const data = `pg:${action}:${key}`;
	if (Buffer.byteLength(data, "utf8") > MAX_CALLBACK_DATA_BYTES) {
		throw new Error(`callback data too long for key ${key}`);
	}
	return data;
}

export function parseCallbackData(
	data: string,
): { action: ConfirmationAction; key: string } | null {
	const match = CALLBACK_PATTERN.exec(data);
	if (!match) return null;
	const action = ACTIONS.find((candidate) => candidate === match[1]);
	if (!action) return null;
	return { action, key: match[2] };
}

export function confirmationKeyboard(key: string): InlineKeyboard {
	return new InlineKeyboard()
		.text("✅ Post", encodeCallbackData("confirm", key))
		.text("✏️ Edit", encodeCallbackData("edit", key))
		.text("❌ Cancel", encodeCallbackData("cancel", key));
}

export function retryKeyboard(key: string): InlineKeyboard {
	return new InlineKeyboard()
		.text("🔁 Retry", encodeCallbackData("retry", key))
		.text("🗑 Abandon", encodeCallbackData("abandon", key));
}
