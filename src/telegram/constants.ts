/**
 * Telegram Bot API limits.
 *
 * @see https://core.telegram.org/bots/api#sendmessage
 */

/** Hard character limit per message (plain text, no parse mode). */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Per-request deadline for the Bot API client. Above the 30 s long-poll
 * window of getUpdates; flood waits happen between requests, not inside one.
 */
export const TELEGRAM_REQUEST_TIMEOUT_SECONDS = 60;
