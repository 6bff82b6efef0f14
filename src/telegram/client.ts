import { autoRetry } from "@grammyjs/auto-retry";
import { Bot, type BotError, GrammyError } from "grammy";
import type { UserFromGetMe } from "grammy/types";

import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { TELEGRAM_REQUEST_TIMEOUT_SECONDS } from "./constants.js";

const logger = getChildLogger({ module: "telegram-client" });

export type TelegramBotOptions = {
	token: string;
};

export type TelegramBotInstance = {
	bot: Bot;
	botInfo: UserFromGetMe;
};

function logHandlerError(err: BotError): void {
	const updateId = err.ctx.update.update_id;
	if (err.error instanceof GrammyError) {
		logger.error(
			{ updateId, code: err.error.error_code, description: err.error.description },
			"telegram api error",
		);
		return;
	}
	// HttpError text can include the request URL, which carries the token
	logger.error({ updateId, error: formatErrorSafe(err.error) }, "update handler failed");
}

/**
 * Build the bot and resolve its identity. Fails when the token is rejected,
 * so a bad token stops the relay before any polling starts.
 */
export async function createTelegramBot(options: TelegramBotOptions): Promise<TelegramBotInstance> {
	const bot = new Bot(options.token, { client: { timeoutSeconds: TELEGRAM_REQUEST_TIMEOUT_SECONDS } });

	// 429s and flood waits are retried inside the API client
	bot.api.config.use(
		autoRetry({ maxRetryAttempts: 5, maxDelaySeconds: 60, rethrowInternalServerErrors: false }),
	);
	bot.catch(logHandlerError);

	await bot.init();
	logger.info({ botId: bot.botInfo.id, username: bot.botInfo.username }, "bot authenticated");
	return { bot, botInfo: bot.botInfo };
}

export function formatBotInfo(botInfo: UserFromGetMe): string {
	const handle = botInfo.username ? ` (@${botInfo.username})` : "";
	return `Bot: ${botInfo.first_name}${handle} [ID: ${botInfo.id}]`;
}
