/**
 * Outbound Telegram notifications via the Bot API `sendMessage` method.
 *
 * One form-encoded POST per message. Failures are returned, not thrown: the sweep decides
 * what a failed delivery means.
 */

import { DEFAULT_TELEGRAM_API_BASE_URL } from "../config/config.js";
import { NotificationDeliveryError, describeError } from "../errors.js";
import { getChildLogger } from "../logging.js";

const MAX_ERROR_BODY_CHARS = 200;

export type SendResult = { ok: true } | { ok: false; error: NotificationDeliveryError };

export type Notifier = {
	send: (chatId: string, text: string) => Promise<SendResult>;
};

export type TelegramNotifierOptions = {
	botToken: string;
	apiBaseUrl?: string;
};

async function readErrorBody(response: Response): Promise<string> {
	try {
		return (await response.text()).slice(0, MAX_ERROR_BODY_CHARS);
	} catch (err) {
		return `<unreadable body: ${describeError(err)}>`;
	}
}

export function createTelegramNotifier(options: TelegramNotifierOptions): Notifier {
	const logger = getChildLogger({ module: "telegram-notifier" });
	const baseUrl = (options.apiBaseUrl ?? DEFAULT_TELEGRAM_API_BASE_URL).replace(/\/+$/, "");
	const url = `${baseUrl}/bot${options.botToken}/sendMessage`;

	const fail = (chatId: string, error: NotificationDeliveryError): SendResult => {
		logger.warn({ chatId, status: error.status, error: error.message }, "telegram send failed");
		return { ok: false, error };
	};

	return {
		send: async (chatId, text) => {
			let response: Response;
			try {
				response = await fetch(url, {
					method: "POST",
					headers: {
						"content-type": "application/x-www-form-urlencoded",
					},
					body: new URLSearchParams({ chat_id: chatId, text }).toString(),
				});
			} catch (err) {
				return fail(
					chatId,
					new NotificationDeliveryError(`Telegram request failed: ${describeError(err)}`, undefined, {
						cause: err,
					}),
				);
			}

			if (!response.ok) {
				const body = await readErrorBody(response);
				return fail(
					chatId,
					new NotificationDeliveryError(
						`Telegram API error: ${response.status} ${body}`.trim(),
						response.status,
					),
				);
			}

			logger.debug({ chatId }, "telegram message sent");
			return { ok: true };
		},
	};
}
