import type { NotificationDeliveryError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { Notifier } from "../telegram/notifier.js";
import { toLocalIsoDate } from "../tokens/dates.js";
import { describeExpiry, isDue } from "../tokens/expiry.js";
import type { TokenStore } from "../tokens/store.js";

export type SweepOptions = {
	store: TokenStore;
	notifier: Notifier;
	chatId: string;
	thresholdDays: number;
	/** Reference time for the due check; defaults to the sweep start. */
	now?: Date;
	clock?: () => number;
};

export type SweepFailure = {
	name: string;
	error: NotificationDeliveryError;
};

export type SweepSummary = {
	startedAtMs: number;
	due: number;
	notified: string[];
	failed: SweepFailure[];
};

/**
 * One pass over the store: notify every due token and record successful sends.
 *
 * Store errors propagate and end the sweep. Delivery failures are collected and leave the
 * token untouched, so the next sweep picks it up again.
 */
export async function runSweep(options: SweepOptions): Promise<SweepSummary> {
	const logger = getChildLogger({ module: "sweep" });
	const clock = options.clock ?? Date.now;
	const startedAtMs = clock();
	const now = options.now ?? new Date(startedAtMs);
	const today = toLocalIsoDate(now);

	const due = options.store
		.findExpiring(options.thresholdDays, now)
		.filter((token) => isDue(token, today, options.thresholdDays));

	const notified: string[] = [];
	const failed: SweepFailure[] = [];

	for (const token of due) {
		const notice = describeExpiry(token, today);
		const result = await options.notifier.send(options.chatId, notice.message);
		if (!result.ok) {
			logger.warn(
				{ name: token.name, daysRemaining: notice.daysRemaining, error: result.error.message },
				"notification failed; will retry next sweep",
			);
			failed.push({ name: token.name, error: result.error });
			continue;
		}
		options.store.markNotified(token.name, clock());
		notified.push(token.name);
		logger.info(
			{ name: token.name, daysRemaining: notice.daysRemaining, expired: notice.expired },
			"expiry notification sent",
		);
	}

	logger.info(
		{ today, due: due.length, notified: notified.length, failed: failed.length },
		"sweep complete",
	);

	return { startedAtMs, due: due.length, notified, failed };
}
