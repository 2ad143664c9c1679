import { getChildLogger } from "../logging.js";

export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type ExpiryDaemon = {
	/** Ends the loop once the sweep in progress (if any) finishes. */
	stop: () => void;
	/** Settles after the loop has stopped. */
	done: Promise<void>;
};

export type ExpiryDaemonOptions = {
	intervalMs: number;
	onSweep: () => Promise<void>;
	signal?: AbortSignal;
};

function sleep(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		let timer: ReturnType<typeof setTimeout> | undefined;
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Sweep now, sleep `intervalMs`, repeat.
 *
 * The sleep starts only after the sweep settles, so sweeps never overlap. A failing sweep is
 * logged and the loop carries on.
 */
export function startExpiryDaemon(options: ExpiryDaemonOptions): ExpiryDaemon {
	if (
		!Number.isFinite(options.intervalMs) ||
		options.intervalMs <= 0 ||
		options.intervalMs > MAX_TIMER_DELAY_MS
	) {
		throw new RangeError(
			`intervalMs must be between 1 and ${MAX_TIMER_DELAY_MS} (got ${options.intervalMs})`,
		);
	}

	const logger = getChildLogger({ module: "daemon" });
	const controller = new AbortController();
	const external = options.signal;
	if (external) {
		if (external.aborted) {
			controller.abort();
		} else {
			external.addEventListener("abort", () => controller.abort(), { once: true });
		}
	}

	const loop = async () => {
		let sweeps = 0;
		logger.info({ intervalMs: options.intervalMs }, "daemon started");
		while (!controller.signal.aborted) {
			sweeps += 1;
			try {
				await options.onSweep();
			} catch (err) {
				logger.error({ error: String(err), sweep: sweeps }, "sweep failed");
			}
			await sleep(options.intervalMs, controller.signal);
		}
		logger.info({ sweeps }, "daemon stopped");
	};

	return {
		stop: () => controller.abort(),
		done: loop(),
	};
}
