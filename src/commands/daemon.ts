import type { Command } from "commander";
import { type DaemonSettings, resolveDaemonSettings, resolveDbPath } from "../config/config.js";
import { startExpiryDaemon } from "../daemon/loop.js";
import { type SweepSummary, runSweep } from "../daemon/sweep.js";
import { describeError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import { openDatabase } from "../storage/db.js";
import { type Notifier, createTelegramNotifier } from "../telegram/notifier.js";
import { type TokenStore, createTokenStore } from "../tokens/store.js";
import { loadCommandConfig, reportCommandError, withTokenStore } from "./shared.js";

function printSweepFailures(summary: SweepSummary): void {
	for (const failure of summary.failed) {
		console.error(`Failed to send notification for '${failure.name}': ${failure.error.message}`);
	}
}

function createNotifier(settings: DaemonSettings): Notifier {
	return createTelegramNotifier({
		botToken: settings.botToken,
		apiBaseUrl: settings.apiBaseUrl,
	});
}

function sweepOnce(
	store: TokenStore,
	notifier: Notifier,
	settings: DaemonSettings,
): Promise<SweepSummary> {
	return runSweep({
		store,
		notifier,
		chatId: settings.chatId,
		thresholdDays: settings.thresholdDays,
	});
}

export type DaemonCommandOptions = {
	/** Stops the `daemon` loop when aborted; the CLI entry point never passes one. */
	signal?: AbortSignal;
};

export function registerDaemonCommands(program: Command, options: DaemonCommandOptions = {}): void {
	program
		.command("daemon")
		.description("Check tracked tokens on a fixed interval and send Telegram reminders")
		.action(async (_opts: unknown, command: Command) => {
			try {
				const config = loadCommandConfig(command);
				const logger = getChildLogger({ module: "cmd-daemon" });
				// Resolve credentials before touching the store.
				const settings = resolveDaemonSettings(config);
				const db = openDatabase(resolveDbPath(config));
				const store = createTokenStore(db);
				const notifier = createNotifier(settings);

				console.log("Starting token expiration notifier daemon...");
				console.log(`Checking every ${settings.checkIntervalSeconds} seconds`);
				console.log(`Notification threshold: ${settings.thresholdDays} days`);
				logger.info(
					{
						checkIntervalSeconds: settings.checkIntervalSeconds,
						thresholdDays: settings.thresholdDays,
					},
					"starting daemon",
				);

				const daemon = startExpiryDaemon({
					intervalMs: settings.checkIntervalSeconds * 1000,
					signal: options.signal,
					onSweep: async () => {
						try {
							printSweepFailures(await sweepOnce(store, notifier, settings));
						} catch (err) {
							console.error(`Error checking tokens: ${describeError(err)}`);
							throw err;
						}
					},
				});
				try {
					await daemon.done;
				} finally {
					db.close();
				}
			} catch (err) {
				reportCommandError(err);
			}
		});

	program
		.command("check")
		.description("Run a single check now and exit")
		.option("--json", "Output the sweep summary as JSON")
		.action(async (opts: { json?: boolean }, command: Command) => {
			try {
				const config = loadCommandConfig(command);
				const settings = resolveDaemonSettings(config);
				const summary = await withTokenStore(config, (store) =>
					sweepOnce(store, createNotifier(settings), settings),
				);
				if (opts.json) {
					console.log(
						JSON.stringify(
							{
								due: summary.due,
								notified: summary.notified,
								failed: summary.failed.map((f) => ({ name: f.name, error: f.error.message })),
							},
							null,
							2,
						),
					);
				} else {
					console.log(
						`Checked tokens: ${summary.due} due, ${summary.notified.length} notified, ${summary.failed.length} failed`,
					);
					printSweepFailures(summary);
				}
				if (summary.failed.length > 0) {
					process.exitCode = 1;
				}
			} catch (err) {
				reportCommandError(err);
			}
		});
}
