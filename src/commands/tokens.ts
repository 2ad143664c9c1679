import type { Command } from "commander";
import type { TrackedToken } from "../tokens/types.js";
import { formatTimestamp } from "../utils.js";
import { loadCommandConfig, reportCommandError, withTokenStore } from "./shared.js";

export function formatTokenTable(tokens: TrackedToken[]): string[] {
	const lines = [
		"Tracked Tokens:",
		`${"Name".padEnd(20)} ${"Expires".padEnd(15)} Last Notified`,
		"-".repeat(50),
	];
	for (const token of tokens) {
		lines.push(
			`${token.name.padEnd(20)} ${token.expiresAt.padEnd(15)} ${formatTimestamp(token.lastNotifiedAtMs)}`,
		);
	}
	return lines;
}

export function registerTokenCommands(program: Command): void {
	program
		.command("add")
		.description("Track a token, or replace the expiry of one already tracked")
		.argument("<name>", "Token name")
		.argument("<expiresAt>", "Expiry date (YYYY-MM-DD)")
		.action(async (name: string, expiresAt: string, _opts: unknown, command: Command) => {
			try {
				const config = loadCommandConfig(command);
				const token = await withTokenStore(config, (store) => store.add(name, expiresAt));
				console.log(`Token '${token.name}' added successfully!`);
			} catch (err) {
				reportCommandError(err);
			}
		});

	program
		.command("remove")
		.description("Stop tracking a token")
		.argument("<name>", "Token name")
		.action(async (name: string, _opts: unknown, command: Command) => {
			try {
				const config = loadCommandConfig(command);
				await withTokenStore(config, (store) => store.remove(name));
				console.log(`Token '${name}' removed successfully!`);
			} catch (err) {
				reportCommandError(err);
			}
		});

	program
		.command("list")
		.description("List tracked tokens")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }, command: Command) => {
			try {
				const config = loadCommandConfig(command);
				const tokens = await withTokenStore(config, (store) => store.list());
				if (opts.json) {
					console.log(JSON.stringify({ tokens }, null, 2));
					return;
				}
				for (const line of formatTokenTable(tokens)) {
					console.log(line);
				}
			} catch (err) {
				reportCommandError(err);
			}
		});
}
