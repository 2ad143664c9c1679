import type { Command } from "commander";
import type { GlobalOptions } from "../cli/program.js";
import { type TokenwatchConfig, loadConfig, resolveDbPath } from "../config/config.js";
import { resolveConfigPath } from "../config/path.js";
import { describeError } from "../errors.js";
import { openDatabase } from "../storage/db.js";
import { type TokenStore, createTokenStore } from "../tokens/store.js";

/**
 * Load the settings file named by the global options.
 * Its logging section was already applied by the program's preAction hook.
 */
export function loadCommandConfig(command: Command): TokenwatchConfig {
	const opts = command.optsWithGlobals<GlobalOptions>();
	return loadConfig(resolveConfigPath(opts.config));
}

/** Open the store for the duration of `fn`. */
export async function withTokenStore<T>(
	config: TokenwatchConfig,
	fn: (store: TokenStore) => T | Promise<T>,
): Promise<T> {
	const db = openDatabase(resolveDbPath(config));
	try {
		return await fn(createTokenStore(db));
	} finally {
		db.close();
	}
}

export function reportCommandError(err: unknown): void {
	console.error(`Error: ${describeError(err)}`);
	process.exitCode = 1;
}
