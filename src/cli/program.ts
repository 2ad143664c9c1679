import { createRequire } from "node:module";
import { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { resolveConfigPath } from "../config/path.js";
import { ConfigurationError } from "../errors.js";
import { setVerbose } from "../globals.js";
import { configureLogging } from "../logging.js";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg = require("../../package.json") as { version?: string };
		return pkg.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export type GlobalOptions = {
	verbose?: boolean;
	config?: string;
};

export function createProgram(): Command {
	const program = new Command();

	program
		.name("tokenwatch")
		.description("Track token expiry dates and get Telegram reminders before they lapse")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose logging")
		.option("-c, --config <path>", "Path to settings file");

	program.hook("preAction", (thisCommand) => {
		const opts = thisCommand.opts<GlobalOptions>();
		if (opts.verbose) {
			setVerbose(true);
		}
		// Apply logging settings before any command obtains a logger.
		try {
			configureLogging(loadConfig(resolveConfigPath(opts.config)).logging);
		} catch (err) {
			// The action loads the file again and reports the error itself.
			if (!(err instanceof ConfigurationError)) {
				throw err;
			}
		}
	});

	return program;
}
