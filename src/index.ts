#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerDaemonCommands } from "./commands/daemon.js";
import { registerTokenCommands } from "./commands/tokens.js";
import { loadEnvFile } from "./config/config.js";
import { closeLogger } from "./logging.js";

const program = createProgram();

registerTokenCommands(program);
registerDaemonCommands(program);

async function main(): Promise<void> {
	loadEnvFile();
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino's sync destination keeps a handle open; release it so short commands exit.
		closeLogger();
	});
