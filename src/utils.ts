import os from "node:os";
import path from "node:path";

/**
 * Directory holding the settings file, database and logs.
 * TOKENWATCH_DATA_DIR overrides the default of ~/.tokenwatch.
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
	const override = env.TOKENWATCH_DATA_DIR?.trim();
	if (override) {
		return override;
	}
	return path.join(os.homedir(), ".tokenwatch");
}

export function formatTimestamp(ms: number | null): string {
	if (ms === null) {
		return "Never";
	}
	return new Date(ms).toISOString();
}
