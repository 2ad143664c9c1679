import path from "node:path";
import { resolveDataDir } from "../utils.js";

/**
 * Resolve the settings file path from:
 * 1. Explicit override (the global --config option)
 * 2. TOKENWATCH_CONFIG environment variable
 * 3. Default: <data dir>/tokenwatch.json
 */
export function resolveConfigPath(
	override?: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	if (override) {
		return override;
	}

	const envPath = env.TOKENWATCH_CONFIG;
	if (envPath) {
		return envPath;
	}

	return path.join(resolveDataDir(env), "tokenwatch.json");
}
