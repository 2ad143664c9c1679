import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { isVerbose } from "./globals.js";
import { resolveDataDir } from "./utils.js";

export const LOG_LEVELS = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
] as const satisfies readonly LevelWithSilent[];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
type LogDestination = ReturnType<typeof pino.destination>;

let cachedDestination: LogDestination | null = null;
let configuredSettings: LoggerSettings | null = null;
let overrideSettings: LoggerSettings | null = null;

function defaultLogFile(): string {
	return path.join(resolveDataDir(), "logs", "tokenwatch.log");
}

function resolveSettings(): ResolvedSettings {
	const cfg = overrideSettings ?? configuredSettings ?? {};
	const level = isVerbose() && cfg.level !== "silent" ? "debug" : (cfg.level ?? "info");
	return { level, file: cfg.file ?? defaultLogFile() };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: LogDestination): void {
	dest.flushSync();
	dest.end();
}

function buildLogger(settings: ResolvedSettings): {
	logger: Logger;
	destination: LogDestination | null;
} {
	if (settings.level === "silent") {
		return { logger: pino({ level: "silent" }), destination: null };
	}

	const logDir = path.dirname(settings.file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });

	// Create with 0600 so token names never land in a world-readable file.
	try {
		const fd = fs.openSync(
			settings.file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") {
			throw err;
		}
	}

	const destination = pino.destination({
		dest: settings.file,
		mkdir: true,
		sync: true,
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

/**
 * Apply the `logging` section of the settings file.
 * Takes effect for loggers obtained after the call.
 */
export function configureLogging(settings: LoggerSettings | undefined): void {
	configuredSettings = settings ?? null;
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings): Logger {
	return getLogger().child(bindings ?? {});
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	cachedLogger = null;
	cachedSettings = null;
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
