import fs from "node:fs";
import path from "node:path";

import dotenv from "dotenv";
import JSON5 from "json5";
import { z } from "zod";

import { MAX_TIMER_DELAY_MS } from "../daemon/loop.js";
import { ConfigurationError, describeError } from "../errors.js";
import { LOG_LEVELS } from "../logging.js";
import { MAX_THRESHOLD_DAYS } from "../tokens/store.js";
import { resolveDataDir } from "../utils.js";

export const DEFAULT_THRESHOLD_DAYS = 1;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 3600;
export const DEFAULT_TELEGRAM_API_BASE_URL = "https://api.telegram.org";
/** Longest interval a single timer can wait (Node clamps larger delays to 1ms). */
export const MAX_CHECK_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

const TelegramConfigSchema = z.object({
	botToken: z.string().min(1).optional(),
	chatId: z
		.union([z.string().min(1), z.number().int()])
		.transform((value) => String(value))
		.optional(),
	apiBaseUrl: z.string().url().optional(),
});

const NotificationsConfigSchema = z.object({
	thresholdDays: z.number().int().nonnegative().max(MAX_THRESHOLD_DAYS).optional(),
	checkIntervalSeconds: z.number().int().positive().max(MAX_CHECK_INTERVAL_SECONDS).optional(),
});

const StorageConfigSchema = z.object({
	path: z.string().min(1).optional(),
});

const LoggingConfigSchema = z.object({
	level: z.enum(LOG_LEVELS).optional(),
	file: z.string().min(1).optional(),
});

const TokenwatchConfigSchema = z.object({
	telegram: TelegramConfigSchema.optional(),
	notifications: NotificationsConfigSchema.optional(),
	storage: StorageConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type TokenwatchConfig = z.infer<typeof TokenwatchConfigSchema>;

/** Everything the daemon needs beyond the store. */
export type DaemonSettings = {
	botToken: string;
	chatId: string;
	thresholdDays: number;
	checkIntervalSeconds: number;
	apiBaseUrl: string;
};

/**
 * Read and validate the JSON5 settings file.
 * A missing file is not an error: every key has an environment variable or a default.
 */
export function loadConfig(configPath: string): TokenwatchConfig {
	let raw: string;
	try {
		raw = fs.readFileSync(configPath, "utf-8");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			return {};
		}
		throw new ConfigurationError(
			`Cannot read settings file ${configPath}: ${describeError(err)}`,
			undefined,
			{ cause: err },
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON5.parse(raw);
	} catch (err) {
		throw new ConfigurationError(
			`Settings file ${configPath} is not valid JSON5: ${describeError(err)}`,
			undefined,
			{ cause: err },
		);
	}

	const result = TokenwatchConfigSchema.safeParse(parsed);
	if (!result.success) {
		const issues = result.error.errors.map(
			(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
		);
		throw new ConfigurationError(`Invalid settings file ${configPath}: ${issues.join("; ")}`);
	}
	return result.data;
}

/**
 * Merge a `.env` file (default: `./.env`) into `env`.
 * Variables already set in `env` keep their values. A missing file is ignored.
 */
export function loadEnvFile(
	envPath: string = path.resolve(".env"),
	env: NodeJS.ProcessEnv = process.env,
): boolean {
	let raw: string;
	try {
		raw = fs.readFileSync(envPath, "utf-8");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			return false;
		}
		throw new ConfigurationError(`Cannot read ${envPath}: ${describeError(err)}`, undefined, {
			cause: err,
		});
	}

	for (const [key, value] of Object.entries(dotenv.parse(raw))) {
		if (env[key] === undefined) {
			env[key] = value;
		}
	}
	return true;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

function readIntegerEnv(
	env: NodeJS.ProcessEnv,
	key: string,
	min: number,
	max: number,
	description: string,
): number | undefined {
	const raw = readEnv(env, key);
	if (raw === undefined) {
		return undefined;
	}
	const result = z.coerce.number().int().min(min).max(max).safeParse(raw);
	if (!result.success) {
		throw new ConfigurationError(`${key} must be ${description} (got '${raw}')`, key);
	}
	return result.data;
}

export function resolveDbPath(
	config: TokenwatchConfig,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return (
		readEnv(env, "TOKENWATCH_DB_PATH") ??
		config.storage?.path ??
		path.join(resolveDataDir(env), "tokenwatch.db")
	);
}

/**
 * Resolve the messaging and scheduling settings.
 * Environment variables take precedence over the settings file.
 */
export function resolveDaemonSettings(
	config: TokenwatchConfig,
	env: NodeJS.ProcessEnv = process.env,
): DaemonSettings {
	const botToken = readEnv(env, "TELEGRAM_BOT_TOKEN") ?? config.telegram?.botToken;
	if (!botToken) {
		throw new ConfigurationError(
			"TELEGRAM_BOT_TOKEN is not set (environment or telegram.botToken in the settings file)",
			"TELEGRAM_BOT_TOKEN",
		);
	}

	const chatId = readEnv(env, "TELEGRAM_CHAT_ID") ?? config.telegram?.chatId;
	if (!chatId) {
		throw new ConfigurationError(
			"TELEGRAM_CHAT_ID is not set (environment or telegram.chatId in the settings file)",
			"TELEGRAM_CHAT_ID",
		);
	}

	const thresholdDays =
		readIntegerEnv(
			env,
			"NOTIFICATION_THRESHOLD_DAYS",
			0,
			MAX_THRESHOLD_DAYS,
			`an integer from 0 to ${MAX_THRESHOLD_DAYS}`,
		) ??
		config.notifications?.thresholdDays ??
		DEFAULT_THRESHOLD_DAYS;

	const checkIntervalSeconds =
		readIntegerEnv(
			env,
			"CHECK_INTERVAL_SECONDS",
			1,
			MAX_CHECK_INTERVAL_SECONDS,
			`an integer from 1 to ${MAX_CHECK_INTERVAL_SECONDS}`,
		) ??
		config.notifications?.checkIntervalSeconds ??
		DEFAULT_CHECK_INTERVAL_SECONDS;

	return {
		botToken,
		chatId,
		thresholdDays,
		checkIntervalSeconds,
		apiBaseUrl: config.telegram?.apiBaseUrl ?? DEFAULT_TELEGRAM_API_BASE_URL,
	};
}
