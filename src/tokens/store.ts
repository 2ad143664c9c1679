import { StorageError, ValidationError, describeError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { TokenDatabase } from "../storage/db.js";
import { addDays, parseIsoDate, toLocalIsoDate } from "./dates.js";
import type { TrackedToken } from "./types.js";

/** Keeps the due cutoff inside the four-digit years SQLite's date() accepts. */
export const MAX_THRESHOLD_DAYS = 36_500;

type TokenRow = {
	name: string;
	expires_at: string;
	last_notified: number | null;
};

export type TokenStore = {
	/** Insert or replace. Replacing clears `lastNotifiedAtMs`. */
	add: (name: string, expiresAt: string) => TrackedToken;
	/** Returns false when nothing was tracked under `name`. */
	remove: (name: string) => boolean;
	get: (name: string) => TrackedToken | null;
	list: () => TrackedToken[];
	/** Tokens expiring on or before today + `thresholdDays` (local calendar date of `now`). */
	findExpiring: (thresholdDays: number, now?: Date) => TrackedToken[];
	/** No-op returning false when the token was removed in the meantime. */
	markNotified: (name: string, atMs?: number) => boolean;
};

function rowToToken(row: TokenRow): TrackedToken {
	return {
		name: row.name,
		expiresAt: row.expires_at,
		lastNotifiedAtMs: row.last_notified,
	};
}

function validateName(name: string): string {
	if (!name.trim()) {
		throw new ValidationError("Token name is required", "name");
	}
	return name;
}

export function createTokenStore(db: TokenDatabase): TokenStore {
	const logger = getChildLogger({ module: "token-store" });

	const run = <T>(operation: string, fn: () => T): T => {
		try {
			return fn();
		} catch (err) {
			throw new StorageError(`Failed to ${operation}: ${describeError(err)}`, { cause: err });
		}
	};

	const get = (name: string): TrackedToken | null => {
		const row = run(
			"read token",
			() =>
				db
					.prepare("SELECT name, expires_at, last_notified FROM tokens WHERE name = ?")
					.get(name) as TokenRow | undefined,
		);
		return row ? rowToToken(row) : null;
	};

	return {
		add: (name, expiresAt) => {
			validateName(name);
			const date = parseIsoDate(expiresAt);
			run("store token", () =>
				db
					.prepare("INSERT OR REPLACE INTO tokens (name, expires_at) VALUES (?, ?)")
					.run(name, date),
			);
			logger.info({ name, expiresAt: date }, "token added");
			return { name, expiresAt: date, lastNotifiedAtMs: null };
		},

		remove: (name) => {
			const result = run("remove token", () =>
				db.prepare("DELETE FROM tokens WHERE name = ?").run(name),
			);
			const removed = result.changes > 0;
			logger.info({ name, removed }, "token removed");
			return removed;
		},

		get,

		list: () => {
			const rows = run(
				"list tokens",
				() =>
					db
						.prepare("SELECT name, expires_at, last_notified FROM tokens ORDER BY name")
						.all() as TokenRow[],
			);
			return rows.map(rowToToken);
		},

		findExpiring: (thresholdDays, now = new Date()) => {
			if (
				!Number.isInteger(thresholdDays) ||
				thresholdDays < 0 ||
				thresholdDays > MAX_THRESHOLD_DAYS
			) {
				throw new ValidationError(
					`thresholdDays must be an integer from 0 to ${MAX_THRESHOLD_DAYS} (got ${thresholdDays})`,
					"thresholdDays",
				);
			}
			const cutoff = addDays(toLocalIsoDate(now), thresholdDays);
			const rows = run(
				"query expiring tokens",
				() =>
					db
						.prepare(
							`SELECT name, expires_at, last_notified FROM tokens
							WHERE date(expires_at) <= date(?)
							ORDER BY expires_at, name`,
						)
						.all(cutoff) as TokenRow[],
			);
			logger.debug({ cutoff, count: rows.length }, "queried expiring tokens");
			return rows.map(rowToToken);
		},

		markNotified: (name, atMs = Date.now()) => {
			const result = run("record notification", () =>
				db.prepare("UPDATE tokens SET last_notified = ? WHERE name = ?").run(atMs, name),
			);
			if (result.changes === 0) {
				logger.debug({ name }, "token disappeared before notification was recorded");
			}
			return result.changes > 0;
		},
	};
}
