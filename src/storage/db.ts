/**
 * SQLite storage for tracked tokens.
 *
 * The connection is opened by the command that needs it and passed down; nothing here
 * keeps a process-wide handle.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StorageError, describeError } from "../errors.js";
import { getChildLogger } from "../logging.js";

export type TokenDatabase = Database.Database;

export const IN_MEMORY_DB = ":memory:";
const SCHEMA_VERSION = 1;

/**
 * Open (creating if needed) the database at `dbPath` and bring its schema up to date.
 * Uses WAL mode so a CLI invocation can read while the daemon writes.
 */
export function openDatabase(dbPath: string): TokenDatabase {
	const logger = getChildLogger({ module: "storage" });
	const onDisk = dbPath !== IN_MEMORY_DB;

	try {
		if (onDisk) {
			fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
		}

		const db = new Database(dbPath);

		if (onDisk) {
			try {
				fs.chmodSync(dbPath, 0o600);
			} catch {
				logger.warn({ path: dbPath }, "could not set database file permissions to 0600");
			}
			db.pragma("journal_mode = WAL");
		}

		migrate(db);
		logger.debug({ path: dbPath }, "database opened");
		return db;
	} catch (err) {
		throw new StorageError(`Cannot open database ${dbPath}: ${describeError(err)}`, {
			cause: err,
		});
	}
}

function migrate(database: TokenDatabase): void {
	const logger = getChildLogger({ module: "storage" });

	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const row = database.prepare("SELECT version FROM schema_version LIMIT 1").get() as
		| { version: number }
		| undefined;
	const currentVersion = row?.version ?? 0;

	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	logger.info({ from: currentVersion, to: SCHEMA_VERSION }, "running migrations");

	// Migration 1: tracked tokens
	if (currentVersion < 1) {
		database.exec(`
			CREATE TABLE IF NOT EXISTS tokens (
				id INTEGER PRIMARY KEY,
				name TEXT NOT NULL UNIQUE,
				expires_at TEXT NOT NULL,
				last_notified INTEGER
			);
			CREATE INDEX IF NOT EXISTS idx_tokens_expires_at ON tokens(expires_at);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);

	logger.info({ version: SCHEMA_VERSION }, "migrations complete");
}
