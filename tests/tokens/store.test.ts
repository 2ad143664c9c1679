import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageError, ValidationError } from "../../src/errors.js";
import { type TokenDatabase, openDatabase } from "../../src/storage/db.js";
import { describeExpiry } from "../../src/tokens/expiry.js";
import {
	MAX_THRESHOLD_DAYS,
	type TokenStore,
	createTokenStore,
} from "../../src/tokens/store.js";

describe("token store", () => {
	let tempDir: string;
	let dbPath: string;
	let db: TokenDatabase;
	let store: TokenStore;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "tokenwatch-store-"));
		dbPath = path.join(tempDir, "tokens.db");
		db = openDatabase(dbPath);
		store = createTokenStore(db);
	});

	afterEach(() => {
		if (db.open) {
			db.close();
		}
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("adds and lists tokens", () => {
		store.add("svc-key", "2024-01-01");
		store.add("gh-pat", "2025-03-15");

		expect(store.list()).toEqual([
			{ name: "gh-pat", expiresAt: "2025-03-15", lastNotifiedAtMs: null },
			{ name: "svc-key", expiresAt: "2024-01-01", lastNotifiedAtMs: null },
		]);
	});

	it("keeps names case-sensitive", () => {
		store.add("Deploy", "2024-01-01");
		store.add("deploy", "2024-02-01");

		expect(store.list().map((t) => t.name)).toEqual(["Deploy", "deploy"]);
	});

	it("rejects a malformed date without touching the store", () => {
		store.add("svc-key", "2024-01-01");

		expect(() => store.add("svc-key", "2024-13-40")).toThrow(ValidationError);
		expect(() => store.add("other", "not-a-date")).toThrow(ValidationError);

		expect(store.list()).toEqual([
			{ name: "svc-key", expiresAt: "2024-01-01", lastNotifiedAtMs: null },
		]);
	});

	it("rejects a blank name", () => {
		expect(() => store.add("  ", "2024-01-01")).toThrow("Token name is required");
		expect(store.list()).toEqual([]);
	});

	it("replacing a token clears its notification state", () => {
		store.add("X", "2024-01-01");
		expect(store.markNotified("X", 1_700_000_000_000)).toBe(true);
		expect(store.get("X")?.lastNotifiedAtMs).toBe(1_700_000_000_000);

		store.add("X", "2024-02-01");

		expect(store.list()).toEqual([{ name: "X", expiresAt: "2024-02-01", lastNotifiedAtMs: null }]);
	});

	it("removes tokens and tolerates absent names", () => {
		store.add("svc-key", "2024-01-01");

		expect(store.remove("svc-key")).toBe(true);
		expect(store.remove("svc-key")).toBe(false);
		expect(store.remove("never-added")).toBe(false);
		expect(store.get("svc-key")).toBeNull();
	});

	it("finds tokens up to and including the threshold day", () => {
		store.add("tomorrow", "2024-06-11");
		store.add("day-after", "2024-06-12");
		store.add("past", "2024-05-01");

		const now = new Date(2024, 5, 10, 9, 30);
		expect(store.findExpiring(1, now).map((t) => t.name)).toEqual(["past", "tomorrow"]);
		expect(store.findExpiring(0, now).map((t) => t.name)).toEqual(["past"]);
		expect(store.findExpiring(2, now).map((t) => t.name)).toEqual([
			"past",
			"tomorrow",
			"day-after",
		]);
	});

	it("rejects thresholds that are not whole days within range", () => {
		expect(() => store.findExpiring(-1)).toThrow(ValidationError);
		expect(() => store.findExpiring(1.5)).toThrow(ValidationError);
		expect(() => store.findExpiring(3_000_000)).toThrow(
			"thresholdDays must be an integer from 0 to 36500 (got 3000000)",
		);
	});

	it("still finds expired tokens at the largest threshold", () => {
		store.add("past", "2024-05-01");
		store.add("far", "2100-01-01");

		const due = store.findExpiring(MAX_THRESHOLD_DAYS, new Date(2024, 5, 10, 9, 30));
		expect(due.map((t) => t.name)).toEqual(["past", "far"]);
	});

	it("ignores notification write-back for a removed token", () => {
		expect(store.markNotified("gone", Date.now())).toBe(false);
		expect(store.list()).toEqual([]);
	});

	it("reports an expired token end to end", () => {
		store.add("svc-key", "2024-01-01");

		const due = store.findExpiring(0, new Date(2024, 0, 2, 12));
		expect(due.map((t) => t.name)).toEqual(["svc-key"]);
		expect(describeExpiry(due[0], "2024-01-02").message).toBe("🚨 Token 'svc-key' has EXPIRED!");
	});

	it("persists tokens across reopen", () => {
		store.add("svc-key", "2024-01-01");
		store.markNotified("svc-key", 1_718_000_000_000);
		db.close();

		const reopened = openDatabase(dbPath);
		try {
			expect(createTokenStore(reopened).list()).toEqual([
				{ name: "svc-key", expiresAt: "2024-01-01", lastNotifiedAtMs: 1_718_000_000_000 },
			]);
		} finally {
			reopened.close();
		}
	});

	it("wraps database failures in StorageError", () => {
		db.close();

		expect(() => store.list()).toThrow(StorageError);
		expect(() => store.findExpiring(1)).toThrow(/^Failed to query expiring tokens/);
	});
});

describe("openDatabase", () => {
	it("supports an in-memory database", () => {
		const db = openDatabase(":memory:");
		try {
			const store = createTokenStore(db);
			store.add("svc-key", "2024-01-01");
			expect(store.get("svc-key")).toEqual({
				name: "svc-key",
				expiresAt: "2024-01-01",
				lastNotifiedAtMs: null,
			});
		} finally {
			db.close();
		}
	});
});
