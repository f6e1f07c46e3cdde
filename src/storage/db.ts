/**
 * SQLite storage for postloom.
 *
 * Holds the optional published-history log the CLI reloads between runs.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getChildLogger } from "../logging.js";
import { CONFIG_DIR } from "../utils.js";

const logger = getChildLogger({ module: "storage" });

const SCHEMA_VERSION = 1;

let db: Database.Database | null = null;

export function getDbPath(): string {
	return path.join(CONFIG_DIR, "postloom.db");
}

/**
 * Get or create the database connection.
 */
export function getDb(): Database.Database {
	if (db) return db;

	const dbPath = getDbPath();
	fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });

	db = new Database(dbPath);

	try {
		fs.chmodSync(dbPath, 0o600);
	} catch {
		logger.warn({ path: dbPath }, "could not set database file permissions to 0600");
	}

	db.pragma("journal_mode = WAL");
	migrate(db);

	logger.debug({ path: dbPath }, "database initialized");
	return db;
}

export function closeDb(): void {
	if (db) {
		db.close();
		db = null;
		logger.debug("database closed");
	}
}

/**
 * Close the connection and delete the database files.
 */
export function resetDatabase(): void {
	closeDb();
	const dbPath = getDbPath();
	for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
		fs.rmSync(file, { force: true });
	}
}

function migrate(database: Database.Database): void {
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

	if (currentVersion < 1) {
		database.exec(`
			CREATE TABLE IF NOT EXISTS published_history (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				kind TEXT NOT NULL,
				text TEXT NOT NULL,
				published_at INTEGER NOT NULL
			);
			CREATE INDEX IF NOT EXISTS idx_published_history_time
			ON published_history (published_at);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);
}
