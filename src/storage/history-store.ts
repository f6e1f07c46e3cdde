/**
 * Persisted log of published texts, used to seed the in-memory history
 * across separate process runs.
 */

import type { ActionType } from "../content/types.js";
import { getDb } from "./db.js";

export type PublishedRecord = {
	kind: ActionType;
	text: string;
	publishedAt: number;
};

type PublishedRow = {
	kind: string;
	text: string;
	published_at: number;
};

function toActionType(kind: string): ActionType {
	return kind === "reply" ? "reply" : "post";
}

export function recordPublished(record: PublishedRecord): void {
	getDb()
		.prepare("INSERT INTO published_history (kind, text, published_at) VALUES (?, ?, ?)")
		.run(record.kind, record.text, record.publishedAt);
}

/**
 * Most recent `limit` records, oldest first.
 */
export function loadRecentPublished(limit: number): PublishedRecord[] {
	const rows = getDb()
		.prepare(
			`SELECT kind, text, published_at FROM published_history
			 ORDER BY published_at DESC, id DESC
			 LIMIT ?`,
		)
		.all(limit) as PublishedRow[];

	return rows.reverse().map((row) => ({
		kind: toActionType(row.kind),
		text: row.text,
		publishedAt: row.published_at,
	}));
}
