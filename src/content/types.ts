/**
 * Types shared by the content pipeline: strategies, prompt building,
 * length enforcement and dispatch.
 */

export type ActionType = "post" | "reply";

export type StrategyKind = "trend" | "news" | "document" | "engagement";

/** An existing post chosen as a reply candidate. Never persisted. */
export type EngagementTarget = {
	author: string;
	text: string;
	url: string;
};

/** One candidate item, produced by a strategy and consumed once by dispatch. */
export type ContentPackage = {
	text: string;
	queryForImage: string;
	replyTo?: EngagementTarget;
};

export interface ContentStrategy {
	readonly kind: StrategyKind;
	/** Resolves to null on any source, service or parse failure; never rejects. */
	attempt(): Promise<ContentPackage | null>;
}

export type PromptSpec = {
	task: string;
	tone: string;
	niche: string;
	isReply: boolean;
	/** Oldest first. */
	history: readonly string[];
};

export type RunOutcome =
	| { status: "published"; action: ActionType; text: string }
	| { status: "skipped"; action: ActionType; reason: string }
	| { status: "failed"; action: ActionType; error: string };
