import type { RunConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { DownloadedImage } from "../media/image-download.js";
import { resolvePostStrategy, selectAction } from "./action-selector.js";
import type { ActivityHistory } from "./history.js";
import type { RandomSource } from "./random.js";
import type {
	ActionType,
	ContentPackage,
	ContentStrategy,
	RunOutcome,
	StrategyKind,
} from "./types.js";

const logger = getChildLogger({ module: "orchestrator" });

export interface Publisher {
	publishPost(text: string, imagePath?: string | null): Promise<void>;
	publishReply(postUrl: string, text: string): Promise<void>;
}

export type PublishedItem = {
	action: ActionType;
	text: string;
	publishedAt: number;
};

export type OrchestratorDeps = {
	run: RunConfig;
	random: RandomSource;
	history: ActivityHistory;
	enforcer: { enforce(text: string): Promise<string> };
	strategyFor: (kind: StrategyKind) => ContentStrategy;
	publisher: Publisher;
	/** Image lookup for posts when `attachImage` is on. */
	findImage: (query: string) => Promise<DownloadedImage | null>;
	/** Called after a confirmed publish, e.g. to persist history. */
	onPublished?: (item: PublishedItem) => void | Promise<void>;
	now?: () => number;
};

export function appendRequiredText(text: string, requiredText: string | null | undefined): string {
	return requiredText ? `${text}\n\n${requiredText}` : text;
}

/**
 * Runs one decision cycle:
 *
 *   select action → strategy → enforce length → append required text
 *   → (attach image) → dispatch
 *
 * Any failure ends the cycle at that step. There is no retry and no fallback
 * to another strategy; a cycle makes at most one dispatch attempt.
 */
export class DispatchOrchestrator {
	constructor(private readonly deps: OrchestratorDeps) {}

	get history(): ActivityHistory {
		return this.deps.history;
	}

	async runCycle(): Promise<RunOutcome> {
		const { run, random } = this.deps;

		const action = selectAction(run.actionMode, random);
		logger.info({ action, mode: run.actionMode }, "new action cycle");

		const kind = action === "reply" ? "engagement" : resolvePostStrategy(run);
		if (!kind) {
			logger.warn({ mode: run.actionMode }, "no content strategy for action mode");
			return { status: "skipped", action, reason: `no strategy for mode ${run.actionMode}` };
		}

		const content = await this.attempt(this.deps.strategyFor(kind));
		if (!content) {
			logger.warn({ strategy: kind }, "content engine failed to return content");
			return { status: "skipped", action, reason: `${kind} strategy returned no content` };
		}

		const text = await this.deps.enforcer.enforce(content.text);
		const finalText = appendRequiredText(text, run.requiredText);

		if (action === "reply") {
			return this.dispatchReply(content, text, finalText);
		}
		return this.dispatchPost(content, text, finalText);
	}

	private async attempt(strategy: ContentStrategy): Promise<ContentPackage | null> {
		try {
			return await strategy.attempt();
		} catch (err) {
			logger.error(
				{ strategy: strategy.kind, error: formatErrorSafe(err) },
				"content strategy threw",
			);
			return null;
		}
	}

	private async acquireImage(query: string): Promise<DownloadedImage | null> {
		try {
			return await this.deps.findImage(query);
		} catch (err) {
			logger.warn({ error: formatErrorSafe(err) }, "image lookup failed; posting without image");
			return null;
		}
	}

	private async dispatchPost(
		content: ContentPackage,
		text: string,
		finalText: string,
	): Promise<RunOutcome> {
		const image = this.deps.run.attachImage
			? await this.acquireImage(content.queryForImage || text)
			: null;

		try {
			await this.deps.publisher.publishPost(finalText, image?.path);
		} catch (err) {
			const error = formatErrorSafe(err);
			logger.error({ error }, "error posting on X");
			return { status: "failed", action: "post", error };
		} finally {
			await image?.release();
		}

		await this.recordPublished("post", text);
		return { status: "published", action: "post", text: finalText };
	}

	private async dispatchReply(
		content: ContentPackage,
		text: string,
		finalText: string,
	): Promise<RunOutcome> {
		const target = content.replyTo;
		if (!target) {
			logger.warn("reply content has no target");
			return { status: "skipped", action: "reply", reason: "no reply target" };
		}

		try {
			await this.deps.publisher.publishReply(target.url, finalText);
		} catch (err) {
			const error = formatErrorSafe(err);
			logger.error({ error }, "error replying on X");
			return { status: "failed", action: "reply", error };
		}

		await this.recordPublished("reply", text);
		return { status: "published", action: "reply", text: finalText };
	}

	private async recordPublished(action: ActionType, text: string): Promise<void> {
		this.deps.history.record(text);
		if (!this.deps.onPublished) return;
		try {
			await this.deps.onPublished({ action, text, publishedAt: (this.deps.now ?? Date.now)() });
		} catch (err) {
			logger.warn({ error: formatErrorSafe(err) }, "could not record published item");
		}
	}
}
