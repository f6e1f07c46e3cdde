import { formatErrorSafe } from "../../infra/network-errors.js";
import { getChildLogger } from "../../logging.js";
import type { ContentPackage, ContentStrategy, EngagementTarget } from "../types.js";
import { generateStructured, type StrategyBase } from "./shared.js";

const logger = getChildLogger({ module: "engagement-strategy" });

export function engagementTask(target: EngagementTarget): string {
	return `You've found a tweet from @${target.author} that says: "${target.text}"\nYour task is to write a valuable, insightful reply.`;
}

/**
 * Reply to one discovered post. The package carries the target in `replyTo`.
 */
export function createEngagementStrategy(
	base: StrategyBase & { niche: string; discover: () => Promise<EngagementTarget | null> },
): ContentStrategy {
	return {
		kind: "engagement",
		async attempt(): Promise<ContentPackage | null> {
			let target: EngagementTarget | null;
			try {
				target = await base.discover();
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "error finding a post to engage with");
				return null;
			}
			if (!target) {
				logger.warn("could not find content to engage with");
				return null;
			}

			const content = await generateStructured(base, {
				kind: "engagement",
				task: engagementTask(target),
				niche: base.niche,
				isReply: true,
			});
			if (!content) return null;

			return { text: content.text, queryForImage: target.text, replyTo: target };
		},
	};
}
