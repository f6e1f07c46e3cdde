import { formatErrorSafe } from "../../infra/network-errors.js";
import { getChildLogger } from "../../logging.js";
import type { ContentPackage, ContentStrategy } from "../types.js";
import { generateStructured, type StrategyBase } from "./shared.js";

const logger = getChildLogger({ module: "trend-strategy" });

export interface TrendSource {
	fetchTrends(): Promise<string[]>;
}

/**
 * Post about whichever live trend the model finds most interesting.
 */
export function createTrendStrategy(base: StrategyBase & { trends: TrendSource }): ContentStrategy {
	return {
		kind: "trend",
		async attempt(): Promise<ContentPackage | null> {
			let trends: string[];
			try {
				trends = await base.trends.fetchTrends();
			} catch (err) {
				logger.error({ error: formatErrorSafe(err) }, "error reading trending topics");
				return null;
			}
			if (trends.length === 0) {
				logger.warn("no trending topics found");
				return null;
			}

			const content = await generateStructured(base, {
				kind: "trend",
				task: `From these trends, find the most interesting one and write an engaging tweet:\n${trends.join("\n")}`,
				niche: "Current Events",
			});
			if (!content) return null;

			return { text: content.text, queryForImage: content.analysis || content.text };
		},
	};
}
