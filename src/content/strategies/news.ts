import { getChildLogger } from "../../logging.js";
import type { NewsProvider } from "../../news/newsapi-client.js";
import { pickOne, type RandomSource } from "../random.js";
import type { ContentPackage, ContentStrategy } from "../types.js";
import { generateStructured, type StrategyBase } from "./shared.js";

const logger = getChildLogger({ module: "news-strategy" });

export const NEWS_PAGE_SIZE = 50;

/**
 * Post an insight about a random recent headline in the niche.
 */
export function createNewsStrategy(
	base: StrategyBase & { news: NewsProvider | null; niche: string; random: RandomSource },
): ContentStrategy {
	return {
		kind: "news",
		async attempt(): Promise<ContentPackage | null> {
			if (!base.news) {
				logger.warn("news provider not configured (NEWSAPI_KEY)");
				return null;
			}

			const result = await base.news.searchArticles({
				query: base.niche,
				pageSize: NEWS_PAGE_SIZE,
				language: "en",
				sortBy: "publishedAt",
			});
			if (!result.ok) {
				logger.warn({ reason: result.reason }, "no news articles available");
				return null;
			}

			const headline = pickOne(result.articles, base.random)?.title?.trim();
			if (!headline) {
				logger.warn("picked article has no headline");
				return null;
			}

			const content = await generateStructured(base, {
				kind: "news",
				task: `Analyze this news headline: '${headline}'. Formulate an insightful tweet about it.`,
				niche: base.niche,
			});
			if (!content) return null;

			return { text: content.text, queryForImage: headline };
		},
	};
}
