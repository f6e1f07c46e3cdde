import type { RunConfig } from "../../config/config.js";
import type { DocumentReader } from "../../documents/word-reader.js";
import type { NewsProvider } from "../../news/newsapi-client.js";
import type { TextGenerator } from "../ai-client.js";
import type { ActivityHistory } from "../history.js";
import type { RandomSource } from "../random.js";
import type { ContentStrategy, EngagementTarget, StrategyKind } from "../types.js";
import { createDocumentStrategy } from "./document.js";
import { createEngagementStrategy } from "./engagement.js";
import { createNewsStrategy } from "./news.js";
import { createTrendStrategy, type TrendSource } from "./trend.js";

export type StrategyDeps = {
	ai: TextGenerator;
	history: ActivityHistory;
	run: RunConfig;
	random: RandomSource;
	news: NewsProvider | null;
	trends: TrendSource;
	discover: () => Promise<EngagementTarget | null>;
	loadDocumentReader: () => Promise<DocumentReader | null>;
};

export function createStrategy(kind: StrategyKind, deps: StrategyDeps): ContentStrategy {
	const base = { ai: deps.ai, history: deps.history, tone: deps.run.tone };
	switch (kind) {
		case "trend":
			return createTrendStrategy({ ...base, trends: deps.trends });
		case "news":
			return createNewsStrategy({
				...base,
				news: deps.news,
				niche: deps.run.niche,
				random: deps.random,
			});
		case "document":
			return createDocumentStrategy({
				...base,
				filePath: deps.run.wordFilePath,
				loadReader: deps.loadDocumentReader,
			});
		case "engagement":
			return createEngagementStrategy({ ...base, niche: deps.run.niche, discover: deps.discover });
	}
}

export { createDocumentStrategy } from "./document.js";
export { createEngagementStrategy } from "./engagement.js";
export { createNewsStrategy } from "./news.js";
export { createTrendStrategy, type TrendSource } from "./trend.js";
