import type { BrowserConfig, PostloomConfig } from "../config/config.js";
import { AIClient, type TextGenerator } from "../content/ai-client.js";
import { ActivityHistory } from "../content/history.js";
import { LengthEnforcer } from "../content/length.js";
import { DispatchOrchestrator, type PublishedItem } from "../content/orchestrator.js";
import { defaultRandom, type RandomSource } from "../content/random.js";
import { createStrategy } from "../content/strategies/index.js";
import type { RunOutcome } from "../content/types.js";
import { type DocumentReader, loadWordReader } from "../documents/word-reader.js";
import type { Secrets } from "../env.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { fetchAttachmentImage } from "../media/image-download.js";
import { NewsApiClient, type NewsProvider } from "../news/newsapi-client.js";
import { launchPuppeteerSurface } from "../social/backends/puppeteer-surface.js";
import { findEngagementTarget } from "../social/discovery.js";
import type { RemoteInteractionSurface } from "../social/surface.js";
import { XSession, type SessionPauses } from "../social/x-session.js";

const logger = getChildLogger({ module: "agent-runner" });

export type CycleResult =
	| { kind: "completed"; outcome: RunOutcome }
	| { kind: "login-failed" }
	| { kind: "fatal"; error: string };

export type AgentRunnerOptions = {
	config: PostloomConfig;
	secrets: Secrets;
	random?: RandomSource;
	/** Texts published in earlier runs, oldest first. */
	initialHistory?: readonly string[];
	onPublished?: (item: PublishedItem) => void | Promise<void>;
	launchSurface?: (config: BrowserConfig) => Promise<RemoteInteractionSurface>;
	ai?: TextGenerator;
	news?: NewsProvider | null;
	loadDocumentReader?: () => Promise<DocumentReader | null>;
	pauses?: Partial<SessionPauses>;
	/** Settle delay after the feed loads during engagement discovery. */
	discoverySettleMs?: number;
	mediaDir?: string;
};

/**
 * One agent process. Each cycle starts a fresh browser, logs in, runs the
 * orchestrator once and always shuts the browser down. The activity history
 * lives as long as the runner, so repeated cycles see earlier publishes.
 */
export class AgentRunner {
	readonly history: ActivityHistory;
	private readonly random: RandomSource;
	private readonly ai: TextGenerator;
	private readonly news: NewsProvider | null;

	constructor(private readonly options: AgentRunnerOptions) {
		const { config, secrets } = options;
		this.history = new ActivityHistory(config.history.limit, options.initialHistory);
		this.random = options.random ?? defaultRandom;
		this.ai = options.ai ?? new AIClient({ config: config.ai, apiKey: secrets.GEMINI_API_KEY });
		if (options.news !== undefined) {
			this.news = options.news;
		} else {
			this.news = secrets.NEWSAPI_KEY
				? new NewsApiClient({ apiKey: secrets.NEWSAPI_KEY, config: config.news })
				: null;
		}
	}

	async runOnce(): Promise<CycleResult> {
		const { config, secrets } = this.options;
		const launch = this.options.launchSurface ?? launchPuppeteerSurface;

		let surface: RemoteInteractionSurface;
		try {
			surface = await launch(config.browser);
		} catch (err) {
			const error = formatErrorSafe(err);
			logger.fatal({ error }, "could not start the browser");
			return { kind: "fatal", error };
		}

		try {
			const session = new XSession(surface, { pauses: this.options.pauses });
			const loggedIn = await session.login({
				username: secrets.TWITTER_USERNAME,
				password: secrets.TWITTER_PASSWORD,
			});
			if (!loggedIn) return { kind: "login-failed" };

			const orchestrator = this.createOrchestrator(surface, session);
			const outcome = await orchestrator.runCycle();
			return { kind: "completed", outcome };
		} finally {
			await surface.quit();
		}
	}

	private createOrchestrator(
		surface: RemoteInteractionSurface,
		session: XSession,
	): DispatchOrchestrator {
		const { config } = this.options;
		const { ai, news, random, history } = this;

		return new DispatchOrchestrator({
			run: config.run,
			random,
			history,
			enforcer: new LengthEnforcer(ai),
			publisher: session,
			strategyFor: (kind) =>
				createStrategy(kind, {
					ai,
					history,
					run: config.run,
					random,
					news,
					trends: session,
					discover: () =>
						findEngagementTarget(surface, {
							niche: config.run.niche,
							random,
							settleMs: this.options.discoverySettleMs,
						}),
					loadDocumentReader: this.options.loadDocumentReader ?? loadWordReader,
				}),
			findImage: async (query) => {
				if (!news) return null;
				return fetchAttachmentImage({
					news,
					query,
					random,
					download: { timeoutMs: config.news.timeoutMs, mediaDir: this.options.mediaDir },
				});
			},
			onPublished: this.options.onPublished,
		});
	}
}
