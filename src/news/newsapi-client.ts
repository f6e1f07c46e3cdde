/**
 * NewsAPI client (`GET /v2/everything`).
 *
 * Used for headlines (news strategy) and for images to attach to posts.
 * Every failure resolves to a `{ ok: false }` result; nothing throws.
 */

import { z } from "zod";

import type { NewsConfig } from "../config/config.js";
import { classifyServiceError, formatErrorSafe } from "../infra/network-errors.js";
import { type FetchImpl, fetchWithDeadline } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "newsapi-client" });

const ArticleSchema = z.object({
	title: z.string().nullish(),
	urlToImage: z.string().nullish(),
});

const EverythingResponseSchema = z.object({
	status: z.string(),
	articles: z.array(ArticleSchema).nullish(),
	message: z.string().optional(),
});

export type NewsArticle = {
	title: string | null;
	imageUrl: string | null;
};

export type NewsSearchParams = {
	query: string;
	pageSize: number;
	language?: string;
	sortBy: "publishedAt" | "relevancy" | "popularity";
};

export type NewsSearchResult =
	| { ok: true; articles: NewsArticle[] }
	| { ok: false; reason: "status" | "empty" | "timeout" | "transport" | "malformed"; error: string };

export interface NewsProvider {
	searchArticles(params: NewsSearchParams): Promise<NewsSearchResult>;
}

export class NewsApiClient implements NewsProvider {
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl?: FetchImpl;

	constructor(options: { apiKey: string; config: NewsConfig; fetchImpl?: FetchImpl }) {
		this.apiKey = options.apiKey;
		this.baseUrl = options.config.baseUrl.replace(/\/+$/, "");
		this.timeoutMs = options.config.timeoutMs;
		this.fetchImpl = options.fetchImpl;
	}

	async searchArticles(params: NewsSearchParams): Promise<NewsSearchResult> {
		const url = new URL(`${this.baseUrl}/v2/everything`);
		url.searchParams.set("q", params.query);
		url.searchParams.set("apiKey", this.apiKey);
		url.searchParams.set("pageSize", String(params.pageSize));
		url.searchParams.set("language", params.language ?? "en");
		url.searchParams.set("sortBy", params.sortBy);

		let raw: string;
		try {
			raw = await fetchWithDeadline(
				url,
				{ headers: { "User-Agent": "Mozilla/5.0" } },
				this.timeoutMs,
				(response) => response.text(),
				this.fetchImpl,
			);
		} catch (err) {
			const kind = classifyServiceError(err);
			const error = formatErrorSafe(err);
			logger.error({ error, query: params.query }, "news request failed");
			return { ok: false, reason: kind === "timeout" ? "timeout" : "transport", error };
		}

		let payload: unknown;
		try {
			payload = JSON.parse(raw);
		} catch {
			logger.error({ query: params.query }, "news response was not JSON");
			return { ok: false, reason: "malformed", error: "response was not JSON" };
		}

		const parsed = EverythingResponseSchema.safeParse(payload);
		if (!parsed.success) {
			logger.error({ query: params.query }, "news response had an unexpected shape");
			return { ok: false, reason: "malformed", error: parsed.error.message };
		}

		const { status, articles, message } = parsed.data;
		if (status !== "ok") {
			logger.warn({ status, message, query: params.query }, "news provider returned an error");
			return { ok: false, reason: "status", error: message ?? status };
		}
		if (!articles || articles.length === 0) {
			logger.warn({ query: params.query }, "news provider returned no articles");
			return { ok: false, reason: "empty", error: "no articles" };
		}

		return {
			ok: true,
			articles: articles.map((a) => ({ title: a.title ?? null, imageUrl: a.urlToImage ?? null })),
		};
	}
}
