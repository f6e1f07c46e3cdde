import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { parseConfig } from "../../src/config/config.js";
import { ActivityHistory } from "../../src/content/history.js";
import {
	createDocumentStrategy,
	createEngagementStrategy,
	createNewsStrategy,
	createStrategy,
	createTrendStrategy,
} from "../../src/content/strategies/index.js";
import type { EngagementTarget } from "../../src/content/types.js";
import type { NewsProvider, NewsSearchResult } from "../../src/news/newsapi-client.js";
import { fakeAI, okJson } from "../helpers/fake-ai.js";

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "postloom-doc-"));

afterAll(() => {
	fs.rmSync(tempDir, { recursive: true, force: true });
});

function newsReturning(result: NewsSearchResult) {
	const searchArticles = vi.fn<NewsProvider["searchArticles"]>(async () => result);
	return { news: { searchArticles }, searchArticles };
}

describe("trend strategy", () => {
	it("writes about the trends and uses the analysis as image query", async () => {
		const { ai, prompts } = fakeAI(okJson("Mars time.", "Mars is trending"));
		const strategy = createTrendStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "Thought Leader",
			trends: { fetchTrends: async () => ["#AI", "Mars"] },
		});

		expect(await strategy.attempt()).toEqual({ text: "Mars time.", queryForImage: "Mars is trending" });
		expect(prompts()[0]).toContain("You are a 'Thought Leader' expert in 'Current Events'.");
		expect(prompts()[0]).toContain(
			"**TASK:** From these trends, find the most interesting one and write an engaging tweet:\n#AI\nMars\n",
		);
	});

	it("falls back to the text as image query without an analysis", async () => {
		const { ai } = fakeAI(okJson("Only text."));
		const strategy = createTrendStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "t",
			trends: { fetchTrends: async () => ["#AI"] },
		});

		expect(await strategy.attempt()).toEqual({ text: "Only text.", queryForImage: "Only text." });
	});

	it("returns null without trends and skips the model", async () => {
		const { ai, generate } = fakeAI(okJson("unused"));
		const empty = createTrendStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "t",
			trends: { fetchTrends: async () => [] },
		});
		const broken = createTrendStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "t",
			trends: {
				fetchTrends: async () => {
					throw new Error("page did not load");
				},
			},
		});

		expect(await empty.attempt()).toBeNull();
		expect(await broken.attempt()).toBeNull();
		expect(generate).not.toHaveBeenCalled();
	});

	it("returns null when the model fails or answers with bad JSON", async () => {
		const { ai } = fakeAI(
			{ ok: false, reason: "safety", error: "blocked" },
			{ ok: true, text: "not json" },
		);
		const strategy = createTrendStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "t",
			trends: { fetchTrends: async () => ["#AI"] },
		});

		expect(await strategy.attempt()).toBeNull();
		expect(await strategy.attempt()).toBeNull();
	});
});

describe("news strategy", () => {
	it("posts about a picked headline", async () => {
		const { news, searchArticles } = newsReturning({
			ok: true,
			articles: [
				{ title: "Other story", imageUrl: null },
				{ title: "  NASA announces new mission ", imageUrl: null },
			],
		});
		const history = new ActivityHistory();
		history.record("An earlier post");
		const { ai, prompts } = fakeAI(okJson("Space is back.", "launch"));
		const strategy = createNewsStrategy({
			ai,
			history,
			tone: "Thought Leader",
			news,
			niche: "Space",
			random: () => 0.5,
		});

		expect(await strategy.attempt()).toEqual({
			text: "Space is back.",
			queryForImage: "NASA announces new mission",
		});
		expect(searchArticles).toHaveBeenCalledWith({
			query: "Space",
			pageSize: 50,
			language: "en",
			sortBy: "publishedAt",
		});
		expect(prompts()[0]).toContain("You are a 'Thought Leader' expert in 'Space'.");
		expect(prompts()[0]).toContain("**Your Recent Activity:**\nAn earlier post\n");
		expect(prompts()[0]).toContain(
			"**TASK:** Analyze this news headline: 'NASA announces new mission'. Formulate an insightful tweet about it.",
		);
	});

	it("returns null without a provider, without articles, or without a headline", async () => {
		const { ai, generate } = fakeAI();
		const base = { ai, history: new ActivityHistory(), tone: "t", niche: "AI", random: () => 0 };

		const noProvider = createNewsStrategy({ ...base, news: null });
		const noArticles = createNewsStrategy({
			...base,
			news: newsReturning({ ok: false, reason: "empty", error: "no articles" }).news,
		});
		const noTitle = createNewsStrategy({
			...base,
			news: newsReturning({ ok: true, articles: [{ title: "   ", imageUrl: null }] }).news,
		});

		expect(await noProvider.attempt()).toBeNull();
		expect(await noArticles.attempt()).toBeNull();
		expect(await noTitle.attempt()).toBeNull();
		expect(generate).not.toHaveBeenCalled();
	});
});

describe("document strategy", () => {
	const docPath = path.join(tempDir, "notes.docx");
	fs.writeFileSync(docPath, "placeholder");

	it("summarizes the first 4000 characters of the document", async () => {
		const body = `${"x".repeat(4000)}TAIL`;
		const { ai, prompts } = fakeAI(okJson(`${"w".repeat(150)}`));
		const strategy = createDocumentStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "t",
			filePath: docPath,
			loadReader: async () => ({ readText: async () => body }),
		});

		expect(await strategy.attempt()).toEqual({
			text: "w".repeat(150),
			queryForImage: "w".repeat(100),
		});
		expect(prompts()[0]).toContain(
			`**TASK:** Create a compelling tweet that captures the main idea of this text:\n---\n${"x".repeat(4000)}\n`,
		);
		expect(prompts()[0]).not.toContain("TAIL");
		expect(prompts()[0]).toContain("expert in 'document analysis'");
	});

	it("makes no model call without a configured path", async () => {
		const { ai, generate } = fakeAI();
		const loadReader = vi.fn(async () => ({ readText: async () => "text" }));

		for (const filePath of [undefined, null, "  "]) {
			const strategy = createDocumentStrategy({
				ai,
				history: new ActivityHistory(),
				tone: "t",
				filePath,
				loadReader,
			});
			expect(await strategy.attempt()).toBeNull();
		}
		expect(loadReader).not.toHaveBeenCalled();
		expect(generate).not.toHaveBeenCalled();
	});

	it("returns null for a missing file, a missing reader, a read error or an empty document", async () => {
		const { ai, generate } = fakeAI();
		const base = { ai, history: new ActivityHistory(), tone: "t" };

		const missing = createDocumentStrategy({
			...base,
			filePath: path.join(tempDir, "absent.docx"),
			loadReader: async () => ({ readText: async () => "text" }),
		});
		const noReader = createDocumentStrategy({
			...base,
			filePath: docPath,
			loadReader: async () => null,
		});
		const readError = createDocumentStrategy({
			...base,
			filePath: docPath,
			loadReader: async () => ({
				readText: async () => {
					throw new Error("corrupt zip");
				},
			}),
		});
		const emptyDoc = createDocumentStrategy({
			...base,
			filePath: docPath,
			loadReader: async () => ({ readText: async () => " \n " }),
		});

		expect(await missing.attempt()).toBeNull();
		expect(await noReader.attempt()).toBeNull();
		expect(await readError.attempt()).toBeNull();
		expect(await emptyDoc.attempt()).toBeNull();
		expect(generate).not.toHaveBeenCalled();
	});
});

describe("engagement strategy", () => {
	const target: EngagementTarget = {
		author: "space_fan",
		text: "Rockets are cool",
		url: "https://x.com/space_fan/status/1",
	};

	it("writes a reply carrying its target", async () => {
		const { ai, prompts } = fakeAI(okJson("They really are.", "agree"));
		const strategy = createEngagementStrategy({
			ai,
			history: new ActivityHistory(),
			tone: "Enthusiast",
			niche: "Space",
			discover: async () => target,
		});

		expect(await strategy.attempt()).toEqual({
			text: "They really are.",
			queryForImage: "Rockets are cool",
			replyTo: target,
		});
		expect(prompts()[0]).toContain(
			"**TASK:** You've found a tweet from @space_fan that says: \"Rockets are cool\"\nYour task is to write a valuable, insightful reply.",
		);
		expect(prompts()[0]).toContain("DO NOT use @ mentions.");
	});

	it("returns null when nothing is found or discovery throws", async () => {
		const { ai, generate } = fakeAI();
		const base = { ai, history: new ActivityHistory(), tone: "t", niche: "Space" };

		const nothing = createEngagementStrategy({ ...base, discover: async () => null });
		const broken = createEngagementStrategy({
			...base,
			discover: async () => {
				throw new Error("feed did not load");
			},
		});

		expect(await nothing.attempt()).toBeNull();
		expect(await broken.attempt()).toBeNull();
		expect(generate).not.toHaveBeenCalled();
	});
});

describe("createStrategy", () => {
	it("builds the strategy for each kind from the run settings", async () => {
		const { ai, generate } = fakeAI();
		const deps = {
			ai,
			history: new ActivityHistory(),
			run: parseConfig({}).run,
			random: () => 0,
			news: null,
			trends: { fetchTrends: async () => [] },
			discover: async () => null,
			loadDocumentReader: async () => null,
		};

		for (const kind of ["trend", "news", "document", "engagement"] as const) {
			const strategy = createStrategy(kind, deps);
			expect(strategy.kind).toBe(kind);
			expect(await strategy.attempt()).toBeNull();
		}
		expect(generate).not.toHaveBeenCalled();
	});
});
