import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { parseConfig } from "../../src/config/config.js";
import { TimeoutError } from "../../src/infra/timeout.js";
import { NewsApiClient } from "../../src/news/newsapi-client.js";

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" },
	});
}

function clientWith(respond: () => Promise<Response>, baseUrl = "https://newsapi.org") {
	const fetchImpl = vi.fn(async (_url: string | URL, _init?: RequestInit) => respond());
	const config = parseConfig({ news: { baseUrl } }).news;
	return { client: new NewsApiClient({ apiKey: "test-secret", config, fetchImpl }), fetchImpl };
}

const params = { query: "Space news", pageSize: 50, sortBy: "publishedAt" } as const;

describe("NewsApiClient.searchArticles", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("queries /v2/everything and maps articles", async () => {
		const { client, fetchImpl } = clientWith(async () =>
			jsonResponse({
				status: "ok",
				totalResults: 2,
				articles: [
					{ title: "NASA announces new mission", urlToImage: "https://img.example.test/1.jpg", source: {} },
					{ title: null, urlToImage: null },
				],
			}),
		);

		const result = await client.searchArticles(params);

		expect(result).toEqual({
			ok: true,
			articles: [
				{ title: "NASA announces new mission", imageUrl: "https://img.example.test/1.jpg" },
				{ title: null, imageUrl: null },
			],
		});
		const [url, init] = fetchImpl.mock.calls[0] ?? [];
		expect(String(url)).toBe(
			"https://newsapi.org/v2/everything?q=Space+news&apiKey=test-secret&pageSize=50&language=en&sortBy=publishedAt",
		);
		expect(init?.headers).toEqual({ "User-Agent": "Mozilla/5.0" });
	});

	it("drops a trailing slash from the base URL", async () => {
		const { client, fetchImpl } = clientWith(
			async () => jsonResponse({ status: "ok", articles: [{ title: "x" }] }),
			"http://localhost:8080/",
		);

		await client.searchArticles({ ...params, language: "de", sortBy: "relevancy" });

		expect(String(fetchImpl.mock.calls[0]?.[0])).toBe(
			"http://localhost:8080/v2/everything?q=Space+news&apiKey=test-secret&pageSize=50&language=de&sortBy=relevancy",
		);
	});

	it("reports a provider error status with its message", async () => {
		const { client } = clientWith(async () =>
			jsonResponse({ status: "error", code: "apiKeyInvalid", message: "Your API key is invalid." }, 401),
		);

		expect(await client.searchArticles(params)).toEqual({
			ok: false,
			reason: "status",
			error: "Your API key is invalid.",
		});
	});

	it("reports an empty result", async () => {
		const { client } = clientWith(async () =>
			jsonResponse({ status: "ok", totalResults: 0, articles: [] }),
		);

		expect(await client.searchArticles(params)).toEqual({
			ok: false,
			reason: "empty",
			error: "no articles",
		});
	});

	it("reports malformed bodies", async () => {
		const notJson = clientWith(async () => new Response("<html>busy</html>", { status: 503 }));
		expect(await notJson.client.searchArticles(params)).toEqual({
			ok: false,
			reason: "malformed",
			error: "response was not JSON",
		});

		const wrongShape = clientWith(async () => jsonResponse({ status: 5 }));
		expect(await wrongShape.client.searchArticles(params)).toMatchObject({
			ok: false,
			reason: "malformed",
		});
	});

	it("classifies transport failures and timeouts", async () => {
		const down = clientWith(async () => {
			throw new TypeError("fetch failed");
		});
		expect(await down.client.searchArticles(params)).toEqual({
			ok: false,
			reason: "transport",
			error: "TypeError: fetch failed",
		});

		const slow = clientWith(async () => {
			throw new TimeoutError("fetch timed out after 20000ms", 20_000);
		});
		expect(await slow.client.searchArticles(params)).toMatchObject({ ok: false, reason: "timeout" });
	});

	it("times out when the body stalls after the headers arrive", async () => {
		vi.useFakeTimers();

		const stalled = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.enqueue(new TextEncoder().encode('{"status":"ok","articles":['));
			},
		});
		const fetchImpl = vi.fn(async (_url: string | URL, _init?: RequestInit) => new Response(stalled));
		const config = parseConfig({ news: { timeoutMs: 50 } }).news;
		const client = new NewsApiClient({ apiKey: "test-secret", config, fetchImpl });

		const pending = client.searchArticles(params);
		await vi.advanceTimersByTimeAsync(50);

		expect(await pending).toEqual({
			ok: false,
			reason: "timeout",
			error: "TimeoutError: fetch timed out after 50ms",
		});
		expect(fetchImpl.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
	});
});
