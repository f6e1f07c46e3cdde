/**
 * Text generation client.
 *
 * Talks to Gemini through its OpenAI-compatible endpoint with the `openai`
 * SDK. One request per call, no retries: callers decide whether to call again.
 */

import OpenAI, { APIConnectionTimeoutError } from "openai";

import type { AIConfig } from "../config/config.js";
import { classifyServiceError, formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "ai-client" });

export type GenerateFailureReason = "transport" | "timeout" | "safety" | "empty";

export type GenerateResult =
	| { ok: true; text: string }
	| { ok: false; reason: GenerateFailureReason; error: string };

export type GenerateOptions = {
	/** Keep the response verbatim apart from trimming (no code-fence stripping). */
	raw?: boolean;
};

/** The slice of a chat completion this client reads. */
export type CompletionLike = {
	choices: Array<{
		finish_reason: string | null;
		message: { content: string | null };
	}>;
};

export interface ChatCompletionsApi {
	create(
		body: {
			model: string;
			messages: Array<{ role: "user"; content: string }>;
		},
		options: { timeout: number; maxRetries: number },
	): Promise<CompletionLike>;
}

export interface TextGenerator {
	generate(prompt: string, options?: GenerateOptions): Promise<GenerateResult>;
}

/**
 * Strip markdown code-fence markers the model tends to wrap JSON in.
 */
export function stripCodeFences(text: string): string {
	return text.replaceAll("```json", "").replaceAll("```", "");
}

export class AIClient implements TextGenerator {
	private readonly completions: ChatCompletionsApi;
	private readonly model: string;
	private readonly timeoutMs: number;

	constructor(options: {
		config: AIConfig;
		apiKey?: string;
		completions?: ChatCompletionsApi;
	}) {
		this.model = options.config.model;
		this.timeoutMs = options.config.timeoutMs;

		if (options.completions) {
			this.completions = options.completions;
		} else {
			if (!options.apiKey) {
				throw new Error("AI client needs an API key (GEMINI_API_KEY)");
			}
			const client = new OpenAI({
				apiKey: options.apiKey,
				baseURL: options.config.baseUrl,
			});
			this.completions = {
				create: (body, requestOptions) => client.chat.completions.create(body, requestOptions),
			};
		}
	}

	async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerateResult> {
		let completion: CompletionLike;
		try {
			completion = await this.completions.create(
				{ model: this.model, messages: [{ role: "user", content: prompt }] },
				{ timeout: this.timeoutMs, maxRetries: 0 },
			);
		} catch (err) {
			// the SDK's timeout error is named "Error", so match its class
			const timedOut = err instanceof APIConnectionTimeoutError || classifyServiceError(err) === "timeout";
			const reason: GenerateFailureReason = timedOut ? "timeout" : "transport";
			const error = formatErrorSafe(err);
			logger.error({ reason, error }, "error calling AI model");
			return { ok: false, reason, error };
		}

		const choice = completion.choices[0];
		if (!choice) {
			logger.error("AI model returned no candidates");
			return { ok: false, reason: "empty", error: "no candidates" };
		}
		if (choice.finish_reason === "content_filter") {
			logger.error("AI response blocked by safety filter");
			return { ok: false, reason: "safety", error: "blocked by safety filter" };
		}

		const text = choice.message.content?.trim();
		if (!text) {
			logger.error({ finishReason: choice.finish_reason }, "AI model returned empty content");
			return { ok: false, reason: "empty", error: "empty content" };
		}

		logger.debug({ chars: text.length, raw: options.raw === true }, "AI response received");
		return { ok: true, text: options.raw ? text : stripCodeFences(text) };
	}
}
