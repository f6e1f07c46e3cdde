import { getChildLogger } from "../../logging.js";
import type { TextGenerator } from "../ai-client.js";
import type { ActivityHistory } from "../history.js";
import { buildPrompt } from "../prompt-builder.js";
import { type GeneratedContent, parseGeneratedContent } from "../response.js";
import type { StrategyKind } from "../types.js";

const logger = getChildLogger({ module: "content-strategy" });

export type StrategyBase = {
	ai: TextGenerator;
	history: ActivityHistory;
	tone: string;
};

/**
 * Build the prompt, call the model and parse the structured answer.
 * Null on service or parse failure (both already logged).
 */
export async function generateStructured(
	base: StrategyBase,
	request: { kind: StrategyKind; task: string; niche: string; isReply?: boolean },
): Promise<GeneratedContent | null> {
	const prompt = buildPrompt({
		task: request.task,
		tone: base.tone,
		niche: request.niche,
		isReply: request.isReply ?? false,
		history: base.history.entries(),
	});

	const response = await base.ai.generate(prompt);
	if (!response.ok) {
		logger.warn({ strategy: request.kind, reason: response.reason }, "AI call failed");
		return null;
	}

	const parsed = parseGeneratedContent(response.text);
	if (!parsed.ok) {
		logger.error({ strategy: request.kind, error: parsed.error }, "failed to parse AI JSON");
		return null;
	}
	return parsed.value;
}
