import type { PromptSpec } from "./types.js";

const EMPTY_HISTORY = "No recent activity.";

const POST_OUTPUT_SHAPE = '"analysis": "A brief summary.", "tweet_text": "The final tweet text."';
const REPLY_OUTPUT_SHAPE =
	'"analysis": "Justification for your reply.", "tweet_text": "The reply text. DO NOT use @ mentions."';

/**
 * Render the single prompt shared by every strategy.
 *
 * The `analysis` / `tweet_text` field names are the contract that
 * {@link parseGeneratedContent} validates against.
 */
export function buildPrompt(spec: PromptSpec): string {
	const history = spec.history.length > 0 ? spec.history.join("\n") : EMPTY_HISTORY;
	const outputShape = spec.isReply ? REPLY_OUTPUT_SHAPE : POST_OUTPUT_SHAPE;

	return [
		`**Persona:** You are a '${spec.tone}' expert in '${spec.niche}'.`,
		"**Your Recent Activity:**",
		history,
		`**TASK:** ${spec.task}`,
		"**Output Format (Strictly JSON):**",
		"```json",
		"{",
		`  ${outputShape}`,
		"}",
		"```",
	].join("\n");
}
