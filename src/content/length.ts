import { getChildLogger } from "../logging.js";
import { codePointLength, sliceCodePoints } from "../utils.js";
import type { TextGenerator } from "./ai-client.js";

const logger = getChildLogger({ module: "length-enforcer" });

export const PLATFORM_CHAR_LIMIT = 280;

const ELLIPSIS = "...";

export function hardTruncate(text: string, limit = PLATFORM_CHAR_LIMIT): string {
	return `${sliceCodePoints(text, limit - ELLIPSIS.length)}${ELLIPSIS}`;
}

/**
 * Keeps drafts within the platform character budget.
 *
 * Over-limit text is first resummarized by the model; if that fails or is
 * still too long, it is cut to `limit - 3` characters plus "...".
 */
export class LengthEnforcer {
	constructor(
		private readonly generator: TextGenerator,
		private readonly limit = PLATFORM_CHAR_LIMIT,
	) {}

	async enforce(text: string): Promise<string> {
		const length = codePointLength(text);
		if (length <= this.limit) return text;

		logger.info({ length, limit: this.limit }, "draft over limit; requesting resummarization");

		const prompt = `Summarize the following text to be well under ${this.limit} characters for a tweet. Keep the original tone and key message.\n\nTEXT:\n---\n${text}`;
		try {
			const result = await this.generator.generate(prompt, { raw: true });
			if (result.ok && codePointLength(result.text) <= this.limit) {
				return result.text;
			}
			logger.warn(
				{ resummarized: result.ok, length: result.ok ? codePointLength(result.text) : undefined },
				"resummarization unusable; truncating",
			);
		} catch (err) {
			logger.warn({ error: String(err) }, "resummarization threw; truncating");
		}
		return hardTruncate(text, this.limit);
	}
}
