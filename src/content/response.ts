import { z } from "zod";

/**
 * Structured output every prompt asks for. `analysis` is advisory and may be
 * omitted by the model; `tweet_text` is the publishable body.
 */
const GeneratedContentSchema = z.object({
	analysis: z.string().optional(),
	tweet_text: z.string().trim().min(1),
});

export type GeneratedContent = {
	analysis?: string;
	text: string;
};

export type ParseFailure = {
	ok: false;
	kind: "parse";
	error: string;
};

export type ParseResult = { ok: true; value: GeneratedContent } | ParseFailure;

function parseFailure(error: string): ParseFailure {
	return { ok: false, kind: "parse", error };
}

export function parseGeneratedContent(raw: string): ParseResult {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (err) {
		return parseFailure(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
	}

	const result = GeneratedContentSchema.safeParse(json);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
		return parseFailure(`unexpected shape: ${issues.join("; ")}`);
	}

	return {
		ok: true,
		value: { analysis: result.data.analysis, text: result.data.tweet_text },
	};
}
