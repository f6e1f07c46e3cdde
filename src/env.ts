import { z } from "zod";

const SecretsSchema = z.object({
	GEMINI_API_KEY: z.string().min(1),
	TWITTER_USERNAME: z.string().min(1),
	TWITTER_PASSWORD: z.string().min(1),
	// Optional: without it the news strategy and image attachment report no content.
	NEWSAPI_KEY: z.string().min(1).optional(),
});

export type Secrets = z.infer<typeof SecretsSchema>;

export class MissingSecretsError extends Error {
	constructor(public readonly missing: string[]) {
		super(`missing required secrets: ${missing.join(", ")}`);
		this.name = "MissingSecretsError";
	}
}

/**
 * Read credentials from the environment.
 *
 * Values are opaque and never logged; the error only names what is absent.
 * Empty strings count as absent (CI runners export unset secrets as "").
 */
export function readSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
	const pick = (key: string) => {
		const value = env[key]?.trim();
		return value ? value : undefined;
	};

	const result = SecretsSchema.safeParse({
		GEMINI_API_KEY: pick("GEMINI_API_KEY"),
		TWITTER_USERNAME: pick("TWITTER_USERNAME"),
		TWITTER_PASSWORD: pick("TWITTER_PASSWORD"),
		NEWSAPI_KEY: pick("NEWSAPI_KEY"),
	});

	if (!result.success) {
		const missing = [...new Set(result.error.issues.map((issue) => issue.path.join(".")))];
		throw new MissingSecretsError(missing);
	}
	return result.data;
}
