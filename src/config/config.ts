import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "./path.js";

export const ACTION_MODES = [
	"strategic_mix",
	"reply_only",
	"post_only_controversy",
	"post_only_news",
	"post_only_word",
] as const;

export type ActionMode = (typeof ACTION_MODES)[number];

export const GEMINI_OPENAI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

// Older config files use snake_case keys at the top level.
const RUN_KEY_ALIASES: Record<string, string> = {
	action_mode: "actionMode",
	auto_niche: "autoNiche",
	attach_image: "attachImage",
	required_text: "requiredText",
	word_file_path: "wordFilePath",
};

const RUN_KEYS = new Set([
	...Object.keys(RUN_KEY_ALIASES),
	...Object.values(RUN_KEY_ALIASES),
	"niche",
	"tone",
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeRunKeys(input: unknown): unknown {
	if (!isPlainObject(input)) return input;
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(input)) {
		const target = RUN_KEY_ALIASES[key];
		if (target) {
			// camelCase wins when both spellings are present
			if (!(target in input)) out[target] = value;
		} else {
			out[key] = value;
		}
	}
	return out;
}

function liftFlatRunKeys(input: unknown): unknown {
	if (!isPlainObject(input) || "run" in input) return input;
	const run: Record<string, unknown> = {};
	const rest: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(input)) {
		if (RUN_KEYS.has(key)) {
			run[key] = value;
		} else {
			rest[key] = value;
		}
	}
	return Object.keys(run).length > 0 ? { ...rest, run } : input;
}

// Per-run decision settings
const RunConfigSchema = z.object({
	// Unknown modes are tolerated: they select "post" and resolve to no strategy.
	actionMode: z.string().default("strategic_mix"),
	autoNiche: z.boolean().default(false),
	niche: z.string().default(""),
	tone: z.string().default("Thought Leader"),
	attachImage: z.boolean().default(false),
	requiredText: z.string().nullish(),
	wordFilePath: z.string().nullish(),
});

// AI text generation (Gemini through its OpenAI-compatible endpoint)
const AIConfigSchema = z.object({
	model: z.string().default("gemini-1.5-flash"),
	baseUrl: z.string().default(GEMINI_OPENAI_BASE_URL),
	timeoutMs: z.number().int().positive().default(60_000),
});

const NewsConfigSchema = z.object({
	baseUrl: z.string().default("https://newsapi.org"),
	timeoutMs: z.number().int().positive().default(20_000),
});

const BrowserConfigSchema = z.object({
	// Falls back to PUPPETEER_EXECUTABLE_PATH / CHROME_PATH
	executablePath: z.string().optional(),
	headless: z.boolean().default(true),
	windowSize: z
		.string()
		.regex(/^\d+,\d+$/)
		.default("1920,1080"),
	navigationTimeoutMs: z.number().int().positive().default(30_000),
});

const HistoryConfigSchema = z.object({
	persist: z.boolean().default(true),
	limit: z.number().int().positive().default(10),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const PostloomConfigSchema = z.preprocess(
	liftFlatRunKeys,
	z.object({
		run: z.preprocess(normalizeRunKeys, RunConfigSchema.default({})),
		ai: AIConfigSchema.default({}),
		news: NewsConfigSchema.default({}),
		browser: BrowserConfigSchema.default({}),
		history: HistoryConfigSchema.default({}),
		logging: LoggingConfigSchema.optional(),
	}),
);

export type PostloomConfig = z.infer<typeof PostloomConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type AIConfig = z.infer<typeof AIConfigSchema>;
export type NewsConfig = z.infer<typeof NewsConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;
export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

let cachedConfig: PostloomConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Parse a raw config object, applying defaults. Unknown keys are dropped.
 */
export function parseConfig(raw: unknown): PostloomConfig {
	return PostloomConfigSchema.parse(raw ?? {});
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): PostloomConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "EACCES") {
			// No readable config file - use defaults
			return parseConfig({});
		}
		throw err;
	}
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}

