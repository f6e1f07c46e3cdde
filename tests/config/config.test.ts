import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, afterEach, describe, expect, it } from "vitest";

import { GEMINI_OPENAI_BASE_URL, loadConfig, parseConfig, resetConfigCache } from "../../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../../src/config/path.js";

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "postloom-config-"));
const configPath = path.join(tempDir, "postloom.json");

afterEach(() => {
	resetConfigCache();
	resetConfigPath();
	fs.rmSync(configPath, { force: true });
});

afterAll(() => {
	fs.rmSync(tempDir, { recursive: true, force: true });
});

describe("parseConfig", () => {
	it("fills every section with defaults", () => {
		const cfg = parseConfig({});

		expect(cfg.run).toEqual({
			actionMode: "strategic_mix",
			autoNiche: false,
			niche: "",
			tone: "Thought Leader",
			attachImage: false,
		});
		expect(cfg.ai).toEqual({
			model: "gemini-1.5-flash",
			baseUrl: GEMINI_OPENAI_BASE_URL,
			timeoutMs: 60_000,
		});
		expect(cfg.news).toEqual({ baseUrl: "https://newsapi.org", timeoutMs: 20_000 });
		expect(cfg.browser).toEqual({
			headless: true,
			windowSize: "1920,1080",
			navigationTimeoutMs: 30_000,
		});
		expect(cfg.history).toEqual({ persist: true, limit: 10 });
		expect(cfg.logging).toBeUndefined();
	});

	it("lifts flat snake_case run keys into the run section", () => {
		const cfg = parseConfig({
			action_mode: "reply_only",
			niche: "Artificial Intelligence",
			required_text: "Posted by Bot",
			attach_image: true,
			history: { limit: 3 },
		});

		expect(cfg.run.actionMode).toBe("reply_only");
		expect(cfg.run.niche).toBe("Artificial Intelligence");
		expect(cfg.run.requiredText).toBe("Posted by Bot");
		expect(cfg.run.attachImage).toBe(true);
		expect(cfg.history.limit).toBe(3);
	});

	it("prefers the camelCase spelling when both are present", () => {
		const cfg = parseConfig({
			run: { action_mode: "reply_only", actionMode: "post_only_news", word_file_path: "notes.docx" },
		});

		expect(cfg.run.actionMode).toBe("post_only_news");
		expect(cfg.run.wordFilePath).toBe("notes.docx");
	});

	it("keeps unknown action modes", () => {
		expect(parseConfig({ run: { actionMode: "post_only_memes" } }).run.actionMode).toBe(
			"post_only_memes",
		);
	});

	it("accepts null for optional text settings", () => {
		const cfg = parseConfig({ required_text: null, word_file_path: null });
		expect(cfg.run.requiredText).toBeNull();
		expect(cfg.run.wordFilePath).toBeNull();
	});

	it("rejects a malformed window size", () => {
		expect(() => parseConfig({ browser: { windowSize: "1920x1080" } })).toThrow();
	});
});

describe("loadConfig", () => {
	it("reads JSON5 from the configured path", () => {
		fs.writeFileSync(
			configPath,
			`{
				// comments and trailing commas are allowed
				run: { actionMode: "post_only_controversy", tone: "Skeptic", },
				logging: { level: "warn" },
			}`,
		);
		setConfigPath(configPath);

		const cfg = loadConfig();

		expect(cfg.run.actionMode).toBe("post_only_controversy");
		expect(cfg.run.tone).toBe("Skeptic");
		expect(cfg.logging).toEqual({ level: "warn" });
	});

	it("returns defaults when the file does not exist", () => {
		setConfigPath(path.join(tempDir, "missing.json"));
		expect(loadConfig().run.actionMode).toBe("strategic_mix");
	});

	it("throws on invalid JSON5", () => {
		fs.writeFileSync(configPath, "{ run: ");
		setConfigPath(configPath);
		expect(() => loadConfig()).toThrow();
	});
});
