import os from "node:os";
import path from "node:path";

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Count characters the way the platform does: by code point, so an emoji
 * or any other astral character counts once.
 */
export function codePointLength(text: string): number {
	return Array.from(text).length;
}

export function sliceCodePoints(text: string, end: number): string {
	return Array.from(text).slice(0, end).join("");
}

/**
 * Data directory for config, logs and the history database.
 * Override with POSTLOOM_DATA_DIR (used by tests and CI runners).
 */
export const CONFIG_DIR = process.env.POSTLOOM_DATA_DIR ?? path.join(os.homedir(), ".postloom");
