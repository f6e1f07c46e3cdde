import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

import { flattenParagraphs } from "../../src/documents/word-reader.js";

describe("flattenParagraphs", () => {
	it("drops blank lines between paragraphs", () => {
		expect(flattenParagraphs("First paragraph\n\n\nSecond paragraph\r\n  \r\nThird")).toBe(
			"First paragraph\nSecond paragraph\nThird",
		);
	});

	it("returns an empty string for a document without text", () => {
		expect(flattenParagraphs("\n \n\t\n")).toBe("");
	});
});
