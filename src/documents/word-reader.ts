import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "word-reader" });

export interface DocumentReader {
	/** Paragraph text of the document, one paragraph per line. */
	readText(filePath: string): Promise<string>;
}

/**
 * Collapse the blank lines mammoth puts between paragraphs.
 */
export function flattenParagraphs(raw: string): string {
	return raw
		.split(/\r?\n/)
		.filter((line) => line.trim().length > 0)
		.join("\n");
}

/**
 * `.docx` reader backed by mammoth, loaded on first use. Resolves to null when
 * the module cannot be loaded; the document strategy then reports no content.
 */
export async function loadWordReader(): Promise<DocumentReader | null> {
	try {
		const { default: mammoth } = await import("mammoth");
		return {
			async readText(filePath: string) {
				const result = await mammoth.extractRawText({ path: filePath });
				return flattenParagraphs(result.value);
			},
		};
	} catch (err) {
		logger.warn({ error: formatErrorSafe(err) }, "word document reader unavailable");
		return null;
	}
}
