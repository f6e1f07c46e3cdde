import fs from "node:fs";

import type { DocumentReader } from "../../documents/word-reader.js";
import { formatErrorSafe } from "../../infra/network-errors.js";
import { getChildLogger } from "../../logging.js";
import { sliceCodePoints } from "../../utils.js";
import type { ContentPackage, ContentStrategy } from "../types.js";
import { generateStructured, type StrategyBase } from "./shared.js";

const logger = getChildLogger({ module: "document-strategy" });

export const DOCUMENT_PREFIX_CHARS = 4000;
const IMAGE_QUERY_CHARS = 100;

async function fileExists(filePath: string): Promise<boolean> {
	try {
		await fs.promises.access(filePath, fs.constants.R_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * Summarize a local Word document into a post.
 */
export function createDocumentStrategy(
	base: StrategyBase & {
		filePath: string | null | undefined;
		loadReader: () => Promise<DocumentReader | null>;
	},
): ContentStrategy {
	return {
		kind: "document",
		async attempt(): Promise<ContentPackage | null> {
			const filePath = base.filePath?.trim();
			if (!filePath) {
				logger.warn("no document path configured");
				return null;
			}
			if (!(await fileExists(filePath))) {
				logger.warn({ filePath }, "document not found");
				return null;
			}

			const reader = await base.loadReader();
			if (!reader) return null;

			let content: string;
			try {
				content = await reader.readText(filePath);
			} catch (err) {
				logger.error({ error: formatErrorSafe(err), filePath }, "error reading document");
				return null;
			}
			if (!content.trim()) {
				logger.warn({ filePath }, "document has no text");
				return null;
			}

			const generated = await generateStructured(base, {
				kind: "document",
				task: `Create a compelling tweet that captures the main idea of this text:\n---\n${sliceCodePoints(content, DOCUMENT_PREFIX_CHARS)}`,
				niche: "document analysis",
			});
			if (!generated) return null;

			return {
				text: generated.text,
				queryForImage: sliceCodePoints(generated.text, IMAGE_QUERY_CHARS),
			};
		},
	};
}
