import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { RandomSource } from "../content/random.js";
import { pickOne } from "../content/random.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { type FetchImpl, fetchWithDeadline } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import type { NewsProvider } from "../news/newsapi-client.js";

const logger = getChildLogger({ module: "image-download" });

const DEFAULT_MEDIA_DIR = path.join(os.tmpdir(), "postloom-media");

// X accepts images up to 5MB and GIFs up to 15MB
const MAX_IMAGE_BYTES = 15 * 1024 * 1024;

const EXTENSION_BY_MIME: Record<string, string> = {
	"image/jpeg": ".jpg",
	"image/png": ".png",
	"image/gif": ".gif",
	"image/webp": ".webp",
};

/**
 * A downloaded file scoped to one dispatch. `release()` deletes it; calling
 * it again is a no-op.
 */
export type DownloadedImage = {
	readonly path: string;
	release(): Promise<void>;
};

export type DownloadOptions = {
	timeoutMs: number;
	fetchImpl?: FetchImpl;
	mediaDir?: string;
	/** Defaults to the 15MB X accepts for GIFs. */
	maxBytes?: number;
};

type FetchedImage = { ok: boolean; status: number; contentType: string | null; bytes: Buffer | null };

function extensionFor(contentType: string | null): string {
	const mime = contentType?.split(";")[0]?.trim().toLowerCase() ?? "";
	return EXTENSION_BY_MIME[mime] ?? ".jpg";
}

function scopedFile(filePath: string): DownloadedImage {
	let released = false;
	return {
		path: filePath,
		async release() {
			if (released) return;
			released = true;
			try {
				await fs.promises.rm(filePath, { force: true });
				logger.debug({ filePath }, "temp image removed");
			} catch (err) {
				logger.warn({ error: formatErrorSafe(err), filePath }, "could not delete temp image");
			}
		},
	};
}

/**
 * Read a body of at most `maxBytes`. Null once the declared or received size
 * goes over; the rest of the stream is cancelled.
 */
async function readBounded(response: Response, maxBytes: number): Promise<Buffer | null> {
	const declared = Number(response.headers.get("content-length"));
	if (Number.isFinite(declared) && declared > maxBytes) {
		await response.body?.cancel();
		return null;
	}
	if (!response.body) return Buffer.alloc(0);

	const reader = response.body.getReader();
	const chunks: Uint8Array[] = [];
	let total = 0;
	for (;;) {
		const { done, value } = await reader.read();
		if (done) break;
		total += value.byteLength;
		if (total > maxBytes) {
			await reader.cancel();
			return null;
		}
		chunks.push(value);
	}
	return Buffer.concat(chunks);
}

/**
 * Download an image into the media directory. Null on any failure.
 */
export async function downloadImage(
	imageUrl: string,
	options: DownloadOptions,
): Promise<DownloadedImage | null> {
	const dir = options.mediaDir ?? DEFAULT_MEDIA_DIR;
	try {
		const maxBytes = options.maxBytes ?? MAX_IMAGE_BYTES;
		const fetched = await fetchWithDeadline<FetchedImage>(
			imageUrl,
			{ headers: { "User-Agent": "Mozilla/5.0" } },
			options.timeoutMs,
			async (response) => {
				const contentType = response.headers.get("content-type");
				if (!response.ok) {
					await response.body?.cancel();
					return { ok: false, status: response.status, contentType, bytes: null };
				}
				const bytes = await readBounded(response, maxBytes);
				return { ok: true, status: response.status, contentType, bytes };
			},
			options.fetchImpl,
		);
		if (!fetched.ok) {
			logger.error({ status: fetched.status }, "image download returned an error status");
			return null;
		}

		const buffer = fetched.bytes;
		if (!buffer || buffer.length === 0) {
			logger.error({ maxBytes, bytes: buffer?.length }, "image download has an unusable size");
			return null;
		}

		await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
		const name = `${Date.now()}-${crypto.randomBytes(6).toString("hex")}`;
		const filePath = path.join(dir, `${name}${extensionFor(fetched.contentType)}`);
		await fs.promises.writeFile(filePath, buffer, { mode: 0o600 });

		logger.debug({ filePath, bytes: buffer.length }, "image downloaded");
		return scopedFile(filePath);
	} catch (err) {
		logger.error({ error: formatErrorSafe(err) }, "failed to download image");
		return null;
	}
}

/**
 * Find a news image matching `query` and download it. Null when the provider
 * has nothing with an image or the download fails.
 */
export async function fetchAttachmentImage(options: {
	news: NewsProvider;
	query: string;
	random: RandomSource;
	download: DownloadOptions;
}): Promise<DownloadedImage | null> {
	const result = await options.news.searchArticles({
		query: options.query,
		pageSize: 20,
		language: "en",
		sortBy: "relevancy",
	});
	if (!result.ok) return null;

	const imageUrls = result.articles.flatMap((a) => (a.imageUrl ? [a.imageUrl] : []));
	const chosen = pickOne(imageUrls, options.random);
	if (!chosen) {
		logger.info({ query: options.query }, "no article with an image for query");
		return null;
	}
	return downloadImage(chosen, options.download);
}
