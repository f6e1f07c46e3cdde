import type { EngagementTarget } from "../content/types.js";
import type { RandomSource } from "../content/random.js";
import { sampleWithoutReplacement } from "../content/random.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { sleep } from "../utils.js";
import type { RemoteInteractionSurface, SurfaceElement } from "./surface.js";
import { X_BASE_URL, X_SELECTORS, X_URLS, X_WAITS } from "./x-platform.js";

const logger = getChildLogger({ module: "engagement-discovery" });

export const MAX_SAMPLED_POSTS = 10;

export type DiscoveryOptions = {
	niche: string;
	random: RandomSource;
	/** Pause after the feed appears so more items render. */
	settleMs?: number;
};

function isPromoted(visibleText: string): boolean {
	return visibleText.toLowerCase().includes("promoted");
}

async function extractAuthor(post: SurfaceElement): Promise<string | null> {
	for (const span of await post.findElements(X_SELECTORS.userNameSpan)) {
		const text = (await span.text()).trim();
		if (text.startsWith("@")) {
			const handle = text.replace(/^@+|@+$/g, "");
			return handle || null;
		}
	}
	return null;
}

async function extractFirstText(post: SurfaceElement, selector: string): Promise<string | null> {
	const [element] = await post.findElements(selector);
	if (!element) return null;
	const text = (await element.text()).trim();
	return text || null;
}

async function extractPermalink(post: SurfaceElement): Promise<string | null> {
	const [link] = await post.findElements(X_SELECTORS.statusLink);
	const href = await link?.attribute("href");
	if (!href) return null;
	return new URL(href, X_BASE_URL).toString();
}

/**
 * Read author, body and permalink from one post. Null when any is missing.
 */
export async function extractEngagementTarget(
	post: SurfaceElement,
): Promise<EngagementTarget | null> {
	const author = await extractAuthor(post);
	if (!author) return null;
	const text = await extractFirstText(post, X_SELECTORS.postText);
	if (!text) return null;
	const url = await extractPermalink(post);
	if (!url) return null;
	return { author, text, url };
}

/**
 * Find one post to reply to.
 *
 * Searches the niche (or opens the home feed), samples up to
 * {@link MAX_SAMPLED_POSTS} visible posts without replacement and returns the
 * first non-promoted one whose fields can all be read. Posts outside the
 * sample are never inspected.
 */
export async function findEngagementTarget(
	surface: RemoteInteractionSurface,
	options: DiscoveryOptions,
): Promise<EngagementTarget | null> {
	const niche = options.niche.trim();
	const url = niche ? X_URLS.search(niche) : X_URLS.home;

	let posts: SurfaceElement[];
	try {
		await surface.navigateTo(url);
		await surface.waitForElement(X_SELECTORS.post, X_WAITS.page);
		const settleMs = options.settleMs ?? 2_000;
		if (settleMs > 0) await sleep(settleMs);
		posts = await surface.findElements(X_SELECTORS.post);
	} catch (err) {
		logger.error({ error: formatErrorSafe(err), niche }, "error loading posts for engagement");
		return null;
	}

	const sample = sampleWithoutReplacement(posts, MAX_SAMPLED_POSTS, options.random);
	logger.debug({ available: posts.length, sampled: sample.length }, "sampling posts");

	for (const post of sample) {
		try {
			if (isPromoted(await post.text())) continue;
			const target = await extractEngagementTarget(post);
			if (target) return target;
		} catch (err) {
			logger.debug({ error: formatErrorSafe(err) }, "skipping unreadable post");
		}
	}

	return null;
}
