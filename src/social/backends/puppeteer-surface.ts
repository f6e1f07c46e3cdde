import puppeteer, { type Browser, type ElementHandle, type Page } from "puppeteer-core";

import type { BrowserConfig } from "../../config/config.js";
import { withTimeout } from "../../infra/timeout.js";
import { getChildLogger } from "../../logging.js";
import type { RemoteInteractionSurface, SurfaceElement } from "../surface.js";
import { SurfaceError } from "../surface.js";

const logger = getChildLogger({ module: "puppeteer-surface" });

const CLOSE_TIMEOUT_MS = 10_000;

function toSurfaceError(operation: string, err: unknown): SurfaceError {
	if (err instanceof SurfaceError) return err;
	const message = err instanceof Error ? err.message : String(err);
	return new SurfaceError(`${operation} failed: ${message}`, operation, { cause: err });
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (err) {
		throw toSurfaceError(operation, err);
	}
}

class PuppeteerElement implements SurfaceElement {
	constructor(readonly handle: ElementHandle<Element>) {}

	text(): Promise<string> {
		return guard("text", () =>
			this.handle.evaluate((el) =>
				el instanceof HTMLElement ? el.innerText : (el.textContent ?? ""),
			),
		);
	}

	attribute(name: string): Promise<string | null> {
		return guard("attribute", () =>
			this.handle.evaluate((el, attr) => el.getAttribute(attr), name),
		);
	}

	async findElements(selector: string): Promise<SurfaceElement[]> {
		const handles = await guard("findElements", () => this.handle.$$(selector));
		return handles.map((h) => new PuppeteerElement(h));
	}
}

function unwrap(element: SurfaceElement, operation: string): ElementHandle<Element> {
	if (element instanceof PuppeteerElement) return element.handle;
	throw new SurfaceError("element does not belong to this surface", operation);
}

function isPngPath(filePath: string): filePath is `${string}.png` {
	return filePath.endsWith(".png");
}

/**
 * Remote Interaction Surface backed by a headless Chromium-family browser.
 */
export class PuppeteerSurface implements RemoteInteractionSurface {
	constructor(
		private readonly browser: Browser,
		private readonly page: Page,
		private readonly navigationTimeoutMs: number,
	) {}

	async navigateTo(url: string): Promise<void> {
		await guard("navigateTo", () =>
			this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.navigationTimeoutMs }),
		);
	}

	async waitForElement(selector: string, timeoutMs: number): Promise<SurfaceElement> {
		const handle = await guard("waitForElement", () =>
			this.page.waitForSelector(selector, { visible: true, timeout: timeoutMs }),
		);
		if (!handle) {
			throw new SurfaceError(`no element for ${selector}`, "waitForElement");
		}
		return new PuppeteerElement(handle);
	}

	async findElements(selector: string): Promise<SurfaceElement[]> {
		const handles = await guard("findElements", () => this.page.$$(selector));
		return handles.map((h) => new PuppeteerElement(h));
	}

	async sendText(element: SurfaceElement, text: string): Promise<void> {
		const handle = unwrap(element, "sendText");
		await guard("sendText", () => handle.type(text));
	}

	async click(element: SurfaceElement): Promise<void> {
		const handle = unwrap(element, "click");
		await guard("click", () => handle.click());
	}

	async attachFile(element: SurfaceElement, filePath: string): Promise<void> {
		const handle = unwrap(element, "attachFile");
		await guard("attachFile", async () => {
			const input = await handle.toElement("input");
			await input.uploadFile(filePath);
		});
	}

	async currentUrl(): Promise<string> {
		return this.page.url();
	}

	async captureScreenshot(filePath: string): Promise<void> {
		if (!isPngPath(filePath)) {
			throw new SurfaceError("screenshot path must end in .png", "captureScreenshot");
		}
		await guard("captureScreenshot", () => this.page.screenshot({ path: filePath }));
	}

	async quit(): Promise<void> {
		try {
			await withTimeout(this.browser.close(), CLOSE_TIMEOUT_MS, "browser close");
			logger.debug("browser closed");
		} catch (err) {
			logger.warn({ error: String(err) }, "browser did not close cleanly; killing process");
			this.browser.process()?.kill("SIGKILL");
		}
	}
}

function resolveExecutablePath(config: BrowserConfig): string | undefined {
	return (
		config.executablePath ?? process.env.PUPPETEER_EXECUTABLE_PATH ?? process.env.CHROME_PATH
	);
}

/**
 * Start the browser and open one page. Failure here is the run's only
 * fatal condition, so errors propagate as SurfaceError("launch").
 */
export async function launchPuppeteerSurface(config: BrowserConfig): Promise<PuppeteerSurface> {
	const [width, height] = config.windowSize.split(",").map((n) => Number.parseInt(n, 10));
	const executablePath = resolveExecutablePath(config);

	logger.info({ headless: config.headless, executablePath }, "starting browser");
	const browser = await guard("launch", () =>
		puppeteer.launch({
			...(executablePath ? { executablePath } : { channel: "chrome" as const }),
			headless: config.headless,
			args: ["--no-sandbox", "--disable-dev-shm-usage", `--window-size=${width},${height}`],
			defaultViewport: { width, height },
		}),
	);

	try {
		const page = await browser.newPage();
		return new PuppeteerSurface(browser, page, config.navigationTimeoutMs);
	} catch (err) {
		await browser.close();
		throw toSurfaceError("launch", err);
	}
}
