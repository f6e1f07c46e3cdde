import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { sleep } from "../utils.js";
import type { RemoteInteractionSurface } from "./surface.js";
import { SurfaceError } from "./surface.js";
import { X_SELECTORS, X_URLS, X_WAITS } from "./x-platform.js";

const logger = getChildLogger({ module: "x-session" });

/** Human-paced delays between UI steps (ms). */
export const DEFAULT_PAUSES = {
	afterTyping: 500,
	trendsSettle: 3_000,
	afterAttach: 10_000,
	beforeSubmit: 1_000,
	afterSubmit: 5_000,
};

export type SessionPauses = typeof DEFAULT_PAUSES;

export type XCredentials = {
	username: string;
	password: string;
};

/**
 * The X web flows the agent needs, expressed as surface operations.
 *
 * Methods reject with the underlying surface error; callers decide whether
 * that is fatal.
 */
export class XSession {
	private readonly pauses: SessionPauses;
	private readonly failureScreenshotPath: string | null;

	constructor(
		private readonly surface: RemoteInteractionSurface,
		options: {
			pauses?: Partial<SessionPauses>;
			/** Where to save a screenshot when login fails; null disables it. */
			failureScreenshotPath?: string | null;
		} = {},
	) {
		this.pauses = { ...DEFAULT_PAUSES, ...options.pauses };
		this.failureScreenshotPath =
			options.failureScreenshotPath === undefined ? "login_error.png" : options.failureScreenshotPath;
	}

	private async pause(step: keyof SessionPauses): Promise<void> {
		const ms = this.pauses[step];
		if (ms > 0) await sleep(ms);
	}

	/**
	 * Username → Next → password → Log in, then wait for the home column.
	 * Returns false (after logging) when any step fails.
	 */
	async login(credentials: XCredentials): Promise<boolean> {
		const { surface } = this;
		logger.info("logging in to X");
		try {
			await surface.navigateTo(X_URLS.login);

			const userInput = await surface.waitForElement(X_SELECTORS.usernameInput, X_WAITS.page);
			await surface.sendText(userInput, credentials.username);
			await this.pause("afterTyping");

			const next = await surface.waitForElement(X_SELECTORS.nextButton, X_WAITS.page);
			await surface.click(next);

			const passInput = await surface.waitForElement(X_SELECTORS.passwordInput, X_WAITS.page);
			await surface.sendText(passInput, credentials.password);
			await this.pause("afterTyping");

			const loginButton = await surface.waitForElement(X_SELECTORS.loginButton, X_WAITS.page);
			await surface.click(loginButton);

			await surface.waitForElement(X_SELECTORS.primaryColumn, X_WAITS.page);
			logger.info("login successful");
			return true;
		} catch (err) {
			logger.error({ error: formatErrorSafe(err) }, "login failed");
			await this.captureFailure();
			return false;
		}
	}

	private async captureFailure(): Promise<void> {
		if (!this.failureScreenshotPath || !this.surface.captureScreenshot) return;
		try {
			await this.surface.captureScreenshot(this.failureScreenshotPath);
			logger.info({ path: this.failureScreenshotPath }, "saved login failure screenshot");
		} catch (err) {
			logger.warn({ error: formatErrorSafe(err) }, "could not save login failure screenshot");
		}
	}

	/**
	 * Text of every non-empty trend cell on the trending tab.
	 */
	async fetchTrends(): Promise<string[]> {
		await this.surface.navigateTo(X_URLS.trending);
		await this.surface.waitForElement(X_SELECTORS.trend, X_WAITS.page);
		await this.pause("trendsSettle");

		const trends: string[] = [];
		for (const cell of await this.surface.findElements(X_SELECTORS.trend)) {
			const text = (await cell.text()).trim();
			if (text) trends.push(text);
		}
		return trends;
	}

	async publishPost(text: string, imagePath?: string | null): Promise<void> {
		const { surface } = this;
		await surface.navigateTo(X_URLS.compose);
		const composer = await surface.waitForElement(X_SELECTORS.composer, X_WAITS.page);

		if (imagePath) {
			const [fileInput] = await surface.findElements(X_SELECTORS.fileInput);
			if (!fileInput) {
				throw new SurfaceError("composer has no file input", "attachFile");
			}
			await surface.attachFile(fileInput, imagePath);
			await this.pause("afterAttach");
		}

		await surface.sendText(composer, text);
		await this.pause("beforeSubmit");

		const submit = await surface.waitForElement(X_SELECTORS.submitButton, X_WAITS.page);
		await surface.click(submit);
		logger.info({ withImage: Boolean(imagePath) }, "post sent");
		await this.pause("afterSubmit");
	}

	async publishReply(postUrl: string, text: string): Promise<void> {
		const { surface } = this;
		await surface.navigateTo(postUrl);

		const replyButton = await surface.waitForElement(X_SELECTORS.replyButton, X_WAITS.page);
		await surface.click(replyButton);

		const composer = await surface.waitForElement(X_SELECTORS.composer, X_WAITS.replyComposer);
		await surface.sendText(composer, text);
		await this.pause("beforeSubmit");

		const submit = await surface.waitForElement(X_SELECTORS.submitButton, X_WAITS.page);
		await surface.click(submit);
		logger.info("reply sent");
		await this.pause("afterSubmit");
	}
}
