/**
 * Remote Interaction Surface: the UI-automation layer the agent drives.
 *
 * The pipeline only depends on this contract; the browser-backed
 * implementation lives in backends/puppeteer-surface.ts. Every operation
 * either completes within its timeout or rejects (normally with SurfaceError).
 */

export interface SurfaceElement {
	/** Visible text of the element. */
	text(): Promise<string>;
	attribute(name: string): Promise<string | null>;
	/** Descendants matching `selector`, in document order. */
	findElements(selector: string): Promise<SurfaceElement[]>;
}

export interface RemoteInteractionSurface {
	navigateTo(url: string): Promise<void>;
	/** First visible match; rejects when nothing appears within `timeoutMs`. */
	waitForElement(selector: string, timeoutMs: number): Promise<SurfaceElement>;
	findElements(selector: string): Promise<SurfaceElement[]>;
	sendText(element: SurfaceElement, text: string): Promise<void>;
	click(element: SurfaceElement): Promise<void>;
	attachFile(element: SurfaceElement, filePath: string): Promise<void>;
	currentUrl(): Promise<string>;
	quit(): Promise<void>;
	/** Optional diagnostic capture; backends without a screen omit it. */
	captureScreenshot?(filePath: string): Promise<void>;
}

export class SurfaceError extends Error {
	constructor(
		message: string,
		public readonly operation: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "SurfaceError";
	}
}
