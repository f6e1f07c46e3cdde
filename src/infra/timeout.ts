/**
 * Deadlines for service calls and shutdown steps.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type FetchImpl = (input: string | URL, init?: RequestInit) => Promise<Response>;

type Deadline = {
	/** Rejects with a TimeoutError when the deadline passes; never resolves. */
	expired: Promise<never>;
	clear(): void;
};

function hasDeadline(timeoutMs: number): boolean {
	return timeoutMs > 0 && Number.isFinite(timeoutMs);
}

function startDeadline(
	timeoutMs: number,
	label: string,
	onExpire?: (err: TimeoutError) => void,
): Deadline {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const expired = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => {
			const err = new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs);
			onExpire?.(err);
			reject(err);
		}, timeoutMs);
		if (typeof timer === "object" && "unref" in timer) {
			timer.unref();
		}
	});
	return { expired, clear: () => clearTimeout(timer) };
}

/**
 * Settle with `promise` unless `timeoutMs` passes first. The underlying work
 * keeps running after a timeout.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label = "operation"): Promise<T> {
	if (!hasDeadline(timeoutMs)) return promise;

	const deadline = startDeadline(timeoutMs, label);
	return Promise.race([promise, deadline.expired]).finally(deadline.clear);
}

/**
 * Fetch `url` and consume the response with `read`, both under one deadline.
 * When it passes the request is aborted with a TimeoutError as the reason and
 * the call rejects with that error, even if the body never finishes.
 */
export async function fetchWithDeadline<T>(
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
	read: (response: Response) => Promise<T>,
	fetchImpl: FetchImpl = fetch,
): Promise<T> {
	if (!hasDeadline(timeoutMs)) {
		return read(await fetchImpl(url, init));
	}

	const controller = new AbortController();
	const deadline = startDeadline(timeoutMs, "fetch", (err) => controller.abort(err));
	const request = (async () => read(await fetchImpl(url, { ...init, signal: controller.signal })))();

	try {
		return await Promise.race([request, deadline.expired]);
	} finally {
		deadline.clear();
	}
}
