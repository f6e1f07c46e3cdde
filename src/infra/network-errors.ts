/**
 * Error classification and formatting for calls to external services
 * (AI endpoint, news provider, browser).
 */

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGE_PATTERNS = [
	"fetch failed",
	"network error",
	"socket hang up",
	"other side closed",
	"client network socket disconnected",
	"timed out after",
	"connection error",
];

// infra/timeout and puppeteer both name theirs TimeoutError
const TIMEOUT_ERROR_NAMES = new Set(["TimeoutError"]);

export type ServiceErrorKind = "timeout" | "abort" | "transport";

/**
 * Collect an error and everything reachable through `.cause` / `.errors`.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item || item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null) continue;
		if (typeof val !== "object") {
			candidates.push(val);
			continue;
		}
		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

function readStringField(val: unknown, field: "name" | "code" | "message"): string | null {
	if (typeof val !== "object" || val === null || !(field in val)) return null;
	const raw: unknown = Reflect.get(val, field);
	return typeof raw === "string" ? raw : null;
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	return readStringField(val, "message");
}

export function isTimeoutError(err: unknown): boolean {
	return collectErrorCandidates(err).some((candidate) => {
		const name = readStringField(candidate, "name");
		return name !== null && TIMEOUT_ERROR_NAMES.has(name);
	});
}

/**
 * Check if an error is an AbortError (expected during shutdown / cancellation).
 */
export function isAbortError(err: unknown): boolean {
	return collectErrorCandidates(err).some((candidate) => {
		if (readStringField(candidate, "name") === "AbortError") return true;
		if (readStringField(candidate, "code") === "ABORT_ERR") return true;
		const message = extractMessage(candidate)?.toLowerCase();
		return message?.includes("operation was aborted") ?? false;
	});
}

/**
 * Check if an error (or any error in its cause chain) is a transient network error.
 */
export function isTransientNetworkError(err: unknown): boolean {
	return collectErrorCandidates(err).some((candidate) => {
		const code = readStringField(candidate, "code");
		if (code && TRANSIENT_NETWORK_CODES.has(code)) return true;
		const name = readStringField(candidate, "name");
		if (name && TIMEOUT_ERROR_NAMES.has(name)) return true;
		const message = extractMessage(candidate)?.toLowerCase();
		return message ? TRANSIENT_MESSAGE_PATTERNS.some((p) => message.includes(p)) : false;
	});
}

/**
 * Coarse classification used when reporting a failed service call.
 * Timeouts are checked first: an aborted fetch carries its TimeoutError as the reason.
 */
export function classifyServiceError(err: unknown): ServiceErrorKind {
	if (isTimeoutError(err)) return "timeout";
	if (isAbortError(err)) return "abort";
	return "transport";
}

/**
 * Format an error for logs. URLs are redacted because request URLs to the
 * news provider carry the API key as a query parameter.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redactUrls(msg), maxLength);
		}
		return truncate(redactUrls(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function redactUrls(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
