/**
 * Process-level unhandled rejection handler for the CLI.
 *
 * - AbortError → suppress (expected while the browser shuts down)
 * - Transient network errors → warn + continue
 * - Anything else → log and exit(1); a run has no state worth keeping alive
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

export type RejectionCategory = "abort" | "transient" | "fatal";

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isTransientNetworkError(err)) return "transient";
	return "fatal";
}

/**
 * Install the unhandled rejection handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const logger = getChildLogger({ module: "unhandled-rejections" });
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;

			case "transient":
				logger.warn(
					{ process: processLabel, category },
					`transient unhandled rejection (continuing): ${formatted}`,
				);
				break;

			default:
				logger.fatal(
					{ process: processLabel, category },
					`unhandled rejection (exiting): ${formatted}`,
				);
				process.exit(1);
		}
	});
}
