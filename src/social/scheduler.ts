import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "cycle-scheduler" });

export const MIN_INTERVAL_MS = 60_000;

export type CycleScheduler = {
	/** Stops the timer; resolves once the cycle in progress, if any, has finished. */
	stop: () => Promise<void>;
};

/**
 * Run `onCycle` now and then every `intervalMs` (at least one minute).
 * A cycle still in progress when the timer fires is not overlapped.
 */
export function startCycleScheduler(options: {
	intervalMs: number;
	onCycle: () => Promise<void>;
}): CycleScheduler {
	const intervalMs = Math.max(options.intervalMs, MIN_INTERVAL_MS);
	let inFlight: Promise<void> | null = null;

	const runCycle = () => {
		if (inFlight) {
			logger.warn("previous cycle still running; skipping");
			return;
		}
		inFlight = (async () => {
			try {
				await options.onCycle();
			} catch (err) {
				logger.error({ error: String(err) }, "scheduled cycle failed");
			} finally {
				inFlight = null;
			}
		})();
	};

	const timer = setInterval(runCycle, intervalMs);

	runCycle();

	return {
		stop: async () => {
			clearInterval(timer);
			await inFlight;
		},
	};
}
