import chalk from "chalk";
import type { Command } from "commander";

import type { CycleResult } from "../agent/runner.js";
import { loadConfig } from "../config/config.js";
import { MissingSecretsError, readSecrets, type Secrets } from "../env.js";
import { getChildLogger } from "../logging.js";

export type RunCommandOptions = {
	every?: string;
};

/**
 * Render a cycle result for the terminal. Returns the exit code it implies.
 */
export function reportCycle(result: CycleResult): number {
	switch (result.kind) {
		case "fatal":
			console.error(chalk.red(`✗ Could not start the browser: ${result.error}`));
			return 1;
		case "login-failed":
			console.error(chalk.red("✗ Login to X failed"));
			return 1;
		case "completed": {
			const { outcome } = result;
			if (outcome.status === "published") {
				console.log(chalk.green(`✓ Published ${outcome.action}`));
				console.log(chalk.gray(outcome.text));
				return 0;
			}
			if (outcome.status === "skipped") {
				console.log(chalk.yellow(`○ Skipped ${outcome.action}: ${outcome.reason}`));
				return 0;
			}
			console.error(chalk.red(`✗ Failed to publish ${outcome.action}: ${outcome.error}`));
			return 1;
		}
	}
}

function parseEveryMinutes(value: string): number | null {
	const minutes = Number.parseInt(value, 10);
	return Number.isFinite(minutes) && minutes >= 1 ? minutes : null;
}

export function registerRunCommand(program: Command): void {
	program
		.command("run")
		.description("Run one publishing cycle (or one every N minutes)")
		.option("--every <minutes>", "Repeat the cycle on a fixed interval")
		.action(async (opts: RunCommandOptions) => {
			const logger = getChildLogger({ module: "cmd-run" });

			const everyMinutes = opts.every === undefined ? null : parseEveryMinutes(opts.every);
			if (opts.every !== undefined && everyMinutes === null) {
				console.error("Error: --every must be a positive integer");
				process.exitCode = 1;
				return;
			}

			let secrets: Secrets;
			try {
				secrets = readSecrets();
			} catch (err) {
				if (err instanceof MissingSecretsError) {
					logger.fatal({ missing: err.missing }, "required secrets are not set");
					console.error(chalk.red(`Error: ${err.message}`));
					process.exitCode = 1;
					return;
				}
				throw err;
			}

			const config = loadConfig();

			// Loaded here so its module loggers pick up --config/--verbose.
			const { AgentRunner } = await import("../agent/runner.js");
			const { loadRecentPublished, recordPublished } = await import(
				"../storage/history-store.js"
			);

			let initialHistory: string[] = [];
			if (config.history.persist) {
				try {
					initialHistory = loadRecentPublished(config.history.limit).map((r) => r.text);
				} catch (err) {
					logger.warn({ error: String(err) }, "could not load published history");
				}
			}

			const runner = new AgentRunner({
				config,
				secrets,
				initialHistory,
				onPublished: config.history.persist
					? (item) =>
							recordPublished({ kind: item.action, text: item.text, publishedAt: item.publishedAt })
					: undefined,
			});

			if (everyMinutes === null) {
				process.exitCode = reportCycle(await runner.runOnce());
				return;
			}

			const { startCycleScheduler } = await import("../social/scheduler.js");
			console.log(chalk.bold(`Running a cycle every ${everyMinutes} minute(s). Ctrl+C to stop.`));

			await new Promise<void>((resolve) => {
				const scheduler = startCycleScheduler({
					intervalMs: everyMinutes * 60_000,
					onCycle: async () => {
						reportCycle(await runner.runOnce());
					},
				});
				const stop = () => {
					logger.info("stopping; waiting for the running cycle to finish");
					void scheduler.stop().then(() => {
						logger.info("scheduler stopped");
						resolve();
					});
				};
				process.once("SIGINT", stop);
				process.once("SIGTERM", stop);
			});
		});
}
