import chalk from "chalk";
import type { Command } from "commander";

import { loadConfig } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import { loadRecentPublished } from "../storage/history-store.js";

export function registerHistoryCommand(program: Command): void {
	program
		.command("history")
		.description("Show recently published posts and replies")
		.option("--limit <n>", "Number of entries to show")
		.action((opts: { limit?: string }) => {
			const logger = getChildLogger({ module: "cmd-history" });
			try {
				const limit = opts.limit ? Number.parseInt(opts.limit, 10) : loadConfig().history.limit;
				if (!Number.isFinite(limit) || limit < 1) {
					console.error("Error: --limit must be a positive integer");
					process.exitCode = 1;
					return;
				}

				const records = loadRecentPublished(limit);
				if (records.length === 0) {
					console.log(chalk.gray("Nothing published yet."));
					return;
				}
				for (const record of records) {
					const when = new Date(record.publishedAt).toISOString();
					console.log(`${chalk.gray(when)} ${chalk.bold(record.kind)}`);
					console.log(`  ${record.text.replace(/\n/g, "\n  ")}`);
				}
			} catch (err) {
				logger.error({ error: String(err) }, "history command failed");
				console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
