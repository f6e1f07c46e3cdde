#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerHistoryCommand } from "./commands/history.js";
import { registerRunCommand } from "./commands/run.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { installUnhandledRejectionHandler } from "./infra/unhandled-rejections.js";
import { closeLogger, getLogger } from "./logging.js";
import { closeDb } from "./storage/db.js";

const program = createProgram();

registerRunCommand(program);
registerHistoryCommand(program);

// --config and --verbose must be applied before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	getLogger();
});

installUnhandledRejectionHandler("postloom");

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino destination and SQLite keep handles open
		closeDb();
		closeLogger();
	});
