import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

type ResolvedSettings = {
	level: LevelWithSilent;
	// null = stdout
	file: string | null;
};

type Destination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
let cachedDestination: Destination | null = null;

function isLevel(value: string): value is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): ResolvedSettings {
	const cfg: LoggingConfig | undefined = loadConfig().logging;
	const level = normalizeLevel(cfg?.level);
	const file = cfg?.file ?? null;
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	try {
		dest.flushSync();
	} catch {
		// nothing buffered, or stream already closed
	}
	if (dest.fd > 2) {
		dest.end();
	}
}

function ensureLogFile(file: string): void {
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
	}
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination } {
	let destination: Destination;
	if (settings.file) {
		ensureLogFile(settings.file);
		destination = pino.destination({ dest: settings.file, mkdir: true, sync: true });
	} else {
		destination = pino.destination({ dest: 1, sync: true });
	}
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

/**
 * Module-scoped logger. Bound to the root logger current at call time, so
 * modules that log should be loaded after `--config` / `--verbose` are applied.
 */
export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
