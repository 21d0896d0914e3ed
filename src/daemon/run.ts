import { loadSettings, resolveHomeDir } from "../config/loader";
import type { Settings } from "../config/schema";
import { AppError } from "../utils/errors";
import { createLogger, logError } from "../utils/logger";
import { DaemonService, type DaemonServiceOptions } from "./service";

export interface RunDaemonOptions
	extends Omit<DaemonServiceOptions, "settings" | "logger"> {
	home?: string;
	/** Mirror logs to stdout. */
	console?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Runs one daemon session in the foreground and resolves with the process
 * exit code: 0 after a normal quit, 1 when a startup precondition fails.
 */
export async function runDaemon(options: RunDaemonOptions = {}): Promise<number> {
	const { home = resolveHomeDir(), console: toConsole, ...overrides } = options;

	let settings: Settings;
	try {
		settings = loadSettings(home);
	} catch (error) {
		console.error(error instanceof AppError ? error.message : String(error));
		return EXIT_FAILURE;
	}

	const { logger, close } = createLogger({
		logDir: settings.paths.logs,
		console: toConsole,
	});

	const service = new DaemonService({ ...overrides, settings, logger });

	try {
		await service.start();
	} catch (error) {
		logError(logger, "Failed to start daemon", error);
		if (error instanceof AppError) {
			console.error(error.message);
		}
		await close();
		return EXIT_FAILURE;
	}

	await service.run();
	await close();
	return EXIT_OK;
}
