import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import { type Settings, SettingsFileSchema } from "./schema";

export const DEFAULT_HOME_DIR = join(homedir(), ".config", "whisper-toggle");
export const SETTINGS_FILE_NAME = "settings.json";

/**
 * Resolves the path with ~ expansion. Relative paths are taken from `base`
 * when given, otherwise from the current directory.
 */
export const resolvePath = (path: string, base?: string): string => {
	if (path.startsWith("~")) {
		return join(homedir(), path.slice(1));
	}
	if (base && !isAbsolute(path)) {
		return resolve(base, path);
	}
	return resolve(path);
};

export const resolveHomeDir = (
	env: NodeJS.ProcessEnv = process.env,
): string => {
	const override = env.WHISPER_TOGGLE_HOME?.trim();
	return override ? resolvePath(override) : DEFAULT_HOME_DIR;
};

/**
 * Loads `settings.json` from the home directory and applies defaults.
 * A missing file yields the defaults.
 * @throws {AppError} CORRUPTED for invalid JSON, VALIDATION_FAILED for schema errors
 */
export const loadSettings = (home: string = resolveHomeDir()): Settings => {
	const settingsPath = join(home, SETTINGS_FILE_NAME);
	let fileSettings: unknown = {};

	if (existsSync(settingsPath)) {
		try {
			fileSettings = JSON.parse(readFileSync(settingsPath, "utf-8"));
		} catch (_error) {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED),
				{ settingsPath },
			);
		}
	}

	const result = SettingsFileSchema.safeParse(fileSettings);

	if (!result.success) {
		const errorMessages = result.error.issues
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("\n");
		throw new AppError(
			"VALIDATION_FAILED",
			`Settings validation failed:\n${errorMessages}`,
			{ settingsPath },
		);
	}

	const { transcriber, typer, behavior, paths } = result.data;
	const workDir = resolvePath(transcriber.workDir ?? home, home);

	return {
		home,
		transcriber: {
			...transcriber,
			workDir,
			binaryPath: resolvePath(
				transcriber.binaryPath ?? join("build", "transcribe"),
				workDir,
			),
		},
		typer,
		behavior,
		paths: {
			logs: resolvePath(paths.logs ?? "logs", home),
			pidFile: join(home, "app.pid"),
			stateFile: join(home, "daemon.state"),
			preferenceFile: join(home, "config.json"),
			socket: join(home, "daemon.sock"),
		},
	};
};
