import { readFileSync } from "node:fs";
import { Command } from "commander";
import { execa } from "execa";
import * as colors from "yoctocolors";
import {
	AudioDeviceService,
	resolveActiveDevice,
} from "../audio/device-service";
import { loadSettings, SETTINGS_FILE_NAME } from "../config/loader";
import { PreferenceStore } from "../config/preference-store";
import type { Settings } from "../config/schema";
import { isProcessAlive, readPidFile } from "../daemon/pid-file";
import { DaemonStateSchema } from "../shared/ipc-types";
import { isExecutable } from "../utils/file-ops";
import { createCliLogger } from "../utils/logger";

/** True when `command` resolves on PATH; the name is never shell-interpreted. */
export const commandExists = async (command: string): Promise<boolean> => {
	try {
		await execa("which", [command]);
		return true;
	} catch {
		return false;
	}
};

export const healthCommand = new Command("health")
	.description("Check system health and configuration")
	.action(async () => {
		console.log(`\n${colors.bold(colors.cyan("🔍 Whisper Toggle Health Check"))}`);
		console.log(`${colors.cyan("==============================")}\n`);

		let allOk = true;
		let settings: Settings | undefined;

		console.log(colors.bold("--- Configuration ---"));
		try {
			settings = loadSettings();
			console.log(
				`${colors.green("✅")} Settings loaded from ${colors.dim(`${settings.home}/${SETTINGS_FILE_NAME}`)}`,
			);
		} catch (e) {
			console.log(
				`${colors.red("❌")} Settings Error:`,
				colors.red(e instanceof Error ? e.message : String(e)),
			);
			allOk = false;
		}

		if (settings) {
			console.log(`\n${colors.bold("--- Pipeline ---")}`);
			const { binaryPath } = settings.transcriber;
			if (await isExecutable(binaryPath)) {
				console.log(
					`${colors.green("✅")} Transcriber found at ${colors.dim(binaryPath)}`,
				);
			} else {
				console.log(
					`${colors.red("❌")} Transcriber missing or not executable: ${colors.bold(binaryPath)}`,
				);
				allOk = false;
			}

			if (await commandExists(settings.typer.command)) {
				console.log(
					`${colors.green("✅")} Typing tool found (${settings.typer.command})`,
				);
			} else {
				console.log(
					`${colors.red("❌")} Typing tool not found on PATH: ${colors.bold(settings.typer.command)}`,
				);
				allOk = false;
			}

			if (!(await commandExists("notify-send"))) {
				console.log(
					`${colors.yellow("⚠️  libnotify missing (notifications may not work)")}`,
				);
			}

			console.log(`\n${colors.bold("--- Audio Devices ---")}`);
			const logger = createCliLogger();
			const catalog = await new AudioDeviceService(
				{
					binaryPath,
					listDevicesFlag: settings.transcriber.listDevicesFlag,
					retries: settings.behavior.deviceListRetries,
				},
				logger,
			).detect();
			const preferred = await new PreferenceStore(
				settings.paths.preferenceFile,
				logger,
			).load();

			if (catalog.size > 0) {
				console.log(
					`${colors.green("✅")} ${colors.bold(String(catalog.size))} audio devices found`,
				);
			} else {
				console.log(`${colors.red("❌")} No audio devices found`);
				allOk = false;
			}

			if (preferred < 0) {
				console.log(`${colors.blue("ℹ️")}  Using default system microphone`);
			} else if (resolveActiveDevice(preferred, catalog) === preferred) {
				console.log(
					`${colors.green("✅")} Preferred device found: ${colors.cyan(catalog.get(preferred) ?? String(preferred))}`,
				);
			} else {
				console.log(
					`${colors.yellow("⚠️")}  Preferred device ${colors.bold(String(preferred))} not available, the default will be used`,
				);
			}

			console.log(`\n${colors.bold("--- Daemon Status ---")}`);
			const pid = await readPidFile(settings.paths.pidFile);
			if (pid === null) {
				console.log(`${colors.blue("ℹ️")}  Daemon is not running`);
			} else if (!isProcessAlive(pid)) {
				console.log(
					`${colors.yellow("⚠️  Daemon PID file exists but process is dead")}`,
				);
			} else {
				console.log(
					`${colors.green("✅")} Daemon is running (${colors.dim(`PID: ${pid}`)})`,
				);
				try {
					const state = DaemonStateSchema.safeParse(
						JSON.parse(readFileSync(settings.paths.stateFile, "utf-8")),
					);
					if (state.success) {
						const statusColor =
							state.data.status === "transcribing" ? colors.red : colors.green;
						console.log(
							`${colors.green("✅")} Daemon State: ${statusColor(state.data.status.toUpperCase())}`,
						);
						if (state.data.lastError) {
							console.log(
								`${colors.yellow("⚠️")}  Last Daemon Error: ${colors.red(state.data.lastError)}`,
							);
						}
					}
				} catch {
					console.log(`${colors.blue("ℹ️")}  Daemon state not published yet`);
				}
			}
		}

		console.log(`\n${colors.cyan("------------------------------")}`);
		if (allOk) {
			console.log(
				`${colors.bold(colors.green("✅ System health check passed!"))}`,
			);
		} else {
			console.log(
				`${colors.bold(colors.red("❌ System health check failed. Please check the issues above."))}`,
			);
			process.exitCode = 1;
		}
		console.log(`${colors.cyan("------------------------------")}\n`);
	});
