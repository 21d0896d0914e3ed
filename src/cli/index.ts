import { readFileSync } from "node:fs";
import { Command } from "commander";
import * as colors from "yoctocolors";
import {
	AudioDeviceService,
	DEFAULT_DEVICE_ID,
	resolveActiveDevice,
} from "../audio/device-service";
import { loadSettings } from "../config/loader";
import { PreferenceStore } from "../config/preference-store";
import type { Settings } from "../config/schema";
import { sendIPCCommand } from "../daemon/ipc-client";
import { isProcessAlive, readPidFile } from "../daemon/pid-file";
import { runDaemon } from "../daemon/run";
import { DaemonStateSchema } from "../shared/ipc-types";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError, hasErrorCode } from "../utils/errors";
import { createCliLogger } from "../utils/logger";
import { signalDaemon, parseDeviceArgument } from "./control";
import { healthCommand } from "./health";

const program = new Command();

const withSettings = (): Settings | null => {
	try {
		return loadSettings();
	} catch (error) {
		console.error(
			colors.red(error instanceof AppError ? error.message : String(error)),
		);
		process.exitCode = 1;
		return null;
	}
};

const describeDevice = (id: number) =>
	id === DEFAULT_DEVICE_ID ? "system default" : `device ${id}`;

program
	.name("whisper-toggle")
	.description("Tray daemon that toggles a local speech-to-text typing pipeline")
	.version("1.0.0");

program
	.command("start")
	.description("Run the daemon in the foreground")
	.option("--quiet", "Log to the log file only")
	.action(async (options: { quiet?: boolean }) => {
		const settings = withSettings();
		if (!settings) return;

		const pid = await readPidFile(settings.paths.pidFile);
		if (pid !== null && pid !== process.pid && isProcessAlive(pid)) {
			console.error(
				colors.red(formatUserError(ErrorTemplates.DAEMON.ALREADY_RUNNING(pid))),
			);
			process.exit(1);
		}

		const code = await runDaemon({
			home: settings.home,
			console: !options.quiet,
		});
		process.exit(code);
	});

program
	.command("toggle")
	.description("Start or stop transcription in the running daemon")
	.action(async () => {
		const settings = withSettings();
		if (!settings) return;

		const result = await signalDaemon(settings.paths.pidFile, "SIGUSR1");
		if (result.status === "sent") {
			console.log(`Toggled transcription (PID: ${result.pid})`);
			return;
		}

		console.error(colors.red(formatUserError(ErrorTemplates.DAEMON.NOT_RUNNING)));
		process.exitCode = 1;
	});

program
	.command("stop")
	.description("Stop the daemon")
	.action(async () => {
		const settings = withSettings();
		if (!settings) return;

		const result = await signalDaemon(settings.paths.pidFile, "SIGTERM");
		switch (result.status) {
			case "sent":
				console.log(`Stopped daemon (PID: ${result.pid})`);
				return;
			case "stale":
				console.error(
					`Daemon is not running (stale PID file for ${result.pid})`,
				);
				return;
			case "not-running":
				console.error("Daemon is not running (no PID file found)");
				return;
		}
	});

program
	.command("status")
	.description("Show daemon status")
	.action(async () => {
		const settings = withSettings();
		if (!settings) return;

		const pid = await readPidFile(settings.paths.pidFile);
		if (pid === null) {
			console.log("Status: Stopped");
			return;
		}

		if (!isProcessAlive(pid)) {
			console.log("Status: Dead (PID file exists but process is not running)");
			return;
		}

		console.log(`Status: Running (PID: ${pid})`);
		try {
			const raw: unknown = JSON.parse(
				readFileSync(settings.paths.stateFile, "utf-8"),
			);
			const state = DaemonStateSchema.safeParse(raw);
			if (!state.success) return;

			console.log(`State:  ${state.data.status.toUpperCase()}`);
			console.log(`Uptime: ${state.data.uptime}s`);
			console.log(
				`Device: ${describeDevice(state.data.activeDeviceId)} (preferred: ${describeDevice(state.data.preferredDeviceId)}, ${state.data.deviceCount} detected)`,
			);
			if (state.data.lastError) {
				console.log(`Error:  ${state.data.lastError}`);
			}
		} catch {
			console.log(colors.dim("State:  not published yet"));
		}
	});

program
	.command("devices")
	.description("List audio capture devices reported by the transcriber")
	.action(async () => {
		const settings = withSettings();
		if (!settings) return;

		const logger = createCliLogger();
		const deviceService = new AudioDeviceService(
			{
				binaryPath: settings.transcriber.binaryPath,
				listDevicesFlag: settings.transcriber.listDevicesFlag,
				retries: settings.behavior.deviceListRetries,
			},
			logger,
		);
		const preferences = new PreferenceStore(
			settings.paths.preferenceFile,
			logger,
		);

		console.log("Scanning for audio devices...");
		const [catalog, preferred] = await Promise.all([
			deviceService.detect(),
			preferences.load(),
		]);
		const active = resolveActiveDevice(preferred, catalog);

		if (catalog.size === 0) {
			console.log("No audio devices found.");
		} else {
			console.log("\nAvailable Audio Devices:");
			console.log("------------------------");
			for (const [id, name] of catalog) {
				const markers: string[] = [];
				if (id === preferred) markers.push(colors.yellow("preferred"));
				if (id === active) markers.push(colors.green("active"));
				const suffix = markers.length > 0 ? ` (${markers.join(", ")})` : "";
				console.log(`${colors.bold(String(id))}: ${name}${suffix}`);
			}
			console.log("------------------------");
		}

		console.log(`Active: ${describeDevice(active)}`);
		if (preferred >= 0 && active === DEFAULT_DEVICE_ID) {
			console.log(
				colors.dim(
					`Preferred device ${preferred} is not available, using the default.`,
				),
			);
		}
		console.log(
			colors.dim("\nUse 'whisper-toggle select-device <id>' to change it."),
		);
	});

program
	.command("select-device")
	.description("Set the preferred capture device (-1 for the system default)")
	.argument("<id>", "device number from 'whisper-toggle devices'")
	.action(async (rawId: string) => {
		const deviceId = parseDeviceArgument(rawId);
		if (deviceId === null) {
			console.error(
				colors.red(
					formatUserError(ErrorTemplates.DEVICES.INVALID_DEVICE_ID(rawId)),
				),
			);
			process.exitCode = 1;
			return;
		}

		const settings = withSettings();
		if (!settings) return;

		try {
			await sendIPCCommand(settings.paths.socket, {
				type: "select-device",
				deviceId,
			});
			console.log(`Requested ${describeDevice(deviceId)} from the running daemon`);
			return;
		} catch (error) {
			if (!hasErrorCode(error, "NOT_RUNNING")) {
				throw error;
			}
		}

		const saved = await new PreferenceStore(
			settings.paths.preferenceFile,
			createCliLogger(),
		).save(deviceId);
		if (saved) {
			console.log(`Saved preferred ${describeDevice(deviceId)}`);
		} else {
			console.error(colors.red("Failed to save the device preference"));
			process.exitCode = 1;
		}
	});

program
	.command("refresh")
	.description("Ask the running daemon to re-detect audio devices")
	.action(async () => {
		const settings = withSettings();
		if (!settings) return;

		try {
			await sendIPCCommand(settings.paths.socket, { type: "refresh" });
			console.log("Device refresh requested");
		} catch (error) {
			if (!hasErrorCode(error, "NOT_RUNNING")) {
				throw error;
			}
			console.error(colors.red(formatUserError(ErrorTemplates.DAEMON.NOT_RUNNING)));
			process.exitCode = 1;
		}
	});

program.addCommand(healthCommand);

export { program };
