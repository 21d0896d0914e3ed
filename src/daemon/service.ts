import { unlink, writeFile } from "node:fs/promises";
import type { Logger } from "pino";
import { buildDeviceMenu } from "../audio/device-menu";
import {
	AudioDeviceService,
	type CommandRunner,
	DEFAULT_DEVICE_ID,
	type DeviceCatalog,
	type DeviceId,
	EMPTY_CATALOG,
	logDeviceStatus,
	resolveActiveDevice,
} from "../audio/device-service";
import { PreferenceStore } from "../config/preference-store";
import type { Settings } from "../config/schema";
import { createNotifier, type Notify } from "../output/notification";
import type { DaemonState, IPCCommand } from "../shared/ipc-types";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError, isErrnoException } from "../utils/errors";
import { ensureDir, isExecutable } from "../utils/file-ops";
import { logError } from "../utils/logger";
import { type ControlEvent, ControlLoop } from "./control-loop";
import { IPCServer } from "./ipc";
import { removePidFile, writePidFile } from "./pid-file";
import { installSignalTriggers, type SignalTarget } from "./signals";
import {
	type SessionState,
	type SignalSender,
	type SpawnPipeline,
	TranscriptionSupervisor,
} from "./supervisor";

export interface DaemonServiceOptions {
	settings: Settings;
	logger: Logger;
	runner?: CommandRunner;
	spawn?: SpawnPipeline;
	kill?: SignalSender;
	signalTarget?: SignalTarget;
	notify?: Notify;
}

/**
 * Session coordinator. Owns the preference, the current device catalog and
 * (through the supervisor) the session state; every mutation happens inside
 * a control-loop handler.
 */
export class DaemonService {
	private readonly settings: Settings;
	private readonly logger: Logger;
	private readonly supervisor: TranscriptionSupervisor;
	private readonly devices: AudioDeviceService;
	private readonly preferences: PreferenceStore;
	private readonly ipcServer: IPCServer;
	private readonly loop: ControlLoop;
	private readonly notify: Notify;
	private readonly signalTarget?: SignalTarget;
	private preferred: DeviceId = DEFAULT_DEVICE_ID;
	private catalog: DeviceCatalog = EMPTY_CATALOG;
	private disposeSignals?: () => void;
	private startTime: number = Date.now();
	private lastError?: string;
	private stateWrite: Promise<void> = Promise.resolve();
	private started = false;
	private stopped = false;

	constructor(options: DaemonServiceOptions) {
		const { settings, logger } = options;
		this.settings = settings;
		this.logger = logger;
		this.signalTarget = options.signalTarget;
		this.notify =
			options.notify ?? createNotifier(settings.behavior.notifications, logger);

		this.supervisor = new TranscriptionSupervisor(
			{
				binaryPath: settings.transcriber.binaryPath,
				workDir: settings.transcriber.workDir,
				extraArgs: settings.transcriber.extraArgs,
				captureFlag: settings.transcriber.captureFlag,
				typerCommand: settings.typer.command,
				typerArgs: settings.typer.args,
				stopTimeoutMs: settings.behavior.stopTimeoutMs,
				spawn: options.spawn,
				kill: options.kill,
			},
			logger,
		);
		this.devices = new AudioDeviceService(
			{
				binaryPath: settings.transcriber.binaryPath,
				listDevicesFlag: settings.transcriber.listDevicesFlag,
				retries: settings.behavior.deviceListRetries,
				runner: options.runner,
			},
			logger,
		);
		this.preferences = new PreferenceStore(
			settings.paths.preferenceFile,
			logger,
		);
		this.ipcServer = new IPCServer(settings.paths.socket, logger);
		this.loop = new ControlLoop((event) => this.handleEvent(event), logger);

		this.setupListeners();
	}

	get state(): SessionState {
		return this.supervisor.status();
	}

	get preferredDeviceId(): DeviceId {
		return this.preferred;
	}

	get activeDeviceId(): DeviceId {
		return resolveActiveDevice(this.preferred, this.catalog);
	}

	get deviceCatalog(): DeviceCatalog {
		return this.catalog;
	}

	private setupListeners() {
		this.supervisor.on("stateChange", (state: SessionState) => {
			if (state === "transcribing") {
				this.lastError = undefined;
				this.notifyStateChange("Transcription Started", "Listening...");
			} else {
				this.notifyStateChange("Transcription Stopped", "Transcription is off.");
			}
			this.publishState();
		});

		this.ipcServer.on("command", (command: IPCCommand) => {
			this.loop.enqueue(command);
		});

		this.ipcServer.on("clientConnected", (clientId: number, clients: number) => {
			this.logger.info({ clientId, clients }, "Tray shell connected");
		});
		this.ipcServer.on(
			"clientDisconnected",
			(clientId: number, clients: number) => {
				this.logger.info({ clientId, clients }, "Tray shell disconnected");
			},
		);
	}

	/**
	 * Startup sequence. Fails with BINARY_MISSING or SHELL_UNAVAILABLE before
	 * anything is recorded on disk; everything after that degrades instead.
	 */
	public async start(): Promise<void> {
		const { binaryPath } = this.settings.transcriber;
		if (!(await isExecutable(binaryPath))) {
			this.logger.error({ binaryPath }, `Transcribe binary not found: ${binaryPath}`);
			throw new AppError(
				"BINARY_MISSING",
				formatUserError(ErrorTemplates.DAEMON.BINARY_MISSING(binaryPath)),
				{ binaryPath },
			);
		}

		await ensureDir(this.settings.home);
		await this.ipcServer.start();
		this.started = true;
		this.startTime = Date.now();

		this.preferred = await this.preferences.load();
		await this.detectDevices();

		this.disposeSignals = installSignalTriggers(this.loop, this.signalTarget);

		try {
			await writePidFile(this.settings.paths.pidFile);
		} catch (err) {
			this.logger.warn(
				{ err, pidFile: this.settings.paths.pidFile },
				"Could not write PID file",
			);
		}

		this.publishMenu();
		this.publishState();

		this.logger.info("Whisper transcription daemon started");
		this.logger.info(`PID: ${process.pid}`);
		this.logger.info("Use 'whisper-toggle toggle' to control");
	}

	/** Resolves when a quit has been handled. */
	public run(): Promise<void> {
		return this.loop.run();
	}

	public enqueue(event: ControlEvent): boolean {
		return this.loop.enqueue(event);
	}

	/** Shutdown sequence; safe to call more than once. */
	public async stop(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;

		this.logger.info("Quitting application...");

		if (this.supervisor.status() === "transcribing") {
			await this.supervisor.stop();
		}

		this.disposeSignals?.();
		this.disposeSignals = undefined;

		if (this.started) {
			await removePidFile(this.settings.paths.pidFile, this.logger);
			await this.stateWrite;
			await this.removeStateFile();
			this.ipcServer.broadcast({ type: "shutdown" });
			await this.ipcServer.stop();
		}

		this.logger.info("Daemon stopped");
	}

	private async handleEvent(event: ControlEvent): Promise<void> {
		switch (event.type) {
			case "toggle":
				await this.toggle();
				return;
			case "select-device":
				await this.selectDevice(event.deviceId);
				return;
			case "refresh":
				await this.refreshDevices();
				return;
			case "quit":
				if (event.reason) {
					this.logger.info(`Received ${event.reason}, quitting...`);
				}
				await this.stop();
				return;
		}
	}

	private async toggle(): Promise<void> {
		if (this.supervisor.status() === "transcribing") {
			await this.supervisor.stop();
			return;
		}

		const result = await this.supervisor.start(this.activeDeviceId);
		if (!result.ok) {
			this.lastError = result.error.message;
			this.publishState();
			this.notify("Error", result.error.message, "error");
		}
	}

	private async selectDevice(deviceId: DeviceId): Promise<void> {
		await this.detectDevices();

		this.preferred = deviceId;
		await this.preferences.save(deviceId);
		this.logger.info(`User selected audio device: ${deviceId}`);

		this.publishMenu();
		this.publishState();
	}

	private async refreshDevices(): Promise<void> {
		await this.detectDevices();
		this.publishMenu();
		this.publishState();
	}

	private async detectDevices(): Promise<void> {
		this.catalog = await this.devices.detect();
		logDeviceStatus(this.logger, this.catalog, this.preferred);
	}

	private notifyStateChange(title: string, message: string): void {
		if (this.ipcServer.clientCount > 0) {
			return;
		}
		this.notify(title, message, "info");
	}

	private publishMenu(): void {
		this.ipcServer.broadcast({
			type: "menu",
			items: buildDeviceMenu(this.catalog, this.preferred),
		});
	}

	private publishState(): void {
		if (!this.started || this.stopped) {
			return;
		}

		this.ipcServer.broadcast({
			type: "state",
			status: this.supervisor.status(),
			preferredDeviceId: this.preferred,
			activeDeviceId: this.activeDeviceId,
			timestamp: Date.now(),
		});

		this.stateWrite = this.stateWrite
			.then(() => this.writeStateFile())
			.catch((err) =>
				logError(this.logger, "Failed to update daemon state file", err),
			);
	}

	private async writeStateFile(): Promise<void> {
		const state: DaemonState = {
			status: this.supervisor.status(),
			pid: process.pid,
			uptime: Math.floor((Date.now() - this.startTime) / 1000),
			preferredDeviceId: this.preferred,
			activeDeviceId: this.activeDeviceId,
			deviceCount: this.catalog.size,
			lastError: this.lastError,
		};
		await writeFile(this.settings.paths.stateFile, JSON.stringify(state, null, 2));
		this.logger.debug({ status: state.status }, "Daemon state updated");
	}

	private async removeStateFile(): Promise<void> {
		try {
			await unlink(this.settings.paths.stateFile);
		} catch (err) {
			if (!isErrnoException(err) || err.code !== "ENOENT") {
				this.logger.warn({ err }, "Could not remove daemon state file");
			}
		}
	}
}
