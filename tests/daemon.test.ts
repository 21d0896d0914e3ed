import { EventEmitter } from "node:events";
import { existsSync } from "node:fs";
import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CommandRunner } from "../src/audio/device-service";
import { loadSettings } from "../src/config/loader";
import { runDaemon } from "../src/daemon/run";
import { DaemonService, type DaemonServiceOptions } from "../src/daemon/service";
import { buildPipelineCommand } from "../src/daemon/supervisor";
import type { Notify } from "../src/output/notification";
import { DaemonStateSchema } from "../src/shared/ipc-types";
import { LineClient } from "./helpers/ipc-client";
import { createFakeProcessTable } from "./helpers/fake-process";
import { createCapturingLogger } from "./helpers/logger";
import { waitUntil } from "./helpers/wait";

const DEVICE_OUTPUT = "0: Built-in Mic\n2: USB Headset\n";

const readState = async (path: string) =>
	DaemonStateSchema.parse(JSON.parse(await readFile(path, "utf-8")));

describe("daemon", () => {
	let home: string;
	let binaryPath: string;

	beforeEach(async () => {
		home = await mkdtemp(join(tmpdir(), "wt-daemon-"));
		await mkdir(join(home, "build"));
		binaryPath = join(home, "build", "transcribe");
		await writeFile(binaryPath, "#!/bin/sh\nexit 0\n");
		await chmod(binaryPath, 0o755);
	});

	afterEach(async () => {
		await rm(home, { recursive: true, force: true });
	});

	const createService = (overrides: Partial<DaemonServiceOptions> = {}) => {
		const settings = loadSettings(home);
		const table = createFakeProcessTable(4000);
		const signalTarget = new EventEmitter();
		const runner = vi.fn<CommandRunner>(async () => ({ stdout: DEVICE_OUTPUT }));
		const notify = vi.fn<Notify>();
		const captured = createCapturingLogger();
		const service = new DaemonService({
			settings,
			logger: captured.logger,
			runner,
			spawn: table.spawn,
			kill: table.kill,
			signalTarget,
			notify,
			...overrides,
		});
		return { service, settings, table, signalTarget, runner, notify, ...captured };
	};

	describe("DaemonService", () => {
		it("starts with the saved preference and records itself", async () => {
			await writeFile(join(home, "config.json"), '{"preferred_device_id": 2}');
			const { service, settings, signalTarget, messages } = createService();

			await service.start();

			expect(service.preferredDeviceId).toBe(2);
			expect(service.activeDeviceId).toBe(2);
			expect([...service.deviceCatalog.keys()]).toEqual([0, 2]);
			expect(await readFile(settings.paths.pidFile, "utf-8")).toBe(
				String(process.pid),
			);
			expect(messages()).toContain("  2: USB Headset (preferred, active)");
			await waitUntil(() => existsSync(settings.paths.stateFile));
			expect(await readState(settings.paths.stateFile)).toMatchObject({
				status: "idle",
				preferredDeviceId: 2,
				activeDeviceId: 2,
				deviceCount: 2,
			});

			signalTarget.emit("SIGTERM");
			await service.run();
		});

		it("falls back to the default device but keeps the preference", async () => {
			await writeFile(join(home, "config.json"), '{"preferred_device_id": 9}');
			const { service, table, signalTarget, settings } = createService();
			await service.start();

			service.enqueue({ type: "toggle" });
			await waitUntil(() => service.state === "transcribing");

			expect(service.preferredDeviceId).toBe(9);
			expect(table.calls[0]?.args[1]).toBe(
				buildPipelineCommand(
					{
						binaryPath: settings.transcriber.binaryPath,
						extraArgs: [],
						captureFlag: "--capture",
						typerCommand: "xdotool",
						typerArgs: settings.typer.args,
					},
					-1,
				),
			);

			signalTarget.emit("SIGTERM");
			await service.run();
		});

		it("toggles the pipeline on SIGUSR1 and notifies", async () => {
			const { service, table, signalTarget, notify } = createService();
			await service.start();

			signalTarget.emit("SIGUSR1");
			await waitUntil(() => service.state === "transcribing");
			expect(table.calls).toHaveLength(1);
			expect(notify).toHaveBeenLastCalledWith(
				"Transcription Started",
				"Listening...",
				"info",
			);

			signalTarget.emit("SIGUSR1");
			await waitUntil(() => service.state === "idle");
			expect(table.signals).toEqual([{ pid: -4000, signal: "SIGTERM" }]);
			expect(notify).toHaveBeenLastCalledWith(
				"Transcription Stopped",
				"Transcription is off.",
				"info",
			);

			signalTarget.emit("SIGINT");
			await service.run();
		});

		it("persists a selected device and re-detects", async () => {
			const { service, settings, runner, signalTarget, messages } =
				createService();
			await service.start();
			expect(runner).toHaveBeenCalledTimes(1);

			service.enqueue({ type: "select-device", deviceId: 0 });
			await waitUntil(() => service.preferredDeviceId === 0);

			expect(runner).toHaveBeenCalledTimes(2);
			expect(service.activeDeviceId).toBe(0);
			expect(JSON.parse(await readFile(settings.paths.preferenceFile, "utf-8"))).toEqual({
				preferred_device_id: 0,
			});
			expect(messages()).toContain("User selected audio device: 0");

			signalTarget.emit("SIGTERM");
			await service.run();
		});

		it("publishes menu and state to a connected shell", async () => {
			const { service, settings, notify, messages } = createService();
			await service.start();

			const shell = await LineClient.connect(settings.paths.socket);
			await shell.waitFor(2);
			expect(messages()).toContain("Tray shell connected");
			expect(shell.messages[0]).toEqual({ type: "hello", version: 1, status: "idle" });
			expect(shell.messages[1]?.type).toBe("menu");

			shell.send({ type: "refresh" });
			await shell.waitFor(4);
			expect(shell.messages[2]?.type).toBe("menu");
			expect(shell.messages[3]).toMatchObject({
				type: "state",
				status: "idle",
				preferredDeviceId: -1,
				activeDeviceId: -1,
			});

			shell.send({ type: "toggle" });
			await waitUntil(() => service.state === "transcribing");
			expect(notify).not.toHaveBeenCalled();

			shell.send({ type: "quit" });
			await service.run();
			await shell.waitFor(6);
			expect(shell.messages.at(-1)).toEqual({ type: "shutdown" });
		});

		it("stops a running pipeline and cleans up on quit", async () => {
			const { service, settings, table, signalTarget, messages } = createService();
			await service.start();
			service.enqueue({ type: "toggle" });
			await waitUntil(() => service.state === "transcribing");

			signalTarget.emit("SIGTERM");
			await service.run();

			expect(table.signals).toEqual([{ pid: -4000, signal: "SIGTERM" }]);
			expect(service.state).toBe("idle");
			expect(existsSync(settings.paths.pidFile)).toBe(false);
			expect(existsSync(settings.paths.stateFile)).toBe(false);
			expect(existsSync(settings.paths.socket)).toBe(false);
			expect(signalTarget.listenerCount("SIGUSR1")).toBe(0);
			expect(messages()).toContain("Received SIGTERM, quitting...");
		});

		it("records a failed start and stays idle", async () => {
			const { service, settings, signalTarget, notify } = createService({
				spawn: () => {
					throw new Error("spawn sh EAGAIN");
				},
			});
			await service.start();

			service.enqueue({ type: "toggle" });
			await waitUntil(() => notify.mock.calls.length > 0);

			expect(service.state).toBe("idle");
			expect(notify).toHaveBeenCalledWith(
				"Error",
				"Failed to start transcription: spawn sh EAGAIN",
				"error",
			);
			await waitUntil(async () => {
				const state = await readState(settings.paths.stateFile).catch(() => null);
				return state?.lastError === "Failed to start transcription: spawn sh EAGAIN";
			});

			signalTarget.emit("SIGTERM");
			await service.run();
		});

		it("refuses to start without the transcriber binary", async () => {
			await rm(binaryPath);
			const { service, settings } = createService();

			await expect(service.start()).rejects.toMatchObject({
				code: "BINARY_MISSING",
			});
			expect(existsSync(settings.paths.pidFile)).toBe(false);
			expect(existsSync(settings.paths.socket)).toBe(false);
		});
	});

	describe("runDaemon", () => {
		it("exits 1 when the binary is missing", async () => {
			await rm(binaryPath);
			const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

			const code = await runDaemon({ home, console: false });

			expect(code).toBe(1);
			expect(existsSync(join(home, "app.pid"))).toBe(false);
			errorSpy.mockRestore();
		});

		it("runs until SIGTERM and exits 0", async () => {
			const table = createFakeProcessTable(5000);
			const signalTarget = new EventEmitter();

			const exitCode = runDaemon({
				home,
				console: false,
				runner: async () => ({ stdout: DEVICE_OUTPUT }),
				spawn: table.spawn,
				kill: table.kill,
				signalTarget,
				notify: () => undefined,
			});

			await waitUntil(() => existsSync(join(home, "app.pid")));
			signalTarget.emit("SIGUSR1");
			await waitUntil(() => table.calls.length === 1);
			signalTarget.emit("SIGTERM");

			expect(await exitCode).toBe(0);
			expect(table.signals).toEqual([{ pid: -5000, signal: "SIGTERM" }]);
			expect(existsSync(join(home, "app.pid"))).toBe(false);
			expect(existsSync(join(home, "logs"))).toBe(true);
		});
	});
});
