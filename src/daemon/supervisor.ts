import { type SpawnOptions, spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import type { DeviceId } from "../audio/device-service";
import { AppError, isErrnoException } from "../utils/errors";
import { logError } from "../utils/logger";

export type SessionState = "idle" | "transcribing";

export interface ExitInfo {
	code: number | null;
	signal: NodeJS.Signals | null;
}

/** The part of a spawned child the supervisor relies on. */
export interface PipelineProcess {
	readonly pid?: number;
	once(
		event: "exit",
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnPipeline = (
	command: string,
	args: readonly string[],
	options: SpawnOptions,
) => PipelineProcess;

/** `process.kill` semantics; signal 0 probes for existence. */
export type SignalSender = (pid: number, signal: NodeJS.Signals | 0) => void;

export type SupervisorResult =
	| { ok: true; state: SessionState }
	| { ok: false; state: SessionState; error: AppError };

export interface PipelineOptions {
	binaryPath: string;
	extraArgs: readonly string[];
	captureFlag: string;
	typerCommand: string;
	typerArgs: readonly string[];
}

export interface SupervisorOptions extends PipelineOptions {
	workDir: string;
	stopTimeoutMs?: number;
	spawn?: SpawnPipeline;
	kill?: SignalSender;
}

interface SupervisedProcess {
	child: PipelineProcess;
	pgid: number;
	exited: Promise<ExitInfo>;
}

export const DEFAULT_STOP_TIMEOUT_MS = 1000;

const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

export const shellQuote = (arg: string): string =>
	SAFE_SHELL_WORD.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;

/**
 * Shell pipeline that runs the transcriber and types each line it prints.
 * The capture selector is only passed for a concrete device.
 */
export function buildPipelineCommand(
	options: PipelineOptions,
	deviceId: DeviceId,
): string {
	const transcriber = [options.binaryPath, ...options.extraArgs];
	if (deviceId >= 0) {
		transcriber.push(options.captureFlag, String(deviceId));
	}
	const typer = [options.typerCommand, ...options.typerArgs];

	return `${transcriber.map(shellQuote).join(" ")} | while IFS= read -r line; do printf '%s ' "$line" | ${typer.map(shellQuote).join(" ")}; done`;
}

const defaultSpawn: SpawnPipeline = (command, args, options) =>
	spawn(command, [...args], options);

const defaultKill: SignalSender = (pid, signal) => {
	process.kill(pid, signal);
};

const waitForExit = (
	exited: Promise<ExitInfo>,
	timeoutMs: number,
): Promise<boolean> => {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const timeout = new Promise<boolean>((resolve) => {
		timer = setTimeout(() => resolve(false), timeoutMs);
	});
	return Promise.race([exited.then(() => true), timeout]).finally(() =>
		clearTimeout(timer),
	);
};

/**
 * Owns the transcription pipeline. The pipeline runs in its own process
 * group so both halves are signalled together; signalling only the shell
 * would leave the typer reading from a dead stream.
 *
 * Emits `stateChange` with the new {@link SessionState}.
 */
export class TranscriptionSupervisor extends EventEmitter {
	private current: SupervisedProcess | null = null;
	private stopping = false;
	private readonly pipeline: PipelineOptions;
	private readonly workDir: string;
	private readonly stopTimeoutMs: number;
	private readonly spawnPipeline: SpawnPipeline;
	private readonly kill: SignalSender;

	constructor(
		options: SupervisorOptions,
		private readonly logger: Logger,
	) {
		super();
		this.pipeline = {
			binaryPath: options.binaryPath,
			extraArgs: options.extraArgs,
			captureFlag: options.captureFlag,
			typerCommand: options.typerCommand,
			typerArgs: options.typerArgs,
		};
		this.workDir = options.workDir;
		this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
		this.spawnPipeline = options.spawn ?? defaultSpawn;
		this.kill = options.kill ?? defaultKill;
	}

	public status(): SessionState {
		return this.current ? "transcribing" : "idle";
	}

	/** Process group of the running pipeline, if any. */
	public get pgid(): number | undefined {
		return this.current?.pgid;
	}

	public async start(deviceId: DeviceId): Promise<SupervisorResult> {
		if (this.current) {
			this.logger.debug(
				{ pgid: this.current.pgid },
				"Transcription already running, ignoring start",
			);
			return { ok: true, state: "transcribing" };
		}

		this.logger.info("Starting transcription...");
		if (deviceId >= 0) {
			this.logger.info(`Using audio device: ${deviceId}`);
		} else {
			this.logger.info("Using default audio device");
		}

		const command = buildPipelineCommand(this.pipeline, deviceId);
		let child: PipelineProcess;
		try {
			child = this.spawnPipeline("sh", ["-c", command], {
				cwd: this.workDir,
				detached: true,
				stdio: "ignore",
			});
		} catch (error) {
			return this.spawnFailed(error, command);
		}

		child.on("error", (err) => {
			logError(this.logger, "Transcription pipeline error", err);
		});

		const pid = child.pid;
		if (pid === undefined) {
			return this.spawnFailed(
				new Error("Pipeline process has no PID"),
				command,
			);
		}

		const exited = new Promise<ExitInfo>((resolve) => {
			child.once("exit", (code, signal) => resolve({ code, signal }));
		});
		const supervised: SupervisedProcess = { child, pgid: pid, exited };
		child.once("exit", (code, signal) =>
			this.handleExit(supervised, { code, signal }),
		);

		this.current = supervised;
		this.logger.info({ pgid: pid }, `Transcription started, PID: ${pid}`);
		this.emit("stateChange", "transcribing");
		return { ok: true, state: "transcribing" };
	}

	/**
	 * SIGTERM to the group, up to `stopTimeoutMs` of grace, then SIGKILL and
	 * an unbounded wait. The wait only sees the shell leader, so members left
	 * behind after it exits are killed as well. Bookkeeping is reset even
	 * when signalling fails.
	 */
	public async stop(): Promise<SupervisorResult> {
		const supervised = this.current;
		if (!supervised) {
			return { ok: true, state: "idle" };
		}

		this.logger.info("Stopping transcription...");
		this.stopping = true;
		const { pgid } = supervised;

		try {
			this.kill(-pgid, "SIGTERM");
			const exited = await waitForExit(supervised.exited, this.stopTimeoutMs);
			if (!exited) {
				this.logger.warn(
					{ pgid, timeoutMs: this.stopTimeoutMs },
					"Transcription ignored SIGTERM, sending SIGKILL",
				);
				this.signalGroup(pgid, "SIGKILL");
				await supervised.exited;
			} else if (this.groupAlive(pgid)) {
				this.logger.warn(
					{ pgid },
					"Transcription group outlived its leader, sending SIGKILL",
				);
				this.signalGroup(pgid, "SIGKILL");
			}
			this.logger.info("Transcription stopped");
			return { ok: true, state: "idle" };
		} catch (error) {
			logError(this.logger, "Error stopping transcription", error, { pgid });
			const message = error instanceof Error ? error.message : String(error);
			return {
				ok: false,
				state: "idle",
				error: new AppError(
					"SIGNAL_FAILED",
					`Failed to stop transcription: ${message}`,
					{ pgid },
				),
			};
		} finally {
			this.current = null;
			this.stopping = false;
			this.emit("stateChange", "idle");
		}
	}

	private groupAlive(pgid: number): boolean {
		try {
			this.kill(-pgid, 0);
			return true;
		} catch (err) {
			// EPERM: a member exists but is not ours to signal
			return !(isErrnoException(err) && err.code === "ESRCH");
		}
	}

	/** Signals the group; a group that has already gone is not an error. */
	private signalGroup(pgid: number, signal: NodeJS.Signals): void {
		try {
			this.kill(-pgid, signal);
		} catch (err) {
			if (isErrnoException(err) && err.code === "ESRCH") {
				return;
			}
			throw err;
		}
	}

	private handleExit(supervised: SupervisedProcess, info: ExitInfo): void {
		if (this.current !== supervised || this.stopping) {
			return;
		}

		this.logger.warn(
			{ pgid: supervised.pgid, code: info.code, signal: info.signal },
			"Transcription pipeline exited unexpectedly",
		);
		this.current = null;
		this.emit("stateChange", "idle");
	}

	private spawnFailed(error: unknown, command: string): SupervisorResult {
		logError(this.logger, "Error starting transcription", error, { command });
		const message = error instanceof Error ? error.message : String(error);
		return {
			ok: false,
			state: "idle",
			error: new AppError(
				"SPAWN_FAILED",
				`Failed to start transcription: ${message}`,
				{ command },
			),
		};
	}
}
