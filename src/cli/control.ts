import { isProcessAlive, readPidFile } from "../daemon/pid-file";

export type SignalDaemonResult =
	| { status: "sent"; pid: number }
	| { status: "not-running" }
	| { status: "stale"; pid: number };

export interface SignalDaemonDeps {
	kill: (pid: number, signal: NodeJS.Signals) => void;
	isAlive: (pid: number) => boolean;
}

const defaultDeps: SignalDaemonDeps = {
	kill: (pid, signal) => {
		process.kill(pid, signal);
	},
	isAlive: isProcessAlive,
};

/**
 * Looks up the daemon through its PID file and delivers `signal` to it.
 * A record pointing at a dead process is reported, not removed.
 */
export async function signalDaemon(
	pidFile: string,
	signal: NodeJS.Signals,
	deps: SignalDaemonDeps = defaultDeps,
): Promise<SignalDaemonResult> {
	const pid = await readPidFile(pidFile);
	if (pid === null) {
		return { status: "not-running" };
	}

	if (!deps.isAlive(pid)) {
		return { status: "stale", pid };
	}

	deps.kill(pid, signal);
	return { status: "sent", pid };
}

/** Parses a CLI device argument: an integer, -1 meaning the system default. */
export function parseDeviceArgument(raw: string): number | null {
	const trimmed = raw.trim();
	if (!/^-?\d+$/.test(trimmed)) {
		return null;
	}
	const id = Number(trimmed);
	return Number.isSafeInteger(id) && id >= -1 ? id : null;
}
