import { unlink, writeFile } from "node:fs/promises";
import type { Logger } from "pino";
import { isErrnoException } from "../utils/errors";
import { readFileOrNull } from "../utils/file-ops";

export async function writePidFile(
	pidFile: string,
	pid: number = process.pid,
): Promise<void> {
	await writeFile(pidFile, pid.toString());
}

/** The recorded PID, or null when there is no usable record. */
export async function readPidFile(pidFile: string): Promise<number | null> {
	const content = await readFileOrNull(pidFile);
	if (content === null) {
		return null;
	}
	const pid = Number.parseInt(content.trim(), 10);
	return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Best-effort removal: a missing file is fine, anything else is logged and
 * otherwise ignored.
 */
export async function removePidFile(
	pidFile: string,
	logger: Logger,
): Promise<void> {
	try {
		await unlink(pidFile);
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			return;
		}
		logger.warn({ err, pidFile }, "Could not remove PID file");
	}
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: exists but belongs to someone else
		return isErrnoException(err) && err.code === "EPERM";
	}
}
