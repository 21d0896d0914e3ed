import { createConnection } from "node:net";
import type { IPCCommand } from "../shared/ipc-types";
import { AppError } from "../utils/errors";

const CONNECT_TIMEOUT_MS = 2000;

/**
 * Delivers one command to a running daemon and hangs up. Rejects with
 * NOT_RUNNING when nothing is listening on the socket.
 */
export function sendIPCCommand(
	socketPath: string,
	command: IPCCommand,
	timeoutMs: number = CONNECT_TIMEOUT_MS,
): Promise<void> {
	return new Promise((resolve, reject) => {
		const socket = createConnection({ path: socketPath });

		const timeout = setTimeout(() => {
			socket.destroy();
			reject(
				new AppError("NOT_RUNNING", "Timed out connecting to the daemon", {
					socketPath,
				}),
			);
		}, timeoutMs);

		socket.on("connect", () => {
			clearTimeout(timeout);
			socket.resume();
			socket.end(`${JSON.stringify(command)}\n`, () => resolve());
		});

		socket.on("error", (err: NodeJS.ErrnoException) => {
			clearTimeout(timeout);
			socket.destroy();
			if (err.code === "ECONNREFUSED" || err.code === "ENOENT") {
				reject(
					new AppError("NOT_RUNNING", "The daemon is not running", {
						socketPath,
					}),
				);
			} else {
				reject(err);
			}
		});
	});
}
