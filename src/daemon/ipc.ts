import { EventEmitter } from "node:events";
import { existsSync, unlinkSync } from "node:fs";
import {
	createConnection,
	createServer,
	type Server,
	type Socket,
} from "node:net";
import type { Logger } from "pino";
import {
	IPC_PROTOCOL_VERSION,
	type IPCCommand,
	IPCCommandSchema,
	type IPCMessage,
} from "../shared/ipc-types";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";

type StateMessage = Extract<IPCMessage, { type: "state" }>;
type MenuMessage = Extract<IPCMessage, { type: "menu" }>;

/**
 * Local socket the tray shell connects to. Lines are JSON: the daemon pushes
 * state and menu updates, the shell sends commands, which are emitted as
 * `command` events for the control loop. `clientConnected` and
 * `clientDisconnected` carry the client id and the client count after the change.
 */
export class IPCServer extends EventEmitter {
	private server: Server | null = null;
	private clients: Map<number, Socket> = new Map();
	private clientIdCounter = 0;
	private lastState: StateMessage | null = null;
	private lastMenu: MenuMessage | null = null;

	constructor(
		private readonly path: string,
		private readonly logger: Logger,
	) {
		super();
	}

	get clientCount(): number {
		return this.clients.size;
	}

	private async checkAndCleanStaleSocket(): Promise<boolean> {
		if (!existsSync(this.path)) {
			return false;
		}

		return new Promise((resolve) => {
			const testClient = createConnection({ path: this.path });
			const timeout = setTimeout(() => {
				testClient.destroy();
				this.cleanupSocketFile();
				resolve(true);
			}, 1000);

			testClient.on("connect", () => {
				clearTimeout(timeout);
				testClient.destroy();
				resolve(false);
			});

			testClient.on("error", () => {
				clearTimeout(timeout);
				testClient.destroy();
				this.cleanupSocketFile();
				resolve(true);
			});
		});
	}

	private cleanupSocketFile(): void {
		try {
			if (existsSync(this.path)) {
				unlinkSync(this.path);
				this.logger.debug({ path: this.path }, "Cleaned up stale socket file");
			}
		} catch (err) {
			this.logger.warn({ err, path: this.path }, "Failed to cleanup socket file");
		}
	}

	async start(): Promise<void> {
		const wasStale = await this.checkAndCleanStaleSocket();

		if (existsSync(this.path) && !wasStale) {
			throw new AppError(
				"SHELL_UNAVAILABLE",
				formatUserError(ErrorTemplates.DAEMON.SHELL_UNAVAILABLE),
				{ path: this.path },
			);
		}

		return new Promise((resolve, reject) => {
			const server = createServer((socket) => {
				this.handleClientConnection(socket);
			});
			this.server = server;

			server.once("error", (err: NodeJS.ErrnoException) => {
				this.server = null;
				reject(
					new AppError(
						"SHELL_UNAVAILABLE",
						`IPC server failed to start: ${err.message}`,
						{ path: this.path, code: err.code },
					),
				);
			});

			server.listen(this.path, () => {
				this.logger.info({ path: this.path }, "IPC server started");
				resolve();
			});
		});
	}

	async stop(): Promise<void> {
		for (const [clientId, socket] of this.clients) {
			// end first so queued messages (shutdown) reach the client
			socket.end(() => socket.destroy());
			this.logger.debug({ clientId }, "Closed client connection");
		}
		this.clients.clear();

		const server = this.server;
		if (!server) {
			return;
		}

		await new Promise<void>((resolve) => {
			server.close(() => {
				this.cleanupSocketFile();
				this.logger.info("IPC server stopped");
				resolve();
			});
		});
		this.server = null;
	}

	private handleClientConnection(socket: Socket): void {
		const clientId = ++this.clientIdCounter;
		this.clients.set(clientId, socket);

		this.logger.debug({ clientId }, "IPC client connected");
		this.emit("clientConnected", clientId, this.clients.size);

		this.sendToClient(clientId, {
			type: "hello",
			version: IPC_PROTOCOL_VERSION,
			status: this.lastState?.status ?? "idle",
		});
		if (this.lastMenu) {
			this.sendToClient(clientId, this.lastMenu);
		}

		let buffer = "";
		const flushLines = (final: boolean) => {
			const lines = buffer.split("\n");
			buffer = final ? "" : (lines.pop() ?? "");
			for (const line of lines) {
				if (line.trim()) {
					this.handleLine(clientId, line);
				}
			}
		};

		socket.on("data", (chunk) => {
			buffer += chunk.toString();
			flushLines(false);
		});

		socket.on("end", () => flushLines(true));

		socket.on("close", () => {
			this.clients.delete(clientId);
			this.logger.debug({ clientId }, "IPC client disconnected");
			this.emit("clientDisconnected", clientId, this.clients.size);
		});

		socket.on("error", (err) => {
			this.logger.warn({ clientId, err }, "IPC client error");
			this.clients.delete(clientId);
		});
	}

	private handleLine(clientId: number, line: string): void {
		let raw: unknown;
		try {
			raw = JSON.parse(line);
		} catch {
			this.logger.warn({ clientId, line }, "Ignoring malformed IPC message");
			return;
		}

		const result = IPCCommandSchema.safeParse(raw);
		if (!result.success) {
			this.logger.warn(
				{ clientId, issues: result.error.issues.map((i) => i.message) },
				"Ignoring unknown IPC command",
			);
			return;
		}

		const command: IPCCommand = result.data;
		this.logger.debug({ clientId, command }, "Received command from client");
		this.emit("command", command, clientId);
	}

	private sendToClient(clientId: number, message: IPCMessage): boolean {
		const socket = this.clients.get(clientId);
		if (!socket || socket.destroyed) {
			this.clients.delete(clientId);
			return false;
		}

		try {
			socket.write(`${JSON.stringify(message)}\n`);
			return true;
		} catch (err) {
			this.logger.warn({ clientId, err }, "Failed to send message to client");
			this.clients.delete(clientId);
			return false;
		}
	}

	broadcast(message: IPCMessage): void {
		if (message.type === "state") {
			this.lastState = message;
		} else if (message.type === "menu") {
			this.lastMenu = message;
		}

		let successCount = 0;
		for (const clientId of this.clients.keys()) {
			if (this.sendToClient(clientId, message)) {
				successCount++;
			}
		}

		if (this.clients.size > 0) {
			this.logger.debug(
				{ type: message.type, clients: successCount },
				"Broadcast to clients",
			);
		}
	}
}
