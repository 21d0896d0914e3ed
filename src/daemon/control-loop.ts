import type { Logger } from "pino";
import type { DeviceId } from "../audio/device-service";
import { logError } from "../utils/logger";

export type ControlEvent =
	| { type: "toggle" }
	| { type: "quit"; reason?: string }
	| { type: "select-device"; deviceId: DeviceId }
	| { type: "refresh" };

export type ControlHandler = (event: ControlEvent) => Promise<void>;

/**
 * Serializes every trigger onto one sequence of actions. `enqueue` only
 * records the event; handlers run later, one at a time, in arrival order.
 * Once a `quit` has been handled the loop closes and drops anything left.
 */
export class ControlLoop {
	private readonly queue: ControlEvent[] = [];
	private draining = false;
	private drainScheduled = false;
	private closed = false;
	private readonly finished: Promise<void>;
	private resolveFinished: () => void = () => undefined;

	constructor(
		private readonly handler: ControlHandler,
		private readonly logger: Logger,
	) {
		this.finished = new Promise<void>((resolve) => {
			this.resolveFinished = resolve;
		});
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get pending(): number {
		return this.queue.length;
	}

	public enqueue(event: ControlEvent): boolean {
		if (this.closed) {
			this.logger.debug({ event }, "Control loop closed, dropping event");
			return false;
		}

		this.queue.push(event);
		this.scheduleDrain();
		return true;
	}

	/** Resolves once a quit event has been handled. */
	public run(): Promise<void> {
		return this.finished;
	}

	private scheduleDrain(): void {
		if (this.draining || this.drainScheduled) {
			return;
		}

		this.drainScheduled = true;
		setImmediate(() => {
			this.drainScheduled = false;
			this.drain().catch((err) =>
				logError(this.logger, "Control loop drain failed", err),
			);
		});
	}

	private async drain(): Promise<void> {
		if (this.draining) {
			return;
		}

		this.draining = true;
		try {
			let event = this.queue.shift();
			while (event && !this.closed) {
				await this.dispatch(event);
				if (event.type === "quit") {
					this.close();
					break;
				}
				event = this.queue.shift();
			}
		} finally {
			this.draining = false;
		}
	}

	private async dispatch(event: ControlEvent): Promise<void> {
		this.logger.debug({ event }, "Dispatching control event");
		try {
			await this.handler(event);
		} catch (error) {
			logError(this.logger, `Control event '${event.type}' failed`, error);
		}
	}

	private close(): void {
		this.closed = true;
		if (this.queue.length > 0) {
			this.logger.debug(
				{ dropped: this.queue.length },
				"Dropping events queued after quit",
			);
			this.queue.length = 0;
		}
		this.resolveFinished();
	}
}
