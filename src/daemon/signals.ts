import type { ControlLoop } from "./control-loop";

export const TOGGLE_SIGNAL: NodeJS.Signals = "SIGUSR1";
export const QUIT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface SignalTarget {
	on(event: NodeJS.Signals, listener: () => void): unknown;
	off(event: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Maps OS signals onto control events. The listeners enqueue and return;
 * all real work happens when the loop dispatches. Returns a disposer.
 */
export function installSignalTriggers(
	loop: Pick<ControlLoop, "enqueue">,
	target: SignalTarget = process,
): () => void {
	const listeners = new Map<NodeJS.Signals, () => void>();

	listeners.set(TOGGLE_SIGNAL, () => {
		loop.enqueue({ type: "toggle" });
	});
	for (const signal of QUIT_SIGNALS) {
		listeners.set(signal, () => {
			loop.enqueue({ type: "quit", reason: signal });
		});
	}

	for (const [signal, listener] of listeners) {
		target.on(signal, listener);
	}

	return () => {
		for (const [signal, listener] of listeners) {
			target.off(signal, listener);
		}
	};
}
