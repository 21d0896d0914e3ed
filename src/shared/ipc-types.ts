import { z } from "zod";
import type { DeviceMenuItem } from "../audio/device-menu";
import type { DeviceId } from "../audio/device-service";
import type { SessionState } from "../daemon/supervisor";

export const IPC_PROTOCOL_VERSION = 1;

export interface DaemonSnapshot {
	status: SessionState;
	preferredDeviceId: DeviceId;
	activeDeviceId: DeviceId;
}

/** Daemon to shell. */
export type IPCMessage =
	| { type: "hello"; version: number; status: SessionState }
	| ({ type: "state"; timestamp: number } & DaemonSnapshot)
	| { type: "menu"; items: DeviceMenuItem[] }
	| { type: "shutdown" };

/** Shell (or CLI) to daemon. */
export const IPCCommandSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("toggle") }),
	z.object({ type: z.literal("quit") }),
	z.object({ type: z.literal("refresh") }),
	z.object({
		type: z.literal("select-device"),
		deviceId: z.number().int().min(-1),
	}),
]);

export type IPCCommand = z.infer<typeof IPCCommandSchema>;

/** Contents of the daemon state file read by `whisper-toggle status`. */
export const DaemonStateSchema = z.object({
	status: z.enum(["idle", "transcribing"]),
	pid: z.number().int(),
	uptime: z.number(),
	preferredDeviceId: z.number().int(),
	activeDeviceId: z.number().int(),
	deviceCount: z.number().int(),
	lastError: z.string().optional(),
});

export type DaemonState = z.infer<typeof DaemonStateSchema>;
