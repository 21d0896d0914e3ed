import { z } from "zod";

export const DEFAULT_TYPER_ARGS = ["type", "--clearmodifiers", "--file", "-"];

export const TranscriberSchema = z.object({
	binaryPath: z.string().min(1).optional(),
	workDir: z.string().min(1).optional(),
	captureFlag: z.string().min(1).default("--capture"),
	listDevicesFlag: z.string().min(1).default("--list-devices"),
	extraArgs: z.array(z.string()).default([]),
});

export const TyperSchema = z.object({
	command: z.string().min(1).default("xdotool"),
	args: z.array(z.string()).default(DEFAULT_TYPER_ARGS),
});

export const BehaviorSchema = z.object({
	notifications: z.boolean().default(true),
	stopTimeoutMs: z
		.number()
		.int()
		.positive({ message: "stopTimeoutMs must be a positive number of milliseconds" })
		.default(1000),
	deviceListRetries: z.number().int().min(0).max(5).default(1),
});

export const PathsSchema = z.object({
	logs: z.string().min(1).optional(),
});

export const SettingsFileSchema = z.object({
	transcriber: TranscriberSchema.default({}),
	typer: TyperSchema.default({}),
	behavior: BehaviorSchema.default({}),
	paths: PathsSchema.default({}),
});

export type SettingsFile = z.input<typeof SettingsFileSchema>;

/**
 * Settings after defaults are applied and every path is resolved against the
 * home directory.
 */
export interface Settings {
	home: string;
	transcriber: {
		binaryPath: string;
		workDir: string;
		captureFlag: string;
		listDevicesFlag: string;
		extraArgs: string[];
	};
	typer: {
		command: string;
		args: string[];
	};
	behavior: z.infer<typeof BehaviorSchema>;
	paths: {
		logs: string;
		pidFile: string;
		stateFile: string;
		preferenceFile: string;
		socket: string;
	};
}

/** The persisted preference record. */
export const PreferenceRecordSchema = z.object({
	preferred_device_id: z.number().int().min(-1).optional(),
});
