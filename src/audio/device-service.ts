import { execa } from "execa";
import type { Logger } from "pino";
import { logError } from "../utils/logger";
import { withRetry } from "../utils/retry";

/** Capture device index as reported by the transcriber; -1 selects the system default. */
export type DeviceId = number;

export const DEFAULT_DEVICE_ID: DeviceId = -1;

/** Device index to human-readable name. Rebuilt on every detection, never patched. */
export type DeviceCatalog = ReadonlyMap<DeviceId, string>;

export const EMPTY_CATALOG: DeviceCatalog = new Map<DeviceId, string>();

export interface CommandOutput {
	stdout: string;
}

/**
 * Runs an external command and resolves with its output. Must reject on a
 * spawn error or a non-zero exit.
 */
export type CommandRunner = (
	file: string,
	args: readonly string[],
	signal?: AbortSignal,
) => Promise<CommandOutput>;

export const execaRunner: CommandRunner = async (file, args, signal) => {
	const { stdout } = await execa(file, [...args], { cancelSignal: signal });
	return { stdout };
};

const DEVICE_ID_PATTERN = /^\d+$/;

/**
 * Parses `<id>:<name>` lines. The first colon splits id from name, so names
 * may contain colons. Blank lines, lines without a colon and lines whose id
 * is not a non-negative integer are skipped.
 */
export function parseDeviceList(output: string): DeviceCatalog {
	const devices = new Map<DeviceId, string>();

	for (const line of output.split("\n")) {
		if (!line.trim()) continue;

		const separator = line.indexOf(":");
		if (separator === -1) continue;

		const rawId = line.slice(0, separator).trim();
		if (!DEVICE_ID_PATTERN.test(rawId)) continue;

		const id = Number(rawId);
		if (!Number.isSafeInteger(id)) continue;

		devices.set(id, line.slice(separator + 1).trim());
	}

	return devices;
}

/**
 * The device to hand the transcriber: the preference when it is currently
 * present, the system default otherwise. The preference itself is left alone.
 */
export function resolveActiveDevice(
	preferred: DeviceId,
	catalog: DeviceCatalog,
): DeviceId {
	if (preferred >= 0 && catalog.has(preferred)) {
		return preferred;
	}
	return DEFAULT_DEVICE_ID;
}

export function logDeviceStatus(
	logger: Logger,
	catalog: DeviceCatalog,
	preferred: DeviceId,
): void {
	logger.info(`Found ${catalog.size} audio devices:`);
	const active = resolveActiveDevice(preferred, catalog);

	for (const [id, name] of catalog) {
		const markers: string[] = [];
		if (id === preferred) markers.push("preferred");
		if (id === active) markers.push("active");
		const markerText = markers.length > 0 ? ` (${markers.join(", ")})` : "";
		logger.info(`  ${id}: ${name}${markerText}`);
	}

	if (preferred >= 0 && active === DEFAULT_DEVICE_ID) {
		logger.info(
			`  Note: Preferred device ${preferred} not available, using default`,
		);
	}
}

export interface AudioDeviceServiceOptions {
	binaryPath: string;
	listDevicesFlag?: string;
	retries?: number;
	runner?: CommandRunner;
}

const LIST_TIMEOUT_MS = 5000;
const LIST_BACKOFF_MS = 250;

export class AudioDeviceService {
	private readonly binaryPath: string;
	private readonly listDevicesFlag: string;
	private readonly retries: number;
	private readonly runner: CommandRunner;

	constructor(
		options: AudioDeviceServiceOptions,
		private readonly logger: Logger,
	) {
		this.binaryPath = options.binaryPath;
		this.listDevicesFlag = options.listDevicesFlag ?? "--list-devices";
		this.retries = options.retries ?? 1;
		this.runner = options.runner ?? execaRunner;
	}

	/**
	 * Asks the transcriber for its capture devices. Any failure is logged and
	 * yields an empty catalog.
	 */
	public async detect(): Promise<DeviceCatalog> {
		try {
			const { stdout } = await withRetry(
				(signal) =>
					this.runner(this.binaryPath, [this.listDevicesFlag], signal),
				{
					operationName: "List audio devices",
					maxRetries: this.retries,
					backoffs: [LIST_BACKOFF_MS],
					timeout: LIST_TIMEOUT_MS,
					logger: this.logger,
				},
			);
			return parseDeviceList(stdout);
		} catch (error) {
			logError(this.logger, "Error detecting audio devices", error, {
				binary: this.binaryPath,
			});
			return new Map<DeviceId, string>();
		}
	}
}
