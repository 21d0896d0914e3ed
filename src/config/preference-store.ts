import type { Logger } from "pino";
import { DEFAULT_DEVICE_ID, type DeviceId } from "../audio/device-service";
import { atomicWriteFile, readFileOrNull } from "../utils/file-ops";
import { PreferenceRecordSchema } from "./schema";

/**
 * Durable record of the preferred capture device. Reads degrade to the
 * system default and writes report failure instead of throwing, so a broken
 * config file never stops the daemon.
 */
export class PreferenceStore {
	constructor(
		private readonly filePath: string,
		private readonly logger: Logger,
	) {}

	get path(): string {
		return this.filePath;
	}

	public async load(): Promise<DeviceId> {
		try {
			const content = await readFileOrNull(this.filePath);
			if (content === null) {
				return DEFAULT_DEVICE_ID;
			}

			const result = PreferenceRecordSchema.safeParse(JSON.parse(content));
			if (!result.success) {
				const issues = result.error.issues
					.map((e) => `${e.path.join(".")}: ${e.message}`)
					.join("; ");
				this.logger.warn(
					{ path: this.filePath, issues },
					"Could not load config: invalid preference record",
				);
				return DEFAULT_DEVICE_ID;
			}

			return result.data.preferred_device_id ?? DEFAULT_DEVICE_ID;
		} catch (err) {
			this.logger.warn({ err, path: this.filePath }, "Could not load config");
			return DEFAULT_DEVICE_ID;
		}
	}

	public async save(deviceId: DeviceId): Promise<boolean> {
		try {
			const record = { preferred_device_id: deviceId };
			await atomicWriteFile(this.filePath, JSON.stringify(record, null, 2));
			return true;
		} catch (err) {
			this.logger.warn({ err, path: this.filePath }, "Could not save config");
			return false;
		}
	}
}
