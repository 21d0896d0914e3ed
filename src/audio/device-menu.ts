import {
	DEFAULT_DEVICE_ID,
	type DeviceCatalog,
	type DeviceId,
} from "./device-service";

export type DeviceMenuItem =
	| { type: "device"; deviceId: DeviceId; label: string; checked: boolean }
	| { type: "separator" }
	| { type: "refresh"; label: string };

export const PREFERRED_MARKER = " ⭐";
export const DEFAULT_DEVICE_LABEL = "Use Default Device";
export const REFRESH_LABEL = "🔄 Refresh Devices";

/**
 * Menu data for the tray shell: every detected device, then the default
 * device entry, then a refresh entry. Rendering is up to the shell.
 */
export function buildDeviceMenu(
	catalog: DeviceCatalog,
	preferred: DeviceId,
): DeviceMenuItem[] {
	const items: DeviceMenuItem[] = [];

	for (const [deviceId, name] of catalog) {
		const checked = deviceId === preferred;
		items.push({
			type: "device",
			deviceId,
			label: checked ? `${name}${PREFERRED_MARKER}` : name,
			checked,
		});
	}

	if (catalog.size > 0) {
		items.push({ type: "separator" });
	}

	const defaultChecked = preferred === DEFAULT_DEVICE_ID;
	items.push({
		type: "device",
		deviceId: DEFAULT_DEVICE_ID,
		label: defaultChecked
			? `${DEFAULT_DEVICE_LABEL}${PREFERRED_MARKER}`
			: DEFAULT_DEVICE_LABEL,
		checked: defaultChecked,
	});

	items.push({ type: "separator" });
	items.push({ type: "refresh", label: REFRESH_LABEL });

	return items;
}
