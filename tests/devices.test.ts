import { describe, expect, it, vi } from "vitest";
import { buildDeviceMenu, REFRESH_LABEL } from "../src/audio/device-menu";
import {
	AudioDeviceService,
	type CommandRunner,
	logDeviceStatus,
	parseDeviceList,
	resolveActiveDevice,
} from "../src/audio/device-service";
import { createCapturingLogger } from "./helpers/logger";

describe("parseDeviceList", () => {
	it("keeps well-formed lines and skips the rest", () => {
		const catalog = parseDeviceList("2: Built-in Mic\n\nbad-line\n5:USB Headset");
		expect([...catalog.entries()]).toEqual([
			[2, "Built-in Mic"],
			[5, "USB Headset"],
		]);
	});

	it("splits on the first colon only", () => {
		const catalog = parseDeviceList("0: hw:1,0 Analog");
		expect(catalog.get(0)).toBe("hw:1,0 Analog");
	});

	it("skips negative and non-numeric ids", () => {
		const catalog = parseDeviceList("-1: Ghost\nabc: Nope\n1.5: Half\n3: Real");
		expect([...catalog.keys()]).toEqual([3]);
	});

	it("lets a later duplicate id win", () => {
		const catalog = parseDeviceList("1: First\n1: Second");
		expect(catalog.size).toBe(1);
		expect(catalog.get(1)).toBe("Second");
	});

	it("returns an empty catalog for empty output", () => {
		expect(parseDeviceList("").size).toBe(0);
	});
});

describe("resolveActiveDevice", () => {
	const catalog = new Map([
		[1, "Mic A"],
		[2, "Mic B"],
	]);

	it("uses the preference when it is present", () => {
		expect(resolveActiveDevice(2, catalog)).toBe(2);
	});

	it("falls back to the default when the preference is absent", () => {
		expect(resolveActiveDevice(3, catalog)).toBe(-1);
	});

	it("returns the default for the default preference", () => {
		expect(resolveActiveDevice(-1, catalog)).toBe(-1);
	});

	it("returns the default against an empty catalog", () => {
		expect(resolveActiveDevice(1, new Map())).toBe(-1);
	});
});

describe("logDeviceStatus", () => {
	it("marks the preferred and active device", () => {
		const { logger, messages } = createCapturingLogger();
		logDeviceStatus(logger, new Map([[1, "Mic A"], [2, "Mic B"]]), 2);
		expect(messages()).toEqual([
			"Found 2 audio devices:",
			"  1: Mic A",
			"  2: Mic B (preferred, active)",
		]);
	});

	it("notes a preference that is not available", () => {
		const { logger, messages } = createCapturingLogger();
		logDeviceStatus(logger, new Map([[1, "Mic A"]]), 4);
		expect(messages()).toEqual([
			"Found 1 audio devices:",
			"  1: Mic A",
			"  Note: Preferred device 4 not available, using default",
		]);
	});
});

describe("AudioDeviceService", () => {
	it("runs the binary with the list flag and parses its output", async () => {
		const { logger } = createCapturingLogger();
		const runner = vi.fn<CommandRunner>(async () => ({
			stdout: "0: Mic\n1: Line In\n",
		}));
		const service = new AudioDeviceService(
			{ binaryPath: "/opt/tr/transcribe", runner },
			logger,
		);

		const catalog = await service.detect();

		expect(catalog.get(0)).toBe("Mic");
		expect(catalog.get(1)).toBe("Line In");
		expect(runner).toHaveBeenCalledTimes(1);
		expect(runner.mock.calls[0]?.[0]).toBe("/opt/tr/transcribe");
		expect(runner.mock.calls[0]?.[1]).toEqual(["--list-devices"]);
	});

	it("returns an empty catalog and logs when listing fails", async () => {
		const { logger, messages } = createCapturingLogger();
		const runner = vi.fn<CommandRunner>(async () => {
			throw new Error("exit code 1");
		});
		const service = new AudioDeviceService(
			{ binaryPath: "/missing", retries: 0, runner },
			logger,
		);

		const catalog = await service.detect();

		expect(catalog.size).toBe(0);
		expect(runner).toHaveBeenCalledTimes(1);
		expect(messages()).toContain("Error detecting audio devices");
	});

	it("retries once before giving up", async () => {
		const { logger, messages } = createCapturingLogger();
		const runner = vi.fn<CommandRunner>(async () => {
			throw new Error("busy");
		});
		const service = new AudioDeviceService(
			{ binaryPath: "/missing", retries: 1, runner },
			logger,
		);

		const catalog = await service.detect();

		expect(catalog.size).toBe(0);
		expect(runner).toHaveBeenCalledTimes(2);
		expect(messages()).toContain("List audio devices attempt 1/2 failed");
	});

	it("recovers when a retry succeeds", async () => {
		const { logger } = createCapturingLogger();
		const runner = vi
			.fn<CommandRunner>()
			.mockRejectedValueOnce(new Error("busy"))
			.mockResolvedValueOnce({ stdout: "7: Webcam" });
		const service = new AudioDeviceService(
			{ binaryPath: "/opt/tr/transcribe", runner },
			logger,
		);

		const catalog = await service.detect();
		expect([...catalog.entries()]).toEqual([[7, "Webcam"]]);
	});
});

describe("buildDeviceMenu", () => {
	it("lists devices, the default entry and refresh", () => {
		const items = buildDeviceMenu(new Map([[0, "Mic"], [3, "USB"]]), 3);
		expect(items).toEqual([
			{ type: "device", deviceId: 0, label: "Mic", checked: false },
			{ type: "device", deviceId: 3, label: "USB ⭐", checked: true },
			{ type: "separator" },
			{ type: "device", deviceId: -1, label: "Use Default Device", checked: false },
			{ type: "separator" },
			{ type: "refresh", label: REFRESH_LABEL },
		]);
	});

	it("checks the default entry when no device is preferred", () => {
		const items = buildDeviceMenu(new Map(), -1);
		expect(items).toEqual([
			{ type: "device", deviceId: -1, label: "Use Default Device ⭐", checked: true },
			{ type: "separator" },
			{ type: "refresh", label: "🔄 Refresh Devices" },
		]);
	});

	it("checks nothing when the preferred device is missing", () => {
		const items = buildDeviceMenu(new Map([[1, "Mic"]]), 9);
		const checked = items.filter(
			(item) => item.type === "device" && item.checked,
		);
		expect(checked).toEqual([]);
	});
});
