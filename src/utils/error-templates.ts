export interface ErrorTemplate {
	message: string;
	action: string;
}

export const ErrorTemplates = {
	DAEMON: {
		BINARY_MISSING: (binaryPath: string) => ({
			message: `Transcription binary not found or not executable: ${binaryPath}`,
			action:
				"Build the transcriber ('make' in its source directory) or point 'transcriber.binaryPath' in ~/.config/whisper-toggle/settings.json at an existing binary.",
		}),
		SHELL_UNAVAILABLE: {
			message: "The tray shell channel could not be started.",
			action:
				"Another instance may already be running. Run 'whisper-toggle status', or remove a stale ~/.config/whisper-toggle/daemon.sock.",
		},
		NOT_RUNNING: {
			message: "The daemon is not running.",
			action: "Start it with 'whisper-toggle start'.",
		},
		ALREADY_RUNNING: (pid: number) => ({
			message: `The daemon is already running (PID: ${pid}).`,
			action: "Use 'whisper-toggle stop' first if you want to restart it.",
		}),
	},

	DEVICES: {
		INVALID_DEVICE_ID: (raw: string) => ({
			message: `Invalid device ID: ${raw}`,
			action:
				"Use a device number from 'whisper-toggle devices', or -1 for the system default.",
		}),
	},

	CONFIG: {
		CORRUPTED: {
			message: "Settings file is corrupted (invalid JSON).",
			action:
				"To reset, delete the file: rm ~/.config/whisper-toggle/settings.json",
		},
	},
};

export const formatUserError = (template: ErrorTemplate): string => {
	return `${template.message}\n\nAction: ${template.action}`;
};
