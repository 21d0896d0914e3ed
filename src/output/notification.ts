import notifier from "node-notifier";
import type { Logger } from "pino";

export type NotificationType = "info" | "success" | "warning" | "error";

export type Notify = (
	title: string,
	message: string,
	type?: NotificationType,
) => void;

const iconMap: Record<NotificationType, string> = {
	info: "dialog-information",
	success: "emblem-default",
	warning: "dialog-warning",
	error: "dialog-error",
};

export const createNotifier = (enabled: boolean, logger: Logger): Notify => {
	return (title, message, type = "info") => {
		if (!enabled) {
			return;
		}

		try {
			notifier.notify({
				title: `Whisper Toggle: ${title}`,
				message,
				icon: iconMap[type],
				sound: type === "error",
				wait: false,
			});

			logger.debug({ title, message, type }, "Notification sent");
		} catch (error) {
			logger.error({ err: error }, "Failed to send notification");
		}
	};
};
