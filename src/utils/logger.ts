import { existsSync, mkdirSync } from "node:fs";
import pino, { type Logger } from "pino";
import { createStream } from "rotating-file-stream";

export type { Logger } from "pino";

export interface LoggerOptions {
	logDir: string;
	level?: string;
	/** Mirror log lines to stdout. */
	console?: boolean;
}

export interface LoggerHandle {
	logger: Logger;
	close: () => Promise<void>;
}

export const LOG_FILE_PREFIX = "whisper-toggle-";

export const logFileName = (time: number | Date | null, index?: number) => {
	const date = time ? new Date(time) : new Date();
	const dateStr = date.toISOString().split("T")[0];
	return index
		? `${LOG_FILE_PREFIX}${dateStr}.${index}.log`
		: `${LOG_FILE_PREFIX}${dateStr}.log`;
};

/**
 * Creates the session logger: JSON lines into a rotating file (daily, 1 MB,
 * three files kept) and optionally stdout. The returned `close` flushes and
 * ends the file stream; call it once at shutdown.
 */
export const createLogger = (options: LoggerOptions): LoggerHandle => {
	if (!existsSync(options.logDir)) {
		mkdirSync(options.logDir, { recursive: true, mode: 0o700 });
	}

	const rotatingStream = createStream(logFileName, {
		interval: "1d",
		size: "1M",
		maxFiles: 3,
		path: options.logDir,
	});

	const streams =
		(options.console ?? true)
			? [{ stream: rotatingStream }, { stream: pino.destination(1) }]
			: [{ stream: rotatingStream }];

	const logger = pino(
		{
			level: options.level ?? process.env.LOG_LEVEL ?? "info",
			base: {
				pid: process.pid,
			},
			timestamp: pino.stdTimeFunctions.isoTime,
			serializers: {
				err: pino.stdSerializers.err,
				error: pino.stdSerializers.err,
			},
		},
		pino.multistream(streams),
	);

	const close = () =>
		new Promise<void>((resolve) => {
			rotatingStream.end(() => resolve());
		});

	return { logger, close };
};

/** Warnings and errors only, to stderr, for one-shot CLI commands. */
export const createCliLogger = (): Logger =>
	pino({ level: process.env.LOG_LEVEL ?? "warn" }, pino.destination(2));

export const logError = (
	logger: Logger,
	msg: string,
	error?: unknown,
	context?: Record<string, unknown>,
) => {
	const errorObj =
		error instanceof Error
			? error
			: new Error(String(error || "Unknown error"));
	logger.error({ err: errorObj, ...context }, msg);
};
