import pino, { type Logger } from "pino";

export interface CapturedLine {
	level: number;
	msg: string;
	[key: string]: unknown;
}

export interface CapturingLogger {
	logger: Logger;
	lines: CapturedLine[];
	messages: () => string[];
}

/** Debug-level pino logger that keeps every line in memory. */
export const createCapturingLogger = (): CapturingLogger => {
	const lines: CapturedLine[] = [];
	const logger = pino(
		{ level: "debug", base: undefined, timestamp: false },
		{
			write(line: string) {
				lines.push(JSON.parse(line));
			},
		},
	);
	return { logger, lines, messages: () => lines.map((line) => line.msg) };
};
