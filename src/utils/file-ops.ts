import { constants, existsSync } from "node:fs";
import {
	access,
	mkdir,
	readFile,
	rename,
	stat,
	unlink,
	writeFile,
} from "node:fs/promises";
import { isErrnoException } from "./errors";

export async function atomicWriteFile(
	filePath: string,
	data: string,
	options?: { mode?: number },
): Promise<void> {
	const tmpPath = `${filePath}.tmp-${Date.now()}-${process.pid}`;
	try {
		await writeFile(tmpPath, data, options);
		await rename(tmpPath, filePath);
	} catch (e) {
		await unlink(tmpPath).catch(() => undefined);
		throw e;
	}
}

export async function ensureDir(dir: string, mode = 0o700): Promise<void> {
	if (!existsSync(dir)) {
		await mkdir(dir, { recursive: true, mode });
	}
}

export async function readFileOrNull(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (e) {
		if (isErrnoException(e) && e.code === "ENOENT") return null;
		throw e;
	}
}

export async function isExecutable(filePath: string): Promise<boolean> {
	try {
		const stats = await stat(filePath);
		if (!stats.isFile()) return false;
		await access(filePath, constants.X_OK);
		return true;
	} catch {
		return false;
	}
}
