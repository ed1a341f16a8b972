import {
	chmodSync,
	existsSync,
	readFileSync,
	realpathSync,
	renameSync,
	rmSync,
	statSync,
	writeFileSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { FileAccessError } from "../lib/errors";

let tempCounter = 0;

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function readTextFile(path: string, label: string): string {
	try {
		return readFileSync(path, "utf-8");
	} catch (error) {
		throw new FileAccessError(
			`Could not read ${label} at '${path}': ${describe(error)}`,
			path,
			{ cause: error },
		);
	}
}

/**
 * Write through a temp file in the same directory, then rename it over
 * the target so readers never see a half-written file. A symlinked target
 * is resolved first and keeps its link; an existing file keeps its mode.
 */
export function writeFileAtomic(path: string, content: string): void {
	const exists = existsSync(path);
	const target = exists ? realpathSync(path) : path;

	tempCounter += 1;
	const tempPath = join(
		dirname(target),
		`.${basename(target)}.${process.pid}.${tempCounter}.tmp`,
	);

	try {
		writeFileSync(tempPath, content, "utf-8");
		if (exists) {
			chmodSync(tempPath, statSync(target).mode & 0o7777);
		}
		renameSync(tempPath, target);
	} catch (error) {
		rmSync(tempPath, { force: true });
		throw new FileAccessError(
			`Could not write '${path}': ${describe(error)}`,
			path,
			{ cause: error },
		);
	}
}
