import {
	chmodSync,
	lstatSync,
	mkdtempSync,
	readdirSync,
	readFileSync,
	rmSync,
	statSync,
	symlinkSync,
	writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileAccessError } from "../lib/errors";
import { readTextFile, writeFileAtomic } from "./fs";

describe("fs helpers", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "changelog-bump-fs-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("writes the content and leaves no temp file", () => {
		const path = join(dir, "CHANGELOG.md");

		writeFileAtomic(path, "first\n");
		writeFileAtomic(path, "second\n");

		expect(readFileSync(path, "utf-8")).toBe("second\n");
		expect(readdirSync(dir)).toEqual(["CHANGELOG.md"]);
	});

	it("writes through a symlink and keeps the link", () => {
		const target = join(dir, "docs-CHANGELOG.md");
		const link = join(dir, "CHANGELOG.md");
		writeFileSync(target, "old\n", "utf-8");
		symlinkSync(target, link);

		writeFileAtomic(link, "new\n");

		expect(lstatSync(link).isSymbolicLink()).toBe(true);
		expect(readFileSync(target, "utf-8")).toBe("new\n");
		expect(readdirSync(dir).sort()).toEqual(["CHANGELOG.md", "docs-CHANGELOG.md"]);
	});

	it("keeps the permission bits of the file it replaces", () => {
		const path = join(dir, "version.sh");
		writeFileSync(path, 'VERSION = "1"\n', "utf-8");
		chmodSync(path, 0o755);

		writeFileAtomic(path, 'VERSION = "2"\n');

		expect(statSync(path).mode & 0o777).toBe(0o755);
		expect(readFileSync(path, "utf-8")).toBe('VERSION = "2"\n');
	});

	it("reports a write into a missing directory", () => {
		const path = join(dir, "missing", "CHANGELOG.md");
		expect(() => writeFileAtomic(path, "x")).toThrow(FileAccessError);
		expect(readdirSync(dir)).toEqual([]);
	});

	it("reads a file as text", () => {
		const path = join(dir, "version.ts");
		writeFileAtomic(path, 'export const VERSION = "1.0.0";\n');
		expect(readTextFile(path, "version file")).toBe(
			'export const VERSION = "1.0.0";\n',
		);
	});

	it("names the file it could not read", () => {
		const path = join(dir, "CHANGELOG.md");
		expect(() => readTextFile(path, "changelog")).toThrow(
			`Could not read changelog at '${path}'`,
		);
	});
});
