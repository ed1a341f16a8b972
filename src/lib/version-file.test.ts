import { describe, expect, it } from "vitest";
import { VersionDeclarationError } from "./errors";
import {
	patchVersionDeclaration,
	readVersionDeclaration,
} from "./version-file";

describe("patchVersionDeclaration", () => {
	it("replaces the declared version and nothing else", () => {
		const content = '# generated\nVERSION = "1.0.0"\nOTHER = 1\n';
		expect(patchVersionDeclaration(content, "2.0.0")).toBe(
			'# generated\nVERSION = "2.0.0"\nOTHER = 1\n',
		);
	});

	it("patches a TypeScript constant", () => {
		expect(
			patchVersionDeclaration('export const VERSION = "1.0.0";\n', "1.1.0"),
		).toBe('export const VERSION = "1.1.0";\n');
	});

	it("does not touch declarations that only end with the name", () => {
		const content = 'MY_VERSION = "0.1"\nVERSION = "1.0"\n';
		expect(patchVersionDeclaration(content, "1.1")).toBe(
			'MY_VERSION = "0.1"\nVERSION = "1.1"\n',
		);
	});

	it("inserts the version literally", () => {
		expect(patchVersionDeclaration('VERSION = "1"', "1.0.0-$&")).toBe(
			'VERSION = "1.0.0-$&"',
		);
	});

	it("accepts a custom declaration name", () => {
		expect(
			patchVersionDeclaration('__version__ = "0.1.0"\n', "0.2.0", "__version__"),
		).toBe('__version__ = "0.2.0"\n');
	});

	it("accepts a declaration name starting with $", () => {
		const content = '$VERSION = "1.0.0"\nX$VERSION = "9"\n';
		expect(patchVersionDeclaration(content, "1.1.0", "$VERSION")).toBe(
			'$VERSION = "1.1.0"\nX$VERSION = "9"\n',
		);
	});

	it("throws when the declaration is missing", () => {
		const patch = () => patchVersionDeclaration("nothing here\n", "1.0.0");
		expect(patch).toThrow(VersionDeclarationError);
		expect(patch).toThrow('No VERSION = "..." declaration found');
	});

	it("throws when the declaration appears twice", () => {
		const patch = () =>
			patchVersionDeclaration('VERSION = "1"\nVERSION = "2"\n', "3");
		expect(patch).toThrow(
			'Found 2 VERSION = "..." declarations, expected exactly one',
		);
	});
});

describe("readVersionDeclaration", () => {
	it("returns the declared value", () => {
		expect(readVersionDeclaration('export const VERSION = "1.4.2";\n')).toBe(
			"1.4.2",
		);
	});

	it("returns null without a single declaration", () => {
		expect(readVersionDeclaration("")).toBeNull();
		expect(readVersionDeclaration('VERSION = "1"\nVERSION = "2"\n')).toBeNull();
	});
});
