import { VersionDeclarationError } from "./errors";

export const DEFAULT_DECLARATION = "VERSION";

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function declarationPattern(name: string): RegExp {
	// Not preceded by an identifier character, so MY_VERSION is not VERSION
	return new RegExp(`(?<![\\w$])${escapeRegExp(name)} = "([^"\\n]*)"`, "g");
}

/**
 * Replace the value of the single `NAME = "..."` declaration in `content`.
 * Throws when the declaration is missing or appears more than once.
 */
export function patchVersionDeclaration(
	content: string,
	version: string,
	name: string = DEFAULT_DECLARATION,
): string {
	const matches = content.match(declarationPattern(name)) ?? [];

	if (matches.length !== 1) {
		throw new VersionDeclarationError(name, matches.length);
	}

	// Function replacer so "$" in the version is taken literally
	return content.replace(
		declarationPattern(name),
		() => `${name} = "${version}"`,
	);
}

/**
 * Read the current value of the declaration, or null when there is not
 * exactly one.
 */
export function readVersionDeclaration(
	content: string,
	name: string = DEFAULT_DECLARATION,
): string | null {
	const matches = [...content.matchAll(declarationPattern(name))];
	if (matches.length !== 1) return null;

	return matches[0][1];
}
