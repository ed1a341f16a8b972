/**
 * Changelog section handling
 *
 * Works on the file as a list of lines that keep their own terminators,
 * so joining the list gives back the original bytes.
 */

import { MissingSectionError } from "./errors";

export type ChangelogLines = string[];

export const UNRELEASED_HEADING = "## Unreleased";

const SECTION_MARKER = "## ";
const CATEGORY_MARKER = "### ";

/**
 * Split text into lines, keeping "\n" / "\r\n" on each line
 */
export function splitLines(text: string): ChangelogLines {
	const lines: ChangelogLines = [];
	let start = 0;

	while (start < text.length) {
		const end = text.indexOf("\n", start);
		if (end === -1) {
			lines.push(text.slice(start));
			break;
		}
		lines.push(text.slice(start, end + 1));
		start = end + 1;
	}

	return lines;
}

export function sectionHeading(name: string): string {
	return `${SECTION_MARKER}${name}`;
}

function findHeading(lines: ChangelogLines, heading: string): number {
	const index = lines.findIndex((line) => line.trim() === heading);
	if (index === -1) {
		throw new MissingSectionError(heading);
	}
	return index;
}

function lineEnding(line: string): string {
	if (line.endsWith("\r\n")) return "\r\n";
	return "\n";
}

/**
 * Collect the body of the section under `heading`.
 *
 * The line right after the heading is the blank separator and is skipped.
 * Category headings lose their "### " so the result can go into a tag
 * message without git reading them as comments.
 */
export function extractSection(
	lines: ChangelogLines,
	heading: string = UNRELEASED_HEADING,
): string[] {
	const headingIndex = findHeading(lines, heading);
	const block: string[] = [];

	for (const line of lines.slice(headingIndex + 2)) {
		if (line.startsWith(SECTION_MARKER)) break;

		block.push(
			line.startsWith(CATEGORY_MARKER)
				? line.slice(CATEGORY_MARKER.length)
				: line,
		);
	}

	while (block.length > 0 && block[block.length - 1].trim() === "") {
		block.pop();
	}

	return block;
}

/**
 * Insert a dated `## {version} - {date}` heading below the Unreleased
 * heading. The old Unreleased body ends up under the new heading and
 * the Unreleased section is left empty.
 */
export function rewriteChangelog(
	lines: ChangelogLines,
	version: string,
	date: string,
	heading: string = UNRELEASED_HEADING,
): ChangelogLines {
	const headingIndex = findHeading(lines, heading);
	const headingLine = lines[headingIndex];
	const eol = lineEnding(headingLine);

	const before = lines.slice(0, headingIndex);
	const after = lines.slice(headingIndex + 1);
	// An unterminated heading is the last line of the file
	const terminated = /\r?\n$/.test(headingLine)
		? headingLine
		: `${headingLine}${eol}`;

	return [
		...before,
		terminated,
		eol,
		`${sectionHeading(`${version} - ${date}`)}${eol}`,
		...after,
	];
}

export const extract = (lines: ChangelogLines): string[] =>
	extractSection(lines);

export const rewrite = (
	lines: ChangelogLines,
	version: string,
	date: string,
): ChangelogLines => rewriteChangelog(lines, version, date);
