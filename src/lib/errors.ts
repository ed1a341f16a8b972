/**
 * Error taxonomy for a release bump.
 *
 * Everything that can abort a run throws one of these, so the CLI can
 * print a message without a stack trace.
 */

export class MissingSectionError extends Error {
	readonly heading: string;

	constructor(heading: string) {
		super(`Changelog has no "${heading}" section`);
		this.name = "MissingSectionError";
		this.heading = heading;
	}
}

export class VersionDeclarationError extends Error {
	readonly declaration: string;
	readonly matches: number;

	constructor(declaration: string, matches: number) {
		super(
			matches === 0
				? `No ${declaration} = "..." declaration found`
				: `Found ${matches} ${declaration} = "..." declarations, expected exactly one`,
		);
		this.name = "VersionDeclarationError";
		this.declaration = declaration;
		this.matches = matches;
	}
}

export class FileAccessError extends Error {
	readonly path: string;

	constructor(message: string, path: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "FileAccessError";
		this.path = path;
	}
}

export class GitCommandError extends Error {
	readonly args: string[];
	readonly stderr: string;

	constructor(args: string[], stderr: string, options?: { cause?: unknown }) {
		const detail = stderr.trim();
		super(
			`Git command failed: git ${args.join(" ")}${detail ? `\n${detail}` : ""}`,
			options,
		);
		this.name = "GitCommandError";
		this.args = args;
		this.stderr = stderr;
	}
}

export class ConfigError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigError";
	}
}

export type ReleaseStep =
	| "write-version-file"
	| "write-changelog"
	| "commit"
	| "tag"
	| "move-branch";

export class ReleaseStepError extends Error {
	readonly step: ReleaseStep;
	readonly completedSteps: ReleaseStep[];

	constructor(
		step: ReleaseStep,
		completedSteps: ReleaseStep[],
		cause: unknown,
	) {
		super(
			`Release step "${step}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		);
		this.name = "ReleaseStepError";
		this.step = step;
		this.completedSteps = [...completedSteps];
	}
}
