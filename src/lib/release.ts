/**
 * Release publishing
 *
 * Everything is computed up front by planRelease, so a bad changelog or
 * version file aborts before anything on disk changes. runRelease then
 * writes both files and drives version control, stopping at the first
 * failing step. Nothing is rolled back.
 */

import { isAbsolute, relative, resolve } from "node:path";
import type { VersionControl } from "../utils/git";
import { readTextFile, writeFileAtomic } from "../utils/fs";
import {
	extractSection,
	rewriteChangelog,
	sectionHeading,
	splitLines,
} from "./changelog";
import type { BumpConfig } from "./config";
import { formatReleaseDate } from "./date";
import { type ReleaseStep, ReleaseStepError } from "./errors";
import { patchVersionDeclaration, readVersionDeclaration } from "./version-file";

export interface ReleaseOptions {
	version: string;
	/** Directory the configured paths are relative to */
	cwd: string;
	config: BumpConfig;
	/** Branch named in the push reminder when the config leaves it unset */
	currentBranch?: string | null;
	dryRun?: boolean;
	/** Plan already shown to the operator; used instead of re-reading files */
	plan?: ReleasePlan;
}

export interface ReleasePlan {
	version: string;
	previousVersion: string | null;
	date: string;
	tagName: string;
	annotation: string;
	commitMessage: string;
	changeBlock: string[];
	changelogPath: string;
	versionFilePath: string;
	changelogContent: string;
	versionFileContent: string;
	latestBranch: string;
	pushCommand: string;
}

export interface ReleaseResult extends ReleasePlan {
	completedSteps: ReleaseStep[];
	dryRun: boolean;
}

export interface ReleaseDeps {
	vcs: VersionControl;
	now?: () => Date;
	onStep?: (step: ReleaseStep, status: "start" | "done") => void;
}

const FALLBACK_MAIN_BRANCH = "master";

export function formatAnnotation(
	version: string,
	date: string,
	changeBlock: string[],
): string {
	return `Version ${version} - ${date}\n\n${changeBlock.join("")}`;
}

export function formatCommitMessage(template: string, version: string): string {
	return template.split("{version}").join(version);
}

export function formatPushCommand(options: {
	remote: string;
	mainBranch: string;
	latestBranch: string;
	tagName: string;
}): string {
	const { remote, mainBranch, latestBranch, tagName } = options;
	return `git push ${remote} ${mainBranch} ${latestBranch} ${tagName}`;
}

function resolvePath(cwd: string, path: string): string {
	return isAbsolute(path) ? path : resolve(cwd, path);
}

/**
 * Compute every file change and git argument of a release without
 * touching disk or version control.
 */
export function planRelease(options: ReleaseOptions, now: Date): ReleasePlan {
	const { version, cwd, config } = options;
	const date = formatReleaseDate(now);
	const heading = sectionHeading(config.changelog.section);

	const changelogPath = resolvePath(cwd, config.changelog.path);
	const versionFilePath = resolvePath(cwd, config.versionFile.path);

	const lines = splitLines(readTextFile(changelogPath, "changelog"));
	const changeBlock = extractSection(lines, heading);
	const annotation = formatAnnotation(version, date, changeBlock);

	const versionSource = readTextFile(versionFilePath, "version file");
	const { declaration } = config.versionFile;
	const versionFileContent = patchVersionDeclaration(
		versionSource,
		version,
		declaration,
	);

	const changelogContent = rewriteChangelog(
		lines,
		version,
		date,
		heading,
	).join("");

	const tagName = `${config.release.tagPrefix}${version}`;
	const { latestBranch, remote } = config.release;
	const mainBranch =
		config.release.mainBranch ?? options.currentBranch ?? FALLBACK_MAIN_BRANCH;

	return {
		version,
		previousVersion: readVersionDeclaration(versionSource, declaration),
		date,
		tagName,
		annotation,
		commitMessage: formatCommitMessage(config.release.commitMessage, version),
		changeBlock,
		changelogPath,
		versionFilePath,
		changelogContent,
		versionFileContent,
		latestBranch,
		pushCommand: formatPushCommand({
			remote,
			mainBranch,
			latestBranch,
			tagName,
		}),
	};
}

/**
 * Run a release: patch the version file, date the changelog, commit,
 * tag and move the latest branch, in that order.
 */
export async function runRelease(
	options: ReleaseOptions,
	deps: ReleaseDeps,
): Promise<ReleaseResult> {
	const { vcs, now = () => new Date(), onStep } = deps;
	const plan = options.plan ?? planRelease(options, now());

	if (options.dryRun) {
		return { ...plan, completedSteps: [], dryRun: true };
	}

	const completedSteps: ReleaseStep[] = [];

	const perform = async (
		step: ReleaseStep,
		action: () => void | Promise<void>,
	): Promise<void> => {
		onStep?.(step, "start");
		try {
			await action();
		} catch (error) {
			throw new ReleaseStepError(step, completedSteps, error);
		}
		completedSteps.push(step);
		onStep?.(step, "done");
	};

	// git wants paths inside the work tree; keep them relative to cwd
	const stagedFiles = [plan.changelogPath, plan.versionFilePath].map((path) =>
		relative(options.cwd, path),
	);

	await perform("write-version-file", () =>
		writeFileAtomic(plan.versionFilePath, plan.versionFileContent),
	);
	await perform("write-changelog", () =>
		writeFileAtomic(plan.changelogPath, plan.changelogContent),
	);
	await perform("commit", () => vcs.commit(stagedFiles, plan.commitMessage));
	await perform("tag", () => vcs.tag(plan.tagName, plan.annotation));
	await perform("move-branch", () => vcs.moveBranch(plan.latestBranch, "HEAD"));

	return { ...plan, completedSteps, dryRun: false };
}
