import { relative } from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";
import { loadConfig, type PartialBumpConfig } from "../lib/config";
import { ReleaseStepError } from "../lib/errors";
import { planRelease, type ReleasePlan, runRelease } from "../lib/release";
import {
	createGitVersionControl,
	getCurrentBranch,
	getRepoRoot,
	getStatus,
	isGitRepo,
	tagExists,
} from "../utils/git";
import { createSpinner, STEP_LABELS } from "../utils/ui";

export interface BumpOptions {
	changelog?: string;
	versionFile?: string;
	declaration?: string;
	latestBranch?: string;
	mainBranch?: string;
	remote?: string;
	tagPrefix?: string;
	dryRun?: boolean;
	yes?: boolean;
}

function toOverrides(options: BumpOptions): PartialBumpConfig {
	return {
		changelog: { path: options.changelog },
		versionFile: {
			path: options.versionFile,
			declaration: options.declaration,
		},
		release: {
			latestBranch: options.latestBranch,
			mainBranch: options.mainBranch,
			remote: options.remote,
			tagPrefix: options.tagPrefix,
		},
	};
}

function fail(message: string): never {
	p.cancel(message);
	process.exit(1);
}

function describePlan(plan: ReleasePlan, root: string): string {
	return [
		`update ${relative(root, plan.versionFilePath)}`,
		`date ${relative(root, plan.changelogPath)} as ${plan.version} - ${plan.date}`,
		`commit "${plan.commitMessage}"`,
		`tag ${plan.tagName}`,
		`git branch -f ${plan.latestBranch} HEAD`,
	]
		.map((line, i) => `${i + 1}. ${line}`)
		.join("\n");
}

async function warnAboutStagedChanges(
	root: string,
	plan: ReleasePlan,
): Promise<void> {
	const ownFiles = [plan.changelogPath, plan.versionFilePath].map((path) =>
		relative(root, path),
	);
	const { staged } = await getStatus(root);
	const others = staged.filter((file) => !ownFiles.includes(file));

	if (others.length > 0) {
		const preview = others
			.slice(0, 5)
			.map((f) => `  ${color.dim(f)}`)
			.join("\n");
		const moreCount = others.length - 5;
		p.log.warn(
			`These staged changes will be part of the release commit:\n${preview}${moreCount > 0 ? `\n  ${color.dim(`...and ${moreCount} more`)}` : ""}`,
		);
	}
}

/**
 * Problems that would only surface after the release commit exists
 */
async function findBlockers(
	root: string,
	plan: ReleasePlan,
	currentBranch: string | null,
): Promise<string[]> {
	const blockers: string[] = [];

	if (await tagExists(plan.tagName, root)) {
		blockers.push(`Tag ${plan.tagName} already exists`);
	}
	if (currentBranch === plan.latestBranch) {
		blockers.push(
			`Branch ${plan.latestBranch} is checked out and cannot be moved; switch branches first`,
		);
	}

	return blockers;
}

/**
 * Bump command
 * Flow: plan -> pre-flight checks -> confirm -> version file -> changelog -> commit -> tag -> latest branch
 */
export async function bumpCommand(
	version: string,
	options: BumpOptions,
): Promise<void> {
	p.intro(color.bgMagenta(color.white(" bump ")));

	const inRepo = await isGitRepo();
	if (!inRepo && !options.dryRun) {
		fail("Not a git repository");
	}

	const root = inRepo ? await getRepoRoot() : process.cwd();
	const config = loadConfig({
		projectRoot: root,
		overrides: toOverrides(options),
	});
	const currentBranch = inRepo ? await getCurrentBranch(root) : null;
	const now = new Date();

	let plan: ReleasePlan;
	try {
		plan = planRelease(
			{ version, cwd: root, config, currentBranch },
			now,
		);
	} catch (error) {
		fail(error instanceof Error ? error.message : String(error));
	}

	p.log.info(
		`Version: ${color.dim(plan.previousVersion ?? "?")} -> ${color.cyan(plan.version)}`,
	);
	p.log.info(
		`Tag ${color.cyan(plan.tagName)} message:\n${color.dim(plan.annotation)}`,
	);

	if (plan.changeBlock.length === 0) {
		p.log.warn(`"${config.changelog.section}" section is empty`);
	}

	if (options.dryRun) {
		p.note(describePlan(plan, root), "Would run");
		p.note(plan.pushCommand, "Then publish with");
		p.outro(color.yellow("Dry run: nothing changed"));
		return;
	}

	const blockers = await findBlockers(root, plan, currentBranch);
	if (blockers.length > 0) {
		fail(blockers.join("\n"));
	}

	await warnAboutStagedChanges(root, plan);

	if (!options.yes) {
		const confirmed = await p.confirm({
			message: `Release ${color.cyan(plan.tagName)}?`,
			initialValue: true,
		});

		if (p.isCancel(confirmed) || !confirmed) {
			p.cancel("Aborted");
			process.exit(0);
		}
	}

	const spinner = createSpinner();

	try {
		await runRelease(
			{ version, cwd: root, config, currentBranch, plan },
			{
				vcs: createGitVersionControl({ cwd: root }),
				now: () => now,
				onStep: (step, status) => {
					if (status === "start") {
						spinner.start(STEP_LABELS[step].start);
					} else {
						spinner.stop(STEP_LABELS[step].done);
					}
				},
			},
		);
	} catch (error) {
		if (error instanceof ReleaseStepError) {
			spinner.stop(STEP_LABELS[error.step].start, 2);
			p.log.error(error.message);
			if (error.completedSteps.length > 0) {
				p.log.warn(
					`Already done, not rolled back: ${error.completedSteps.join(", ")}`,
				);
			}
			fail(`Release ${plan.tagName} is incomplete`);
		}
		throw error;
	}

	p.note(plan.pushCommand, "Publish the release");
	p.outro(color.green("Done!"));
}
