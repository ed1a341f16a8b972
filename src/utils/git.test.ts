import { describe, expect, it } from "vitest";
import { GitCommandError } from "../lib/errors";
import {
	createGitVersionControl,
	type GitOptions,
	type GitRunner,
	parseStatus,
} from "./git";

function recordingRunner(failOn?: string) {
	const calls: Array<{ args: string[]; options?: GitOptions }> = [];
	const run: GitRunner = async (args, options) => {
		calls.push({ args, options });
		if (args[0] === failOn) {
			throw new GitCommandError(args, `fatal: ${failOn} failed\n`);
		}
		return "";
	};
	return { calls, run };
}

describe("createGitVersionControl", () => {
	it("stages the files before committing them", async () => {
		const { calls, run } = recordingRunner();
		const vcs = createGitVersionControl({ cwd: "/repo", run });

		await vcs.commit(["CHANGELOG.md", "src/version.ts"], "Bump version to 1.2.0");

		expect(calls).toEqual([
			{
				args: ["add", "--", "CHANGELOG.md", "src/version.ts"],
				options: { cwd: "/repo" },
			},
			{
				args: ["commit", "-m", "Bump version to 1.2.0"],
				options: { cwd: "/repo" },
			},
		]);
	});

	it("creates an annotated tag with the message as one argument", async () => {
		const { calls, run } = recordingRunner();
		const vcs = createGitVersionControl({ run });

		await vcs.tag("v1.2.0", 'Version 1.2.0 - 2024-05-01\n\nFixed\n- "quoted"\n');

		expect(calls.map((call) => call.args)).toEqual([
			[
				"tag",
				"-a",
				"v1.2.0",
				"-m",
				'Version 1.2.0 - 2024-05-01\n\nFixed\n- "quoted"\n',
			],
		]);
	});

	it("force-moves a branch", async () => {
		const { calls, run } = recordingRunner();
		const vcs = createGitVersionControl({ run });

		await vcs.moveBranch("latest", "HEAD");

		expect(calls.map((call) => call.args)).toEqual([
			["branch", "-f", "latest", "HEAD"],
		]);
	});

	it("does not commit when staging fails", async () => {
		const { calls, run } = recordingRunner("add");
		const vcs = createGitVersionControl({ run });

		await expect(vcs.commit(["CHANGELOG.md"], "msg")).rejects.toThrow(
			"Git command failed: git add -- CHANGELOG.md\nfatal: add failed",
		);
		expect(calls).toHaveLength(1);
	});

	it("refuses to commit without files", async () => {
		const { calls, run } = recordingRunner();
		const vcs = createGitVersionControl({ run });

		await expect(vcs.commit([], "msg")).rejects.toThrow(
			"Nothing to commit: no files given",
		);
		expect(calls).toEqual([]);
	});
});

describe("parseStatus", () => {
	it("splits porcelain output into staged, unstaged and untracked", () => {
		expect(parseStatus("M  a.ts\n M b.ts\n?? c.ts\nMM d.ts\n")).toEqual({
			staged: ["a.ts", "d.ts"],
			unstaged: ["b.ts", "d.ts"],
			untracked: ["c.ts"],
		});
	});
});

describe("GitCommandError", () => {
	it("includes the command and git's stderr", () => {
		const error = new GitCommandError(
			["tag", "-a", "v1"],
			"fatal: tag 'v1' already exists\n",
		);
		expect(error.message).toBe(
			"Git command failed: git tag -a v1\nfatal: tag 'v1' already exists",
		);
	});
});
