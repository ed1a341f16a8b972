import { execFile } from "child_process";
import { promisify } from "util";
import { GitCommandError } from "../lib/errors";

const execFileAsync = promisify(execFile);

export interface GitOptions {
  cwd?: string;
  preserveWhitespace?: boolean;
}

export type GitRunner = (args: string[], options?: GitOptions) => Promise<string>;

export interface GitStatus {
  staged: string[];
  unstaged: string[];
  untracked: string[];
}

/**
 * Operations a release needs from version control
 */
export interface VersionControl {
  commit(files: string[], message: string): Promise<void>;
  tag(name: string, message: string): Promise<void>;
  moveBranch(name: string, target: string): Promise<void>;
}

function stderrOf(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string") return stderr;
  }
  return error instanceof Error ? error.message : String(error);
}

export async function git(args: string[], options: GitOptions = {}): Promise<string> {
  try {
    const { stdout } = await execFileAsync("git", args, { cwd: options.cwd });
    return options.preserveWhitespace ? stdout : stdout.trim();
  } catch (error) {
    throw new GitCommandError(args, stderrOf(error), { cause: error });
  }
}

export async function isGitRepo(cwd?: string): Promise<boolean> {
  try {
    await git(["rev-parse", "--is-inside-work-tree"], { cwd });
    return true;
  } catch {
    return false;
  }
}

export async function getRepoRoot(cwd?: string): Promise<string> {
  return git(["rev-parse", "--show-toplevel"], { cwd });
}

export async function getCurrentBranch(cwd?: string): Promise<string | null> {
  try {
    const branch = await git(["rev-parse", "--abbrev-ref", "HEAD"], { cwd });
    // Detached HEAD reports "HEAD"
    return branch && branch !== "HEAD" ? branch : null;
  } catch {
    return null;
  }
}

export async function tagExists(name: string, cwd?: string): Promise<boolean> {
  try {
    await git(["rev-parse", "-q", "--verify", `refs/tags/${name}`], { cwd });
    return true;
  } catch {
    return false;
  }
}

export function parseStatus(output: string): GitStatus {
  const lines = output.split("\n").filter((line) => line.length > 0);

  const staged: string[] = [];
  const unstaged: string[] = [];
  const untracked: string[] = [];

  for (const line of lines) {
    const indexStatus = line[0];
    const workTreeStatus = line[1];
    const file = line.slice(3);

    if (indexStatus === "?") {
      untracked.push(file);
    } else if (indexStatus !== " ") {
      staged.push(file);
    }

    if (workTreeStatus !== " " && workTreeStatus !== "?") {
      unstaged.push(file);
    }
  }

  return { staged, unstaged, untracked };
}

export async function getStatus(cwd?: string): Promise<GitStatus> {
  const output = await git(["status", "--porcelain"], { cwd, preserveWhitespace: true });
  return parseStatus(output);
}

/**
 * VersionControl backed by the git CLI. Every call waits for git to exit
 * and throws on a non-zero status.
 */
export function createGitVersionControl(
  options: { cwd?: string; run?: GitRunner } = {}
): VersionControl {
  const { cwd, run = git } = options;

  return {
    async commit(files, message) {
      if (files.length === 0) {
        throw new Error("Nothing to commit: no files given");
      }
      await run(["add", "--", ...files], { cwd });
      await run(["commit", "-m", message], { cwd });
    },
    async tag(name, message) {
      await run(["tag", "-a", name, "-m", message], { cwd });
    },
    async moveBranch(name, target) {
      await run(["branch", "-f", name, target], { cwd });
    },
  };
}
