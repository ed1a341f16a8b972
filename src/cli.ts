#!/usr/bin/env node

import * as p from "@clack/prompts";
import { Command } from "commander";
import { bumpCommand } from "./commands/bump";
import { setSilentMode } from "./utils/ui";
import { VERSION } from "./version";

const program = new Command();

program
	.name("changelog-bump")
	.description(
		"Date the Unreleased changelog section, bump the version, commit and tag",
	)
	.version(VERSION, "-V, --version")
	.argument("<version>", "Version to release (used as given)")
	.option("-c, --changelog <path>", "Changelog file (default: CHANGELOG.md)")
	.option(
		"-f, --version-file <path>",
		"File declaring the version (default: src/version.ts)",
	)
	.option("--declaration <name>", "Declaration to patch (default: VERSION)")
	.option(
		"--latest-branch <name>",
		"Branch moved to the release commit (default: latest)",
	)
	.option(
		"--main-branch <name>",
		"Branch named in the push reminder (default: current branch)",
	)
	.option("--remote <name>", "Remote named in the push reminder (default: origin)")
	.option("--tag-prefix <prefix>", "Prefix of the tag name (default: v)")
	.option("-n, --dry-run", "Show what would happen without changing anything")
	.option("-y, --yes", "Skip confirmation prompts")
	.option("-s, --silent", "Suppress spinners")
	.hook("preAction", (thisCommand) => {
		if (thisCommand.opts().silent) {
			setSilentMode(true);
		}
	})
	.action(async (version: string, options) => {
		await bumpCommand(version, options);
	});

program.parseAsync().catch((error: unknown) => {
	p.cancel(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
