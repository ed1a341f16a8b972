/**
 * Configuration file management for changelog-bump
 *
 * Reads global ~/.changelog-bump and project-level .changelog-bump config.
 * Project config overrides global config; CLI flags override both.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors";

const CONFIG_DIR = ".changelog-bump";
const JSON_CONFIG_FILE = "config.json";

// Global config directory in user's home
export const GLOBAL_CONFIG_DIR = join(homedir(), CONFIG_DIR);

export interface BumpConfig {
	changelog: {
		path: string;
		section: string;
	};
	versionFile: {
		path: string;
		declaration: string;
	};
	release: {
		tagPrefix: string;
		latestBranch: string;
		remote: string;
		mainBranch: string | null; // null: use the current branch
		commitMessage: string; // "{version}" is replaced
	};
}

export type PartialBumpConfig = {
	[K in keyof BumpConfig]?: Partial<BumpConfig[K]>;
};

export const DEFAULT_CONFIG: BumpConfig = {
	changelog: {
		path: "CHANGELOG.md",
		section: "Unreleased",
	},
	versionFile: {
		path: "src/version.ts",
		declaration: "VERSION",
	},
	release: {
		tagPrefix: "v",
		latestBranch: "latest",
		remote: "origin",
		mainBranch: null,
		commitMessage: "Bump version to {version}",
	},
};

/**
 * Check if a value is a plain object
 */
function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function warn(message: string): void {
	console.warn(`[changelog-bump] Warning: ${message}`);
}

function pickStrings<K extends string>(
	section: string,
	raw: unknown,
	keys: readonly K[],
	nullable: readonly K[] = [],
): Partial<Record<K, string | null>> {
	const result: Partial<Record<K, string | null>> = {};
	if (raw === undefined) return result;

	if (!isObject(raw)) {
		warn(`Ignoring "${section}": expected an object`);
		return result;
	}

	for (const [key, value] of Object.entries(raw)) {
		const known = keys.find((k) => k === key);
		if (!known) {
			warn(`Ignoring unknown key "${section}.${key}"`);
		} else if (typeof value === "string") {
			result[known] = value;
		} else if (value === null && nullable.includes(known)) {
			result[known] = null;
		} else {
			warn(`Ignoring "${section}.${key}": expected a string`);
		}
	}

	return result;
}

function asString(value: string | null | undefined): string | undefined {
	return typeof value === "string" ? value : undefined;
}

/**
 * Validate parsed JSON into a partial config, dropping what doesn't fit
 */
export function parseConfig(raw: unknown, source: string): PartialBumpConfig {
	if (!isObject(raw)) {
		throw new ConfigError(`Config at '${source}' must be a JSON object`);
	}

	const config: PartialBumpConfig = {};

	for (const key of Object.keys(raw)) {
		if (key !== "changelog" && key !== "versionFile" && key !== "release") {
			warn(`Ignoring unknown key "${key}" in '${source}'`);
		}
	}

	const changelog = pickStrings("changelog", raw.changelog, [
		"path",
		"section",
	] as const);
	if (Object.keys(changelog).length > 0) {
		config.changelog = {
			path: asString(changelog.path),
			section: asString(changelog.section),
		};
	}

	const versionFile = pickStrings("versionFile", raw.versionFile, [
		"path",
		"declaration",
	] as const);
	if (Object.keys(versionFile).length > 0) {
		config.versionFile = {
			path: asString(versionFile.path),
			declaration: asString(versionFile.declaration),
		};
	}

	const release = pickStrings(
		"release",
		raw.release,
		[
			"tagPrefix",
			"latestBranch",
			"remote",
			"mainBranch",
			"commitMessage",
		] as const,
		["mainBranch"] as const,
	);
	if (Object.keys(release).length > 0) {
		config.release = {
			tagPrefix: asString(release.tagPrefix),
			latestBranch: asString(release.latestBranch),
			remote: asString(release.remote),
			mainBranch: release.mainBranch,
			commitMessage: asString(release.commitMessage),
		};
	}

	return config;
}

function withoutUndefined<T extends object>(value: Partial<T> | undefined): Partial<T> {
	const result: Partial<T> = {};
	if (!value) return result;

	for (const key of Object.keys(value) as (keyof T)[]) {
		if (value[key] !== undefined) {
			result[key] = value[key];
		}
	}
	return result;
}

/**
 * Merge two config objects with override taking precedence.
 * Nested sections merge one level deep.
 */
export function mergeConfigs(
	base: BumpConfig,
	override: PartialBumpConfig,
): BumpConfig {
	return {
		changelog: { ...base.changelog, ...withoutUndefined(override.changelog) },
		versionFile: {
			...base.versionFile,
			...withoutUndefined(override.versionFile),
		},
		release: { ...base.release, ...withoutUndefined(override.release) },
	};
}

function readConfigFile(path: string): PartialBumpConfig {
	if (!existsSync(path)) return {};

	try {
		return parseConfig(JSON.parse(readFileSync(path, "utf-8")), path);
	} catch (error) {
		warn(
			`Could not parse config at '${path}'. Skipping it. Error: ${error instanceof Error ? error.message : String(error)}`,
		);
		return {};
	}
}

/**
 * Get the config with layered loading:
 * 1. Start with defaults
 * 2. Merge global ~/.changelog-bump/config.json (if exists)
 * 3. Merge project .changelog-bump/config.json (if exists)
 * 4. Merge CLI overrides
 */
export function loadConfig(options: {
	projectRoot: string;
	globalDir?: string;
	overrides?: PartialBumpConfig;
}): BumpConfig {
	const { projectRoot, globalDir = GLOBAL_CONFIG_DIR, overrides = {} } =
		options;

	let config = mergeConfigs(
		DEFAULT_CONFIG,
		readConfigFile(join(globalDir, JSON_CONFIG_FILE)),
	);
	config = mergeConfigs(
		config,
		readConfigFile(join(projectRoot, CONFIG_DIR, JSON_CONFIG_FILE)),
	);

	return mergeConfigs(config, overrides);
}
