// Main exports for programmatic usage

export { bumpCommand } from "./commands/bump";
export * from "./lib/changelog";
export * from "./lib/config";
export * from "./lib/date";
export * from "./lib/errors";
export * from "./lib/release";
export * from "./lib/version-file";
export * from "./utils/fs";
export * from "./utils/git";
