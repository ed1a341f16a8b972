import * as p from "@clack/prompts";
import type { ReleaseStep } from "../lib/errors";

let silentMode = false;

export function setSilentMode(silent: boolean) {
	silentMode = silent;
}

export function createSpinner() {
	const s = p.spinner();

	return {
		start: (msg?: string) => {
			if (!silentMode) s.start(msg);
		},
		stop: (msg?: string, code?: number) => {
			if (!silentMode) s.stop(msg, code);
		},
	};
}

export const STEP_LABELS: Record<
	ReleaseStep,
	{ start: string; done: string }
> = {
	"write-version-file": {
		start: "Updating version file",
		done: "Updated version file",
	},
	"write-changelog": {
		start: "Dating changelog section",
		done: "Dated changelog section",
	},
	commit: { start: "Committing", done: "Committed release" },
	tag: { start: "Creating annotated tag", done: "Created annotated tag" },
	"move-branch": { start: "Moving branch", done: "Moved branch" },
};
