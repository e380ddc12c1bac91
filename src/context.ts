import * as github from "@actions/github";

/** The part of the Actions event context this action reads. */
export type EventContext = Pick<typeof github.context, "eventName" | "sha" | "ref" | "payload">;

/**
 * Resolve the project root: explicit `project-root` input, then the
 * checkout directory Actions exposes as `GITHUB_WORKSPACE`, then the
 * working directory.
 */
export function resolveProjectRoot(
	input: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	if (input) return input;
	return env.GITHUB_WORKSPACE || process.cwd();
}

/**
 * Resolve the head commit SHA the mapping is recorded against.
 *
 * Under `workflow_run` the SHA of the triggering run is more accurate than
 * `context.sha` (which points at the default branch). Outside Actions
 * `GITHUB_SHA` is unset and `context.sha` comes back undefined, so an empty
 * result throws.
 */
export function resolveHeadSha(context: EventContext = github.context): string {
	const sha: string | undefined = context.eventName === "workflow_run"
		? context.payload.workflow_run?.head_sha ?? context.sha
		: context.sha;
	if (!sha) {
		throw new Error("Could not resolve the head commit SHA; is GITHUB_SHA set?");
	}
	return sha;
}

/** Branch used to scope the mapping cache. */
export function resolveBranch(context: EventContext = github.context): string {
	const fromRef = context.ref.replace("refs/heads/", "");

	if (context.eventName === "pull_request" || context.eventName === "pull_request_target") {
		return context.payload.pull_request?.head?.ref ?? fromRef;
	}

	if (context.eventName === "workflow_run") {
		return context.payload.workflow_run?.head_branch ?? fromRef;
	}

	return fromRef;
}
