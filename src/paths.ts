import {
	resolve,
	sep,
} from "node:path";

/** Absolute project root without a trailing separator. */
export function resolveRoot(root: string): string {
	return resolve(root);
}

/**
 * Whether `file` lies inside the project. A sibling sharing the root as a
 * string prefix (`/repo-old` next to `/repo`) does not count.
 */
export function isProjectFile(root: string, file: string): boolean {
	const base = resolveRoot(root);
	const abs = resolve(file);
	if (abs === base) return true;
	const prefix = base.endsWith(sep) ? base : base + sep;
	return abs.startsWith(prefix);
}

/**
 * Strip the root prefix from an absolute path, keeping the leading separator:
 * `<root>/lib/foo.ts` becomes `/lib/foo.ts`. Separators are always `/` so
 * stored keys do not depend on the platform that recorded them.
 */
export function toRootRelative(root: string, file: string): string {
	const base = resolveRoot(root);
	const abs = resolve(file);
	const rest = abs.startsWith(base) ? abs.slice(base.length) : abs;
	const posix = rest.split(sep).join("/");
	return posix.startsWith("/") ? posix : `/${posix}`;
}
