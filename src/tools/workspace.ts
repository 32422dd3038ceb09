import fs from "node:fs/promises";
import path from "node:path";

export function isWithin(root: string, target: string): boolean {
	const base = path.resolve(root);
	const abs = path.resolve(target);
	return abs === base || abs.startsWith(base + path.sep);
}

async function canonical(p: string): Promise<string> {
	try {
		return await fs.realpath(p);
	} catch {
		// Not created yet: canonicalize the nearest existing parent.
		const parent = path.dirname(p);
		if (parent === p) return p;
		return path.join(await canonical(parent), path.basename(p));
	}
}

/**
 * Resolves `rel` against `root` and returns the absolute path, or null when
 * the canonical result (symlinks followed) lies outside the canonical root.
 */
export async function resolveWithin(
	root: string,
	rel: string
): Promise<string | null> {
	const abs = path.resolve(root, rel);
	if (!isWithin(root, abs)) return null;
	const [realRoot, realAbs] = await Promise.all([canonical(root), canonical(abs)]);
	if (!isWithin(realRoot, realAbs)) return null;
	return abs;
}
