import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import picomatch from 'picomatch';

export type ExpandOptions = {
	/** Directory relative tokens are resolved against. Defaults to `process.cwd()`. */
	cwd?: string;
};

/**
 * Resolve a mix of literal paths and glob patterns into an ordered, de-duplicated list.
 *
 * Tokens that match nothing (glob or not) are kept verbatim as literal paths; whether
 * they exist is for the caller to find out. Existing paths are canonicalized via realpath
 * so different spellings of one file collapse to a single entry.
 */
export async function expandInputs(tokens: Iterable<string>, opts: ExpandOptions = {}): Promise<string[]> {
	const cwd = opts.cwd ?? process.cwd();
	const seen = new Set<string>();
	const results: string[] = [];

	for (const token of tokens) {
		let matches = await globToken(token, cwd);
		if (!matches.length) matches = [token];

		for (const match of matches) {
			const key = (await canonical(path.resolve(cwd, match))) ?? match;
			if (seen.has(key)) continue;
			seen.add(key);
			results.push(key);
		}
	}

	return results;
}

async function globToken(token: string, cwd: string): Promise<string[]> {
	const scan = picomatch.scan(token);
	if (!scan.isGlob) {
		return (await lexists(path.resolve(cwd, token))) ? [token] : [];
	}

	const base = scan.base;
	const segments = scan.glob.split('/').filter(Boolean);
	const maxDepth = segments.includes('**') ? Number.POSITIVE_INFINITY : segments.length;
	const isMatch = picomatch(scan.glob, { dot: false });

	const entries = await walk(path.resolve(cwd, base), maxDepth);
	return entries
		.filter((rel) => isMatch(rel))
		.sort()
		.map((rel) => (base ? path.join(base, rel) : rel));
}

/**
 * Lists entries under `root` as `/`-joined relative paths. Symlinked directories are
 * listed but not descended into; directories that cannot be read contribute nothing.
 */
async function walk(root: string, maxDepth: number, prefix = '', depth = 1): Promise<string[]> {
	let dirents: Dirent[];
	try {
		dirents = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
	} catch {
		return [];
	}

	const out: string[] = [];
	for (const d of dirents) {
		const rel = prefix ? `${prefix}/${d.name}` : d.name;
		out.push(rel);
		if (d.isDirectory() && depth < maxDepth) {
			out.push(...(await walk(root, maxDepth, rel, depth + 1)));
		}
	}
	return out;
}

async function lexists(p: string): Promise<boolean> {
	try {
		await fs.lstat(p);
		return true;
	} catch {
		return false;
	}
}

/** realpath, or null when the path cannot be resolved for any reason (missing, unreachable, looping). */
async function canonical(p: string): Promise<string | null> {
	try {
		return await fs.realpath(p);
	} catch {
		return null;
	}
}
