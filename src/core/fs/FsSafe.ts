import fs from 'node:fs/promises';
import path from 'node:path';
import { splitName } from '../rename/Extension.js';

export class FsSafe {
	async exists(p: string): Promise<boolean> {
		try {
			await fs.access(p);
			return true;
		} catch {
			return false;
		}
	}

	async isFile(p: string): Promise<boolean> {
		try {
			const st = await fs.stat(p);
			return st.isFile();
		} catch {
			return false;
		}
	}

	/**
	 * Returns `target` if free, otherwise the first free `stem-N.ext` beside it (N = 1, 2, ...).
	 * Not safe against another process claiming the name between probe and use.
	 */
	async nextAvailablePath(target: string): Promise<string> {
		if (!(await this.exists(target))) return target;
		const dir = path.dirname(target);
		const { stem, ext } = splitName(path.basename(target));
		for (let n = 1; ; n++) {
			const candidate = path.join(dir, `${stem}-${n}${ext}`);
			if (!(await this.exists(candidate))) return candidate;
		}
	}

	/**
	 * Single rename(2); replaces `to` when it exists. Only EBUSY is retried.
	 */
	async atomicRename(from: string, to: string): Promise<void> {
		const maxAttempts = 10;
		for (let i = 0; i < maxAttempts; i++) {
			try {
				await fs.rename(from, to);
				return;
			} catch (err) {
				if (isBusyError(err) && i < maxAttempts - 1) {
					await delay(50 + Math.floor(Math.random() * 100));
					continue;
				}
				throw err;
			}
		}
	}
}

function delay(ms: number) {
	return new Promise((res) => setTimeout(res, ms));
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return typeof err === 'object' && err !== null && 'code' in err && err instanceof Error;
}

export function isBusyError(err: unknown): err is NodeJS.ErrnoException {
	return isNodeError(err) && err.code === 'EBUSY';
}

export function isMissingError(err: unknown): err is NodeJS.ErrnoException {
	return isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
