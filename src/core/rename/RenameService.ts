import path from 'node:path';
import type { IArchiveVerifier, ILogger, RenameOptions, RenameOutcome } from '../../types/index.js';
import { FsSafe } from '../fs/FsSafe.js';
import { ZipVerifier } from '../verify/ZipVerifier.js';
import { DEFAULT_EXTENSION, ensureDotPrefix, withExtension } from './Extension.js';

export class RenameService {
	private readonly fsSafe: FsSafe;
	private readonly verifier: IArchiveVerifier;
	private readonly logger: ILogger | undefined;

	constructor(deps: { fsSafe?: FsSafe; verifier?: IArchiveVerifier; logger?: ILogger } = {}) {
		this.fsSafe = deps.fsSafe ?? new FsSafe();
		this.logger = deps.logger;
		this.verifier = deps.verifier ?? new ZipVerifier(deps.logger);
	}

	/**
	 * Rename `filePath` so that its final suffix becomes `newExtension`.
	 *
	 * Expected failures (not a file, not a ZIP, rename rejected by the OS) come back as
	 * non-ok outcomes. Only an invalid extension throws.
	 */
	async changeExtension(
		filePath: string,
		newExtension: string = DEFAULT_EXTENSION,
		opts: RenameOptions = {},
	): Promise<RenameOutcome> {
		const { verifyZip = true, overwrite = false, dryRun = false } = opts;

		if (!(await this.fsSafe.isFile(filePath))) {
			return {
				kind: 'skipped',
				ok: false,
				source: filePath,
				reason: 'not-a-file',
				message: `Skip: '${filePath}' is not a file.`,
			};
		}

		const ext = ensureDotPrefix(newExtension);

		if (verifyZip && !(await this.verifier.isZipFile(filePath))) {
			return {
				kind: 'skipped',
				ok: false,
				source: filePath,
				reason: 'not-a-zip',
				message: `Skip: '${filePath}' is not a valid ZIP (use --no-verify to force).`,
			};
		}

		const name = path.basename(filePath);
		const dst = withExtension(filePath, ext);

		if (dryRun) return await this.preview(filePath, dst, overwrite);

		try {
			if (overwrite && (await this.fsSafe.exists(dst))) {
				await this.fsSafe.atomicRename(filePath, dst);
				this.logger?.debug?.('Replaced existing destination', { from: filePath, to: dst });
				return {
					kind: 'overwrote',
					ok: true,
					source: filePath,
					target: dst,
					message: `Renamed (overwrote): ${name} -> ${path.basename(dst)}`,
				};
			}
			const finalDst = overwrite ? dst : await this.fsSafe.nextAvailablePath(dst);
			await this.fsSafe.atomicRename(filePath, finalDst);
			const adjusted = finalDst !== dst;
			const finalName = path.basename(finalDst);
			this.logger?.debug?.('Renamed', { from: filePath, to: finalDst, adjusted });
			return {
				kind: 'renamed',
				ok: true,
				source: filePath,
				target: finalDst,
				adjusted,
				message: `Renamed: ${name} -> ${finalName}${adjusted ? ` (renamed to avoid conflict: ${finalName})` : ''}`,
			};
		} catch (err) {
			const error = err instanceof Error ? err : new Error(String(err));
			this.logger?.warn('Rename failed', { path: filePath, error: error.message });
			return {
				kind: 'error',
				ok: false,
				source: filePath,
				error,
				message: `Error renaming '${filePath}': ${error.message}`,
			};
		}
	}

	/**
	 * Without overwrite the preview names the conflict-free path a real run would pick
	 * (`a-1.ben (renamed to avoid conflict: a-1.ben)`), not the naive destination, so the
	 * dry-run line matches the `Renamed:` line the same invocation would print for real.
	 * With overwrite it names the exact destination and notes `(will overwrite)` when taken.
	 */
	private async preview(filePath: string, dst: string, overwrite: boolean): Promise<RenameOutcome> {
		const name = path.basename(filePath);
		if (overwrite) {
			const note = (await this.fsSafe.exists(dst)) ? ' (will overwrite)' : '';
			return {
				kind: 'preview',
				ok: true,
				source: filePath,
				target: dst,
				overwrite: true,
				message: `Would rename: ${name} -> ${path.basename(dst)}${note}`,
			};
		}
		const finalDst = await this.fsSafe.nextAvailablePath(dst);
		const finalName = path.basename(finalDst);
		const note = finalDst !== dst ? ` (renamed to avoid conflict: ${finalName})` : '';
		return {
			kind: 'preview',
			ok: true,
			source: filePath,
			target: finalDst,
			overwrite: false,
			message: `Would rename: ${name} -> ${finalName}${note}`,
		};
	}
}
