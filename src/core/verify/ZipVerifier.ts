import yauzl from 'yauzl';
import type { ZipFile } from 'yauzl';
import type { IArchiveVerifier, ILogger, VerifyResult } from '../../types/index.js';

/**
 * Structural ZIP check. Only the end-of-central-directory record (and the zip64 locator,
 * when present) is read, by random access on the file descriptor; entries are never read
 * or inflated, so archive size does not matter. Every failure is reported as a result,
 * never thrown.
 */
export class ZipVerifier implements IArchiveVerifier {
	constructor(private readonly logger?: ILogger) {}

	async verify(filePath: string): Promise<VerifyResult> {
		try {
			const zipfile = await openZip(filePath);
			try {
				return { ok: true, entries: zipfile.entryCount };
			} finally {
				zipfile.close();
			}
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			this.logger?.debug?.('ZIP verification failed', { path: filePath, reason });
			return { ok: false, reason };
		}
	}

	async isZipFile(filePath: string): Promise<boolean> {
		const res = await this.verify(filePath);
		return res.ok;
	}
}

function openZip(filePath: string): Promise<ZipFile> {
	return new Promise((resolve, reject) => {
		yauzl.open(filePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
			if (err) reject(err);
			else if (!zipfile) reject(new Error(`Could not open '${filePath}' as a ZIP archive`));
			else resolve(zipfile);
		});
	});
}
