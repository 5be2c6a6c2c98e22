import path from 'node:path';

export const DEFAULT_EXTENSION = '.ben';

export class InvalidExtensionError extends Error {
	constructor(
		message: string,
		readonly input: string,
	) {
		super(message);
		this.name = 'InvalidExtensionError';
	}
}

/**
 * Normalize a user-supplied extension to its dotted form (`ben` -> `.ben`).
 * Throws {@link InvalidExtensionError} for blank input or values that could not be a filename suffix.
 */
export function ensureDotPrefix(ext: string): string {
	const trimmed = ext.trim();
	if (!trimmed) throw new InvalidExtensionError('Extension cannot be empty.', ext);
	const dotted = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
	if (dotted === '.') throw new InvalidExtensionError('Extension cannot be a bare dot.', ext);
	if (/[/\\\0]/.test(dotted)) {
		throw new InvalidExtensionError(`Extension '${trimmed}' must not contain path separators.`, ext);
	}
	return dotted;
}

export function splitName(basename: string): { stem: string; ext: string } {
	const ext = path.extname(basename);
	return { stem: ext ? basename.slice(0, -ext.length) : basename, ext };
}

/**
 * Swap the final suffix of `filePath` for `ext`, keeping directory and stem.
 */
export function withExtension(filePath: string, ext: string): string {
	const { stem } = splitName(path.basename(filePath));
	return path.join(path.dirname(filePath), `${stem}${ext}`);
}
