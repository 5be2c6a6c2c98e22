// Shared types and interfaces

export interface ILogger {
	info(msg: string, meta?: Record<string, unknown>): void;
	warn(msg: string, meta?: Record<string, unknown>): void;
	error(msg: string | Error, meta?: Record<string, unknown>): void;
	debug?(msg: string, meta?: Record<string, unknown>): void;
}

export interface IConfig {
	/** Target extension used when `--to` is not given */
	to: string;
	/** Whether files must be valid ZIP containers before renaming */
	verify: boolean;
}

export interface IConfigStore {
	get(): Promise<IConfig>;
}

export type VerifyResult = { ok: true; entries: number } | { ok: false; reason: string };

export interface IArchiveVerifier {
	verify(filePath: string): Promise<VerifyResult>;
	isZipFile(filePath: string): Promise<boolean>;
}

export type RenameOptions = {
	verifyZip?: boolean;
	overwrite?: boolean;
	dryRun?: boolean;
};

export type SkipReason = 'not-a-file' | 'not-a-zip';

export type RenameOutcome =
	| { kind: 'renamed'; ok: true; source: string; target: string; adjusted: boolean; message: string }
	| { kind: 'overwrote'; ok: true; source: string; target: string; message: string }
	| { kind: 'preview'; ok: true; source: string; target: string; overwrite: boolean; message: string }
	| { kind: 'skipped'; ok: false; source: string; reason: SkipReason; message: string }
	| { kind: 'error'; ok: false; source: string; error: Error; message: string };

export type RenameOutcomeKind = RenameOutcome['kind'];
