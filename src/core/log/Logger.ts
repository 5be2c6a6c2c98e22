import fs from 'node:fs';
import type { ILogger } from '../../types/index.js';

type Level = 'info' | 'warn' | 'error' | 'debug';

export type LoggerOptions = {
	/** Echo info/debug to stderr as well (warn/error always echo). */
	verbose?: boolean;
	/** Append NDJSON records to this file. */
	file?: string | null;
};

/**
 * Structured logger. Stdout belongs to per-file results, so the human echo goes to stderr.
 */
export class Logger implements ILogger {
	private stream: fs.WriteStream | null = null;
	private ring: string[] = [];
	private max = 500;
	private readonly verbose: boolean;

	constructor(opts: LoggerOptions = {}) {
		this.verbose = opts.verbose ?? false;
		if (opts.file) this.openFile(opts.file);
	}

	private openFile(file: string) {
		const stream = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
		stream.on('error', (err) => {
			console.error(`[zipext] log file disabled: ${err.message}`);
			this.stream = null;
		});
		this.stream = stream;
	}

	private pushRing(line: string) {
		this.ring.push(line);
		if (this.ring.length > this.max) this.ring.shift();
	}

	private write(level: Level, msg: string, meta?: Record<string, unknown>) {
		const ts = new Date().toISOString();
		const rec = { ts, level, msg, ...(meta ? { meta } : {}) };
		const line = JSON.stringify(rec);
		this.pushRing(line);
		this.stream?.write(`${line}\n`);
		if (level === 'warn' || level === 'error' || this.verbose) {
			const details = meta ? ` ${JSON.stringify(meta)}` : '';
			console.error(`${level.toUpperCase()} ${msg}${details}`);
		}
	}

	info(msg: string, meta?: Record<string, unknown>): void {
		this.write('info', msg, meta);
	}
	warn(msg: string, meta?: Record<string, unknown>): void {
		this.write('warn', msg, meta);
	}
	error(msg: string | Error, meta?: Record<string, unknown>): void {
		if (msg instanceof Error) this.write('error', msg.message, { stack: msg.stack, ...meta });
		else this.write('error', msg, meta);
	}
	debug(msg: string, meta?: Record<string, unknown>): void {
		this.write('debug', msg, meta);
	}

	getRing(): string[] {
		return [...this.ring];
	}

	/** Flush and close the file sink, if any. */
	async close(): Promise<void> {
		const stream = this.stream;
		if (!stream) return;
		this.stream = null;
		await new Promise<void>((resolve) => stream.end(() => resolve()));
	}
}
