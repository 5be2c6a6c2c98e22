import { Command, CommanderError } from 'commander';
import { createRequire } from 'node:module';
import path from 'node:path';
import { ConfigStore } from '../core/config/ConfigStore.js';
import { FsSafe } from '../core/fs/FsSafe.js';
import { expandInputs } from '../core/input/InputExpander.js';
import { Logger } from '../core/log/Logger.js';
import { InvalidExtensionError, ensureDotPrefix } from '../core/rename/Extension.js';
import { RenameService } from '../core/rename/RenameService.js';
import type { IConfig, RenameOutcomeKind } from '../types/index.js';

type CliOptions = {
  pattern: string[];
  to?: string;
  force?: boolean;
  verify: boolean;
  dryRun?: boolean;
  config?: string;
  logFile?: string;
  verbose?: boolean;
};

export type RunOptions = {
  /** Base directory for relative paths and patterns. */
  cwd?: string;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Parse `argv`, rename every resolved file and return the process exit code:
 * 0 all ok, 1 any failure or nothing matched, 2 usage error.
 */
export async function run(argv: string[] = process.argv.slice(2), runOpts: RunOptions = {}): Promise<number> {
  const program = new Command();
  program
    .name('zipext')
    .description('Convert .zip files to another extension (default .ben). Supports globs.')
    .argument('[paths...]', 'File paths or glob patterns to process (e.g., uploads/*.zip)')
    .option('--pattern <glob>', 'Glob pattern of files to convert; can be given multiple times', collect, [])
    .option('--to <ext>', 'Target extension (default: .ben)')
    .option('--force', 'Overwrite destination if it exists; without this a numeric suffix is added')
    .option('--no-verify', 'Do not verify that the input files are ZIP archives')
    .option('--dry-run', 'Show what would happen without making changes')
    .option('--config <file>', 'Read defaults from this JSON file')
    .option('--log-file <path>', 'Append structured logs to this file')
    .option('--verbose', 'Echo info and debug logs to stderr')
    .version(readVersion(), '-V, --version')
    .exitOverride();

  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const logger = new Logger({
    verbose: opts.verbose ?? false,
    file: opts.logFile ?? process.env.ZIPEXT_LOG_FILE ?? null
  });
  try {
    return await execute(program.args, opts, logger, runOpts.cwd ?? process.cwd());
  } finally {
    await logger.close();
  }
}

async function execute(paths: string[], opts: CliOptions, logger: Logger, cwd: string): Promise<number> {
  const inputs = [...paths, ...opts.pattern];
  if (!inputs.length) {
    console.log('No inputs provided. Specify files or use --pattern.');
    return 2;
  }

  const fsSafe = new FsSafe();
  const configPath = opts.config ? path.resolve(cwd, opts.config) : undefined;
  if (configPath && !(await fsSafe.isFile(configPath))) {
    console.error(`Config file not found: ${opts.config}`);
    return 2;
  }
  let cfg: IConfig;
  try {
    cfg = await new ConfigStore({ file: configPath, logger }).get();
  } catch (err) {
    console.error(`Config error: ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }

  let ext: string;
  try {
    ext = ensureDotPrefix(opts.to ?? cfg.to);
  } catch (err) {
    if (err instanceof InvalidExtensionError) {
      console.error(`Invalid extension: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const files = await expandInputs(inputs, { cwd });
  // literal fallbacks keep the list non-empty; "matched" means something is actually on disk
  if (!(await anyExists(fsSafe, files, cwd))) {
    console.log('No files matched the provided paths/patterns.');
    return 1;
  }
  logger.debug('Resolved inputs', { inputs, files: files.length });

  const renamer = new RenameService({ fsSafe, logger });
  const verifyZip = opts.verify === false ? false : cfg.verify;
  const counts: Partial<Record<RenameOutcomeKind, number>> = {};
  let overallOk = true;

  for (const file of files) {
    const outcome = await renamer.changeExtension(file, ext, {
      verifyZip,
      overwrite: opts.force ?? false,
      dryRun: opts.dryRun ?? false
    });
    console.log(outcome.message);
    counts[outcome.kind] = (counts[outcome.kind] ?? 0) + 1;
    overallOk = overallOk && outcome.ok;
  }

  logger.info('Batch finished', { to: ext, total: files.length, ...counts });
  return overallOk ? 0 : 1;
}

async function anyExists(fsSafe: FsSafe, files: string[], cwd: string): Promise<boolean> {
  for (const file of files) {
    if (await fsSafe.exists(path.resolve(cwd, file))) return true;
  }
  return false;
}
