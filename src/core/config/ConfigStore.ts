import fs from 'node:fs/promises';
import type { IConfig, IConfigStore, ILogger } from '../../types/index.js';
import { configFile } from '../../utils/paths.js';
import { isMissingError } from '../fs/FsSafe.js';
import { DEFAULT_EXTENSION } from '../rename/Extension.js';

export const DEFAULT_CONFIG: IConfig = {
  to: DEFAULT_EXTENSION,
  verify: true
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function validateConfig(input: unknown, warn: (msg: string) => void): IConfig {
  if (!isRecord(input)) {
    warn('Config root is not an object; using defaults');
    return { ...DEFAULT_CONFIG };
  }
  const cfg: IConfig = { ...DEFAULT_CONFIG };
  if (input.to !== undefined) {
    if (typeof input.to === 'string' && input.to.trim().length > 0) cfg.to = input.to;
    else warn('Config "to" must be a non-empty string; using default');
  }
  if (input.verify !== undefined) {
    if (typeof input.verify === 'boolean') cfg.verify = input.verify;
    else warn('Config "verify" must be a boolean; using default');
  }
  return cfg;
}

/**
 * Read-only view of the user's defaults. The file is optional and never written.
 */
export class ConfigStore implements IConfigStore {
  private current: IConfig | null = null;
  private readonly file: string;

  constructor(private readonly deps: { file?: string; logger?: ILogger } = {}) {
    this.file = deps.file ?? configFile('zipext');
  }

  get path(): string {
    return this.file;
  }

  async get(): Promise<IConfig> {
    if (this.current) return this.current;
    const warn = (msg: string) => this.deps.logger?.warn(msg, { file: this.file });
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (!isMissingError(err)) throw err;
      this.current = { ...DEFAULT_CONFIG };
      return this.current;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      warn(`Config is not valid JSON (${err instanceof Error ? err.message : String(err)}); using defaults`);
      parsed = {};
    }
    this.current = validateConfig(parsed, warn);
    return this.current;
  }
}
