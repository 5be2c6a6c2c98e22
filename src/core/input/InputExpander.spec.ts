import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { expandInputs } from './InputExpander.js';

let root: string;

beforeEach(async () => {
  // realpath so expectations match canonicalized output on systems where tmpdir is a symlink
  root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'zipext-expand-')));
  await fs.mkdir(path.join(root, 'docs', 'nested'), { recursive: true });
  for (const rel of ['b.zip', 'a.zip', 'notes.txt', '.hidden.zip', 'docs/c.zip', 'docs/nested/d.zip']) {
    await fs.writeFile(path.join(root, rel), '');
  }
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

const abs = (rel: string) => path.join(root, rel);

describe('expandInputs', () => {
  it('expands a glob in sorted order, skipping hidden files', async () => {
    expect(await expandInputs(['*.zip'], { cwd: root })).toEqual([abs('a.zip'), abs('b.zip')]);
  });

  it('does not descend without **', async () => {
    expect(await expandInputs(['docs/*.zip'], { cwd: root })).toEqual([abs('docs/c.zip')]);
  });

  it('recurses with **', async () => {
    expect(await expandInputs(['**/*.zip'], { cwd: root })).toEqual([
      abs('a.zip'),
      abs('b.zip'),
      abs('docs/c.zip'),
      abs('docs/nested/d.zip')
    ]);
  });

  it('accepts absolute patterns', async () => {
    expect(await expandInputs([path.join(root, 'docs', '**', '*.zip')])).toEqual([
      abs('docs/c.zip'),
      abs('docs/nested/d.zip')
    ]);
  });

  it('resolves existing literal paths and collapses different spellings', async () => {
    const result = await expandInputs(['a.zip', './a.zip', abs('a.zip'), 'docs/../a.zip'], { cwd: root });
    expect(result).toEqual([abs('a.zip')]);
  });

  it('deduplicates overlapping patterns in first-seen order', async () => {
    const result = await expandInputs(['b.zip', '*.zip', '**/c.zip', 'docs/*'], { cwd: root });
    expect(result).toEqual([abs('b.zip'), abs('a.zip'), abs('docs/c.zip'), abs('docs/nested')]);
  });

  it('passes missing literal paths through unchanged', async () => {
    expect(await expandInputs(['missing.zip'], { cwd: root })).toEqual(['missing.zip']);
  });

  it('treats a glob with no matches as a literal path', async () => {
    expect(await expandInputs(['*.rar', 'nowhere/*.zip'], { cwd: root })).toEqual(['*.rar', 'nowhere/*.zip']);
  });

  it('returns nothing for no tokens', async () => {
    expect(await expandInputs([], { cwd: root })).toEqual([]);
  });

  it('passes unreachable literal paths through instead of failing the batch', async () => {
    const denied = () => Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    vi.spyOn(fs, 'lstat').mockRejectedValue(denied());
    vi.spyOn(fs, 'realpath').mockRejectedValue(denied());
    expect(await expandInputs(['/locked/a.zip'])).toEqual(['/locked/a.zip']);
  });

  it('treats a glob over an unreadable directory as a literal path', async () => {
    vi.spyOn(fs, 'readdir').mockRejectedValue(Object.assign(new Error('EIO: i/o error'), { code: 'EIO' }));
    expect(await expandInputs(['*.zip'], { cwd: root })).toEqual(['*.zip']);
  });
});
