import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { InvalidExtensionError, ensureDotPrefix, splitName, withExtension } from './Extension.js';

describe('ensureDotPrefix', () => {
  it('adds a leading dot when missing', () => {
    expect(ensureDotPrefix('ben')).toBe('.ben');
  });

  it('keeps an existing dot and trims whitespace', () => {
    expect(ensureDotPrefix('  .zz ')).toBe('.zz');
    expect(ensureDotPrefix('tar.gz')).toBe('.tar.gz');
  });

  it.each(['', '   ', '\t'])('rejects blank input %j', (input) => {
    expect(() => ensureDotPrefix(input)).toThrow(InvalidExtensionError);
    expect(() => ensureDotPrefix(input)).toThrow('Extension cannot be empty.');
  });

  it('rejects a bare dot', () => {
    expect(() => ensureDotPrefix(' . ')).toThrow('Extension cannot be a bare dot.');
  });

  it.each(['a/b', '.x\\y', 'nul\0'])('rejects separators in %j', (input) => {
    expect(() => ensureDotPrefix(input)).toThrow(InvalidExtensionError);
  });

  it('records the raw input on the error', () => {
    try {
      ensureDotPrefix('  ');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidExtensionError);
      if (err instanceof InvalidExtensionError) {
        expect(err.input).toBe('  ');
        expect(err.name).toBe('InvalidExtensionError');
      }
    }
  });
});

describe('splitName', () => {
  it('splits on the final dot', () => {
    expect(splitName('bundle.tar.zip')).toEqual({ stem: 'bundle.tar', ext: '.zip' });
  });

  it('treats dotfiles and bare names as having no extension', () => {
    expect(splitName('.profile')).toEqual({ stem: '.profile', ext: '' });
    expect(splitName('README')).toEqual({ stem: 'README', ext: '' });
  });
});

describe('withExtension', () => {
  it('replaces only the final suffix', () => {
    expect(withExtension(path.join('docs', 'readme.zip'), '.zz')).toBe(path.join('docs', 'readme.zz'));
    expect(withExtension('/tmp/a.b.zip', '.ben')).toBe('/tmp/a.b.ben');
  });

  it('appends when there is no suffix', () => {
    expect(withExtension('/tmp/archive', '.ben')).toBe('/tmp/archive.ben');
  });

  it('leaves bare relative names without a directory prefix', () => {
    expect(withExtension('a.zip', '.ben')).toBe('a.ben');
  });
});
