import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { readLines, splitLines } from '../../src/core/line-reader';

describe('splitLines', () => {
  it('keeps each newline and the unterminated last line', () => {
    expect(splitLines('a\r\nb\n\nc')).toEqual(['a\n', 'b\n', '\n', 'c']);
  });

  it('returns no lines for empty input', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('does not add an empty line after a trailing newline', () => {
    expect(splitLines('only\n')).toEqual(['only\n']);
  });
});

describe('readLines', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'note2gdocs-lines-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('yields lines with normalized endings', () => {
    const file = join(dir, 'note.md');
    writeFileSync(file, '# T\r\n- x\nlast', 'utf8');
    expect([...readLines(file)]).toEqual(['# T\n', '- x\n', 'last']);
  });

  it('decodes multi-byte characters', () => {
    const file = join(dir, 'note.md');
    writeFileSync(file, 'café ✅\n', 'utf8');
    expect([...readLines(file)]).toEqual(['café ✅\n']);
  });

  it('yields nothing for an empty file', () => {
    const file = join(dir, 'empty.md');
    writeFileSync(file, '', 'utf8');
    expect([...readLines(file)]).toEqual([]);
  });

  it('propagates open errors', () => {
    const lines = readLines(join(dir, 'missing.md'));
    expect(() => lines.next()).toThrow(/ENOENT/);
  });

  it('can be abandoned part way through', () => {
    const file = join(dir, 'note.md');
    writeFileSync(file, 'one\ntwo\nthree\n', 'utf8');
    const lines = readLines(file);
    expect(lines.next()).toEqual({ value: 'one\n', done: false });
    expect(lines.return(undefined)).toEqual({ value: undefined, done: true });
    expect(lines.next()).toEqual({ value: undefined, done: true });
  });
});
