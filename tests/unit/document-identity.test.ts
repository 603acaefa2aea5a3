import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { resolveDocumentIdentity } from '../../src/domain/document-identity.js';

describe('resolveDocumentIdentity', () => {
  it('strips .tex and splits the volume off an absolute stem', () => {
    const identity = resolveDocumentIdentity('paper.tex', '/home/u/docs', path.posix);

    expect(identity).toEqual({
      documentArg: 'paper.tex',
      stem: '/home/u/docs/paper',
      volume: '/',
      relativeStem: 'home/u/docs/paper',
      baseName: 'paper',
    });
  });

  it('keeps the argument untouched for the engine', () => {
    const identity = resolveDocumentIdentity('../x/./paper.tex', '/a/b', path.posix);
    expect(identity.documentArg).toBe('../x/./paper.tex');
    expect(identity.stem).toBe('/a/x/paper');
  });

  it('keeps extensions other than .tex as part of the name', () => {
    expect(resolveDocumentIdentity('notes.md', '/d', path.posix).baseName).toBe('notes.md');
    expect(resolveDocumentIdentity('paper', '/d', path.posix).stem).toBe('/d/paper');
    expect(resolveDocumentIdentity('a.tex.tex', '/d', path.posix).stem).toBe('/d/a.tex');
  });

  it('accepts an absolute argument regardless of cwd', () => {
    expect(resolveDocumentIdentity('/srv/book/main.tex', '/elsewhere', path.posix).relativeStem).toBe('srv/book/main');
  });

  it('records the drive as the volume on Windows paths', () => {
    const identity = resolveDocumentIdentity('paper.tex', 'C:\\Users\\u', path.win32);

    expect(identity.stem).toBe('C:\\Users\\u\\paper');
    expect(identity.volume).toBe('C:\\');
    expect(identity.relativeStem).toBe('Users\\u\\paper');
    expect(identity.baseName).toBe('paper');
  });
});
