import { describe, it, expect } from 'vitest';
import { isOutputDirectoryOption, parseInvocation } from '../../src/cli/parse-invocation.js';

describe('parseInvocation', () => {
  it('rejects an empty argument list', () => {
    expect(parseInvocation([])._unsafeUnwrapErr()).toEqual({ _tag: 'UsageError', message: 'Missing document to compile' });
  });

  it('selects clean for a lone -clean', () => {
    expect(parseInvocation(['-clean'])._unsafeUnwrap()).toEqual({ kind: 'clean' });
  });

  it('treats -clean among other arguments as an engine option', () => {
    expect(parseInvocation(['-clean', 'paper.tex'])._unsafeUnwrap()).toEqual({
      kind: 'compile',
      engineOptions: ['-clean'],
      document: 'paper.tex',
    });
  });

  it('takes the last argument as the document and passes the rest through in order', () => {
    expect(parseInvocation(['-halt-on-error', '-interaction=nonstopmode', 'book/main.tex'])._unsafeUnwrap()).toEqual({
      kind: 'compile',
      engineOptions: ['-halt-on-error', '-interaction=nonstopmode'],
      document: 'book/main.tex',
    });
  });

  it('accepts a lone document', () => {
    expect(parseInvocation(['paper.tex'])._unsafeUnwrap()).toEqual({ kind: 'compile', engineOptions: [], document: 'paper.tex' });
  });

  it.each([
    [['-output-directory', '/x', 'paper.tex'], '-output-directory'],
    [['--output-directory', '/x', 'paper.tex'], '--output-directory'],
    [['-output-directory=/x', 'paper.tex'], '-output-directory=/x'],
    [['--output-directory=/x', 'paper.tex'], '--output-directory=/x'],
    [['-output-dir=/x', 'paper.tex'], '-output-dir=/x'],
    [['-halt-on-error', '-output-d', '/x', 'paper.tex'], '-output-d'],
  ])('refuses a caller-supplied output directory (%j)', (args, reserved) => {
    expect(parseInvocation(args)._unsafeUnwrapErr().message).toBe(
      `"${reserved}" flag not allowed: texloop sets the output directory itself`
    );
  });
});

describe('isOutputDirectoryOption', () => {
  it('matches only the reserved option', () => {
    expect(isOutputDirectoryOption('-output-directory')).toBe(true);
    expect(isOutputDirectoryOption('--output-directory=out')).toBe(true);
    expect(isOutputDirectoryOption('-output-directory-extra')).toBe(false);
    expect(isOutputDirectoryOption('-output-format=pdf')).toBe(false);
    expect(isOutputDirectoryOption('output-directory')).toBe(false);
  });

  it('matches unambiguous prefixes of the option name', () => {
    expect(isOutputDirectoryOption('-output-dir=x')).toBe(true);
    expect(isOutputDirectoryOption('--output-direc')).toBe(true);
    expect(isOutputDirectoryOption('-output-d')).toBe(true);
  });

  it('leaves prefixes shared with other output options alone', () => {
    expect(isOutputDirectoryOption('-output-')).toBe(false);
    expect(isOutputDirectoryOption('-output')).toBe(false);
    expect(isOutputDirectoryOption('-output-comment=x')).toBe(false);
    expect(isOutputDirectoryOption('-output-dirx')).toBe(false);
    expect(isOutputDirectoryOption('-')).toBe(false);
    expect(isOutputDirectoryOption('--=x')).toBe(false);
  });
});
