import { describe, it, expect, afterEach, vi } from 'vitest';
import { BuildError, ParseError, SchemaError } from '@phiql/compiler';
import { CliError, describeFailure, formatFailure, reportFailure } from '../diagnostics.js';

describe('describeFailure', () => {
  it('maps compile errors to their stage and exit code', () => {
    expect(describeFailure(new ParseError('bad arity', { field: 'n', line: 2, column: 4 }))).toEqual({
      stage: 'parse',
      cause: 'n (line 2, column 4): bad arity',
      exitCode: 2,
    });
    expect(describeFailure(new BuildError('no shared attribute', 'c'))).toEqual({
      stage: 'build',
      cause: 'no shared attribute',
      exitCode: 4,
    });
  });

  it('uses the one-line summary of schema errors', () => {
    const err = new SchemaError([
      { severity: 'error', code: 'arity-mismatch', field: 'n', line: 2, message: 'arity n = 2 but S declares 3 attribute(s)' },
    ]);

    expect(formatFailure(describeFailure(err))).toBe(
      'error[validate] 1 problem: n (line 2): arity n = 2 but S declares 3 attribute(s)',
    );
  });

  it('maps CLI errors to io or config with exit code 1', () => {
    expect(describeFailure(new CliError('config', 'bad flag'))).toEqual({ stage: 'config', cause: 'bad flag', exitCode: 1 });
  });

  it('treats anything else as an io failure', () => {
    expect(describeFailure(new Error('EACCES'))).toEqual({ stage: 'io', cause: 'EACCES', exitCode: 1 });
    expect(describeFailure('boom')).toEqual({ stage: 'io', cause: 'boom', exitCode: 1 });
  });
});

describe('formatFailure', () => {
  it('keeps the line single', () => {
    expect(formatFailure({ stage: 'io', cause: 'first\n  second', exitCode: 1 })).toBe('error[io] first second');
  });
});

describe('reportFailure', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints one line and sets the exit code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const failure = reportFailure(new CliError('io', 'spec file not found: a.phi'));

    expect(failure.exitCode).toBe(1);
    expect(process.exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('error[io] spec file not found: a.phi');
  });
});
