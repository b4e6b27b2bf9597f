/**
 * CLI program tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CommanderError } from 'commander';
import { createProgram, exitCodeForError } from './program.js';
import { EXIT_CODES } from './commands/exit-codes.js';
import { createAuditCommand } from './commands/audit.js';
import { createValidateCommand } from './commands/validate.js';

async function parseError(args: string[]): Promise<{ error: unknown; out: string; err: string }> {
  let out = '';
  let err = '';
  const program = createProgram({
    writeOut: (text) => {
      out += text;
    },
    writeErr: (text) => {
      err += text;
    },
  });

  try {
    await program.parseAsync(['node', 'depgate', ...args]);
  } catch (error) {
    return { error, out, err };
  }
  throw new Error(`expected ${args.join(' ')} to be rejected`);
}

describe('createProgram', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register the audit and validate commands', () => {
    expect(createProgram().commands.map(command => command.name())).toEqual(['audit', 'validate']);
  });

  it('should map an unknown audit option to the error exit code', async () => {
    const { error, err } = await parseError(['audit', '--bogus']);

    expect(error).toBeInstanceOf(CommanderError);
    expect(err).toContain("unknown option '--bogus'");
    expect(exitCodeForError(error)).toBe(EXIT_CODES.error);
  });

  it('should map a missing option argument to the error exit code', async () => {
    const { error } = await parseError(['validate', '--policy']);

    expect(error).toBeInstanceOf(CommanderError);
    expect(exitCodeForError(error)).toBe(EXIT_CODES.error);
  });

  it('should map an unknown command to the error exit code', async () => {
    const { error } = await parseError(['bogus']);

    expect(error).toBeInstanceOf(CommanderError);
    expect(exitCodeForError(error)).toBe(EXIT_CODES.error);
  });

  it('should exit cleanly after printing the version', async () => {
    const { error, out } = await parseError(['--version']);

    expect(out).toBe('0.1.0\n');
    expect(exitCodeForError(error)).toBe(EXIT_CODES.passed);
  });

  it('should map unexpected errors to the error exit code', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(exitCodeForError(new Error('boom'))).toBe(EXIT_CODES.error);
    expect(consoleError).toHaveBeenCalledWith('Error: boom');
  });
});

describe('--only-profile', () => {
  it.each([
    ['audit', createAuditCommand],
    ['validate', createValidateCommand],
  ])('should accumulate repeated values for %s', async (_name, create) => {
    const command = create();
    command.exitOverride();
    command.action(() => undefined);

    await command.parseAsync(['--only-profile', 'wasm-full', '--only-profile', 'linux'], { from: 'user' });

    expect(command.opts()['onlyProfile']).toEqual(['wasm-full', 'linux']);
  });
});
