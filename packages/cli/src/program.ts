/**
 * depgate program definition
 *
 * Sets up Commander.js with the audit and validate commands. Commander's
 * own exits are turned into exceptions so that argument errors map to the
 * configuration error code instead of the gate failure code.
 */

import { Command, CommanderError, type OutputConfiguration } from 'commander';
import { createAuditCommand, createValidateCommand, EXIT_CODES, type ExitCode } from './commands/index.js';
import { VERSION } from './version.js';

export type ProgramOutput = OutputConfiguration;

/**
 * Create and configure the main CLI program
 */
export function createProgram(output?: ProgramOutput): Command {
  const program = new Command();

  program
    .name('depgate')
    .description('Dependency policy audit gate for multi-profile Rust workspaces')
    .version(VERSION, '-V, --version', 'Output the current version');

  program.addCommand(createAuditCommand());
  program.addCommand(createValidateCommand());

  // addCommand does not copy settings onto existing subcommands
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    if (output) {
      command.configureOutput(output);
    }
  }

  program.addHelpText(
    'after',
    `
Examples:
  $ depgate validate                                 Check .github/dependency_policy.json
  $ depgate audit                                    Scan every profile in the policy
  $ depgate audit --only-profile wasm32-default      Scan one profile
  $ depgate audit --format github                    Emit GitHub Actions annotations
  $ depgate audit --now 2026-01-01T00:00:00Z         Evaluate transitions at a fixed time

Exit codes:
  0  gate passed
  1  gate failed (policy violation)
  2  configuration, parse, usage or cargo error
`
  );

  return program;
}

/**
 * Exit code for an error that escaped the command actions.
 *
 * Commander has already printed its own message; help and version
 * requests exit cleanly.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.passed : EXIT_CODES.error;
  }

  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
    if (process.env['DEBUG']) {
      console.error(error.stack);
    }
  } else {
    console.error('An unexpected error occurred');
  }
  return EXIT_CODES.error;
}
