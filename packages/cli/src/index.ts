/**
 * depgate-cli - Command-line interface for the dependency policy gate
 *
 * This package provides CLI commands:
 * - depgate audit: Scan build profiles and enforce the policy
 * - depgate validate: Check the policy document
 */

export { VERSION } from './version.js';
export { createProgram, exitCodeForError } from './program.js';
export type { ProgramOutput } from './program.js';

// Command exports (for programmatic use)
export {
  createAuditCommand,
  createValidateCommand,
  runAudit,
  runValidate,
  DEFAULT_POLICY_PATH,
  EXIT_CODES,
} from './commands/index.js';
export type {
  AuditCommandOptions,
  AuditDependencies,
  ConsoleFormat,
  ValidateCommandOptions,
  ValidateDependencies,
  ExitCode,
} from './commands/index.js';

export { createConsoleLogger } from './ui/console-logger.js';
export type { ConsoleLoggerOptions } from './ui/console-logger.js';
