/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { createAuditCommand, runAudit, DEFAULT_POLICY_PATH } from './audit.js';
export type { AuditCommandOptions, AuditDependencies, ConsoleFormat } from './audit.js';
export { createValidateCommand, runValidate } from './validate.js';
export type { ValidateCommandOptions, ValidateDependencies } from './validate.js';
export { EXIT_CODES } from './exit-codes.js';
export type { ExitCode } from './exit-codes.js';
