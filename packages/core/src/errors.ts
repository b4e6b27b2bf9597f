/**
 * Error Types
 *
 * @license Apache-2.0
 *
 * Fatal errors raised before or during a scan. A failing gate is a
 * normal result and is never signalled through these classes.
 */

export type DepgateErrorCode = 'configuration' | 'parse' | 'external-tool';

/**
 * Base class for every fatal depgate error.
 */
export abstract class DepgateError extends Error {
  abstract readonly code: DepgateErrorCode;
}

/**
 * The policy document is malformed or self-contradictory, or the
 * requested profile selection is invalid.
 */
export class ConfigurationError extends DepgateError {
  readonly code = 'configuration' as const;
  readonly issues: readonly string[];

  constructor(issues: string | readonly string[]) {
    const list = typeof issues === 'string' ? [issues] : [...issues];
    super(list.length === 1 ? (list[0] ?? '') : `${list.length} problems:\n  - ${list.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.issues = list;
  }
}

/**
 * A dependency listing line does not match the depth-prefix grammar.
 */
export class ParseError extends DepgateError {
  readonly code = 'parse' as const;

  constructor(
    message: string,
    public readonly lineNumber: number,
    public readonly line: string,
    public readonly profileId?: string
  ) {
    super(`${profileId ? `profile ${profileId}: ` : ''}line ${lineNumber}: ${message}: ${JSON.stringify(line)}`);
    this.name = 'ParseError';
  }
}

/**
 * The external dependency listing command failed or is unavailable.
 */
export class ExternalToolError extends DepgateError {
  readonly code = 'external-tool' as const;

  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'ExternalToolError';
  }
}

export function isDepgateError(error: unknown): error is DepgateError {
  return error instanceof DepgateError;
}
