/**
 * Process exit codes
 */
export const EXIT_CODES = {
  /** Gate passed */
  passed: 0,
  /** Gate failed: a policy violation was found */
  gateFailed: 1,
  /** Policy invalid, listing unparseable, external tool failed, or bad profile selection */
  error: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
