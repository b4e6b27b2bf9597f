/**
 * Validate Command - depgate validate
 *
 * Check a policy document without scanning anything, and report the
 * current status of every tracked transition.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import {
  PolicyStore,
  evaluateTransition,
  formatUtc,
  isDepgateError,
  parseTimestamp,
  resolveProfiles,
  ConfigurationError,
  type Logger,
} from 'depgate-core';

import { createConsoleLogger } from '../ui/console-logger.js';
import { DEFAULT_POLICY_PATH, collect } from './audit.js';
import { EXIT_CODES, type ExitCode } from './exit-codes.js';

export interface ValidateCommandOptions {
  policy?: string;
  onlyProfile?: string[];
  now?: string;
}

export interface ValidateDependencies {
  logger?: Logger;
  print?: (text: string) => void;
}

/**
 * Validate the policy and return the process exit code.
 */
export async function runValidate(
  options: ValidateCommandOptions,
  deps: ValidateDependencies = {}
): Promise<ExitCode> {
  const logger = deps.logger ?? createConsoleLogger();
  const print = deps.print ?? ((text: string) => console.log(text));

  try {
    let now = new Date();
    if (options.now !== undefined) {
      const parsed = parseTimestamp(options.now);
      if (parsed === null) {
        throw new ConfigurationError(`--now must be an ISO-8601 timestamp with an explicit timezone offset: ${options.now}`);
      }
      now = parsed;
    }

    const policy = await PolicyStore.load(options.policy ?? DEFAULT_POLICY_PATH);
    const profiles = resolveProfiles(policy.profiles, options.onlyProfile ?? []);

    print(
      chalk.green(
        `✓ Policy valid: ${profiles.length} profile(s), ${policy.forbidden.size} forbidden, ` +
          `${policy.conditional.size} conditional, ${policy.transitions.size} transition(s), ` +
          `high risk threshold ${policy.highRiskThreshold}`
      )
    );

    const crates = [...policy.transitions.keys()].sort();
    for (const crate of crates) {
      const transition = policy.transitions.get(crate);
      if (!transition) continue;
      const status = evaluateTransition(transition, now);
      const line =
        `  ${crate}: ${status} (${transition.replacementIssue}, owner ${transition.owner}, ` +
        `expires ${formatUtc(transition.expiresAt)})`;
      print(status === 'expired' ? chalk.yellow(line) : line);
    }

    return EXIT_CODES.passed;
  } catch (error) {
    if (isDepgateError(error)) {
      logger.error(`Dependency policy configuration error: ${error.message}`);
      return EXIT_CODES.error;
    }
    throw error;
  }
}

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate the policy document and show transition status')
    .option('-p, --policy <path>', 'Policy JSON path', DEFAULT_POLICY_PATH)
    .option('--only-profile <id>', 'Check that a profile exists (repeatable)', collect, [])
    .option('--now <timestamp>', 'Evaluate transitions at this time instead of the wall clock')
    .action(async (options: ValidateCommandOptions) => {
      process.exitCode = await runValidate(options);
    });
}
