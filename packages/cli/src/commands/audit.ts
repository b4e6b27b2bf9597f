/**
 * Audit Command - depgate audit
 *
 * Scan every selected build profile, classify dependencies against the
 * policy, write the JSON report and NDJSON finding log, and exit with
 * the gate verdict.
 *
 * Usage:
 *   depgate audit
 *   depgate audit --only-profile wasm32-default --format github
 *   depgate audit --now 2026-01-01T00:00:00Z --summary-output out/report.json
 */

import chalk from 'chalk';
import { Command } from 'commander';
import {
  AuditOrchestrator,
  CargoTreeSource,
  ConfigurationError,
  GitHubReporter,
  JsonReporter,
  NdjsonReporter,
  PolicyStore,
  TextReporter,
  isDepgateError,
  parseTimestamp,
  type AuditResult,
  type DepgateError,
  type DependencyTreeSource,
  type Logger,
  type Reporter,
} from 'depgate-core';

import { createConsoleLogger } from '../ui/console-logger.js';
import { EXIT_CODES, type ExitCode } from './exit-codes.js';

export const DEFAULT_POLICY_PATH = '.github/dependency_policy.json';

export type ConsoleFormat = 'text' | 'github' | 'json';

export interface AuditCommandOptions {
  /** Policy document path */
  policy?: string;
  /** Override the report path from the policy */
  summaryOutput?: string;
  /** Override the finding log path from the policy */
  logOutput?: string;
  /** Restrict the scan to these profile ids */
  onlyProfile?: string[];
  /** Evaluation time (explicit-offset timestamp) */
  now?: string;
  /** Reject listings that skip ancestor levels */
  strictTree?: boolean;
  /** Console output format */
  format?: string;
  /** Cargo executable */
  cargo?: string;
  /** Workspace root passed to cargo */
  cwd?: string;
  /** Enable verbose output */
  verbose?: boolean;
}

export interface AuditDependencies {
  /** Listing source; `cargo tree` when omitted */
  source?: DependencyTreeSource;
  logger?: Logger;
  /** Console sink for the rendered report */
  print?: (text: string) => void;
}

const ERROR_LABELS: Record<DepgateError['code'], string> = {
  configuration: 'Dependency policy configuration error',
  parse: 'Dependency listing parse error',
  'external-tool': 'Dependency listing command failed',
};

function defaultPrint(text: string): void {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
}

function resolveFormat(format: string | undefined): ConsoleFormat {
  const value = format ?? (process.env['CI'] ? 'github' : 'text');
  if (value === 'text' || value === 'github' || value === 'json') {
    return value;
  }
  throw new ConfigurationError(`unsupported format: ${value} (expected text, github or json)`);
}

function resolveNow(raw: string | undefined): Date {
  if (raw === undefined) return new Date();
  const parsed = parseTimestamp(raw);
  if (parsed === null) {
    throw new ConfigurationError(`--now must be an ISO-8601 timestamp with an explicit timezone offset: ${raw}`);
  }
  return parsed;
}

function getReporter(format: ConsoleFormat): Reporter {
  switch (format) {
    case 'json': return new JsonReporter();
    case 'github': return new GitHubReporter();
    case 'text':
    default: return new TextReporter();
  }
}

function verdictLine(result: AuditResult): string {
  const { gate } = result;
  if (gate.passed) {
    return chalk.green(
      `✓ Dependency policy gate passed: findings=${result.findings.length} forbidden=${gate.forbiddenCount} ` +
        `unresolved_high_risk=${gate.unresolvedHighRiskCount} expired_transitions=${gate.expiredTransitionCount}`
    );
  }
  return chalk.red(
    `✗ Dependency policy gate failed: forbidden=${gate.forbiddenCount} ` +
      `unresolved_high_risk=${gate.unresolvedHighRiskCount} expired_transitions=${gate.expiredTransitionCount}`
  );
}

/**
 * Run the audit and return the process exit code.
 */
export async function runAudit(
  options: AuditCommandOptions,
  deps: AuditDependencies = {}
): Promise<ExitCode> {
  const logger = deps.logger ?? createConsoleLogger({ verbose: options.verbose ?? false });
  const print = deps.print ?? defaultPrint;

  try {
    const format = resolveFormat(options.format);
    const now = resolveNow(options.now);
    const policy = await PolicyStore.load(options.policy ?? DEFAULT_POLICY_PATH);

    const source = deps.source ?? new CargoTreeSource({ cargoBin: options.cargo, cwd: options.cwd, logger });
    const orchestrator = new AuditOrchestrator(policy, source, {
      logger,
      strictAncestry: options.strictTree ?? false,
    });

    const result = await orchestrator.run({ profileIds: options.onlyProfile ?? [], now });

    const summaryPath = options.summaryOutput || policy.output.summaryPath;
    const logPath = options.logOutput || policy.output.logPath;

    const jsonReporter = new JsonReporter();
    await jsonReporter.write(jsonReporter.generate(result), { outputPath: summaryPath });
    const ndjsonReporter = new NdjsonReporter();
    await ndjsonReporter.write(ndjsonReporter.generate(result), { outputPath: logPath });

    const verbose = options.verbose ?? false;
    print(getReporter(format).generate(result, { verbose }));

    if (format !== 'json') {
      print(verdictLine(result));
      if (!result.gate.passed) {
        print(`Summary: ${summaryPath}`);
        print(`Log: ${logPath}`);
      }
    }

    return result.gate.passed ? EXIT_CODES.passed : EXIT_CODES.gateFailed;
  } catch (error) {
    if (isDepgateError(error)) {
      logger.error(`${ERROR_LABELS[error.code]}: ${error.message}`);
      return EXIT_CODES.error;
    }
    throw error;
  }
}

/**
 * Option reducer for repeatable flags.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the audit command.
 */
export function createAuditCommand(): Command {
  return new Command('audit')
    .description('Scan build profiles and enforce the dependency policy')
    .option('-p, --policy <path>', 'Policy JSON path', DEFAULT_POLICY_PATH)
    .option('--summary-output <path>', 'Override the JSON report path from the policy')
    .option('--log-output <path>', 'Override the NDJSON finding log path from the policy')
    .option('--only-profile <id>', 'Restrict the scan to a profile (repeatable)', collect, [])
    .option('--now <timestamp>', 'Evaluate transitions at this time instead of the wall clock')
    .option('--strict-tree', 'Fail when the listing skips an ancestor level')
    .option('-f, --format <format>', 'Console output format (text, github, json)')
    .option('--cargo <bin>', 'Cargo executable', 'cargo')
    .option('--cwd <dir>', 'Workspace root passed to cargo')
    .option('-v, --verbose', 'Verbose output with non-blocking findings')
    .action(async (options: AuditCommandOptions) => {
      process.exitCode = await runAudit(options);
    });
}
