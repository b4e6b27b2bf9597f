/**
 * Reporter Interface
 *
 * @license Apache-2.0
 *
 * Interface for audit reporters.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { AuditResult, OutputFormat, ReporterOptions } from '../types.js';

/**
 * Interface for audit reporters.
 */
export interface Reporter {
  /** Reporter ID */
  readonly id: string;

  /** Format this reporter produces */
  readonly format: OutputFormat;

  /**
   * Generate report string from result.
   */
  generate(result: AuditResult, options?: ReporterOptions): string;

  /**
   * Write report to a file, or to stdout when no path is given.
   */
  write(report: string, options?: ReporterOptions): Promise<void>;
}

/**
 * Base class for reporters.
 */
export abstract class BaseReporter implements Reporter {
  abstract readonly id: string;
  abstract readonly format: OutputFormat;

  abstract generate(result: AuditResult, options?: ReporterOptions): string;

  async write(report: string, options?: ReporterOptions): Promise<void> {
    if (options?.outputPath) {
      await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
      await fs.writeFile(options.outputPath, report, 'utf-8');
    } else {
      process.stdout.write(report.endsWith('\n') ? report : `${report}\n`);
    }
  }
}
