/**
 * NDJSON Reporter
 *
 * @license Apache-2.0
 *
 * Structured finding log: one self-contained object per line.
 */

import { BaseReporter } from './reporter-interface.js';
import { buildFindingLogRows } from '../report/audit-report.js';
import type { AuditResult, ReporterOptions } from '../types.js';

export class NdjsonReporter extends BaseReporter {
  readonly id = 'ndjson';
  readonly format = 'ndjson' as const;

  generate(result: AuditResult, _options?: ReporterOptions): string {
    return buildFindingLogRows(result)
      .map(row => `${JSON.stringify(row)}\n`)
      .join('');
  }
}
