/**
 * JSON Reporter
 *
 * @license Apache-2.0
 *
 * Machine-readable audit report.
 */

import { BaseReporter } from './reporter-interface.js';
import { buildAuditReport } from '../report/audit-report.js';
import type { AuditResult, ReporterOptions } from '../types.js';

export class JsonReporter extends BaseReporter {
  readonly id = 'json';
  readonly format = 'json' as const;

  generate(result: AuditResult, _options?: ReporterOptions): string {
    return `${JSON.stringify(buildAuditReport(result), null, 2)}\n`;
  }
}
