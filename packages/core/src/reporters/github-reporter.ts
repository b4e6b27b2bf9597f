/**
 * GitHub Reporter
 *
 * @license Apache-2.0
 *
 * GitHub Actions reporter with workflow command annotations.
 */

import { BaseReporter } from './reporter-interface.js';
import { isBlocking } from '../gate/gate-evaluator.js';
import type { AuditResult, Finding, ReporterOptions } from '../types.js';

/**
 * Escape a workflow command message.
 */
export function escapeCommandData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

export class GitHubReporter extends BaseReporter {
  readonly id = 'github';
  readonly format = 'github' as const;

  generate(result: AuditResult, _options?: ReporterOptions): string {
    const lines: string[] = [];
    const { gate } = result;

    for (const finding of result.findings) {
      const level = isBlocking(finding, gate.highRiskThreshold) ? 'error' : 'warning';
      lines.push(this.formatAnnotation(level, finding));
    }

    lines.push('::group::Dependency Policy Summary');
    lines.push(`Status: ${gate.passed ? '✅ Passed' : '❌ Failed'}`);
    lines.push(`Forbidden: ${gate.forbiddenCount}`);
    lines.push(`Unresolved high risk: ${gate.unresolvedHighRiskCount} (threshold ${gate.highRiskThreshold})`);
    lines.push(`Expired transitions: ${gate.expiredTransitionCount}`);
    for (const profile of result.profiles) {
      lines.push(
        `${profile.profileId} (${profile.target}): ${profile.lineCount} lines, ` +
          `${profile.forbiddenCount} forbidden, ${profile.conditionalCount} conditional`
      );
    }
    lines.push('::endgroup::');

    return lines.join('\n');
  }

  private formatAnnotation(level: 'error' | 'warning', finding: Finding): string {
    const message =
      `[${finding.profileId}] ${finding.crate} ${finding.version} is ${finding.decision} ` +
      `(risk ${finding.riskScore}, transition ${finding.transitionStatus}): ${finding.reason}\n` +
      `chain: ${finding.ancestorChain.join(' > ')}\n` +
      `fix: ${finding.remediation}`;
    return `::${level} title=Dependency policy::${escapeCommandData(message)}`;
  }
}
