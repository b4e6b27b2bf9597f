/**
 * Text Reporter
 *
 * @license Apache-2.0
 *
 * Human-readable summary with an itemized list of blocking findings.
 */

import { BaseReporter } from './reporter-interface.js';
import { isBlocking } from '../gate/gate-evaluator.js';
import type { AuditResult, Finding, ReporterOptions } from '../types.js';

export class TextReporter extends BaseReporter {
  readonly id = 'text';
  readonly format = 'text' as const;

  generate(result: AuditResult, options?: ReporterOptions): string {
    const lines: string[] = [];
    const verbose = options?.verbose ?? false;
    const { gate } = result;

    // Header
    lines.push('');
    lines.push('═'.repeat(60));
    lines.push('  DEPENDENCY POLICY GATE');
    lines.push('═'.repeat(60));
    lines.push('');

    lines.push(`  Status:    ${gate.passed ? '✅ PASSED' : '❌ FAILED'}`);
    lines.push(`  Policy:    ${result.policyPath}`);
    lines.push(`  Profiles:  ${result.profiles.map(p => p.profileId).join(', ')}`);
    lines.push(`  Findings:  ${result.findings.length}`);
    lines.push('');
    lines.push(`  Forbidden:             ${gate.forbiddenCount}`);
    lines.push(`  Unresolved high risk:  ${gate.unresolvedHighRiskCount} (threshold ${gate.highRiskThreshold})`);
    lines.push(`  Expired transitions:   ${gate.expiredTransitionCount}`);
    lines.push('');

    const blocking = result.findings.filter(f => isBlocking(f, gate.highRiskThreshold));
    const other = result.findings.filter(f => !isBlocking(f, gate.highRiskThreshold));

    if (blocking.length > 0) {
      lines.push('─'.repeat(60));
      lines.push('  BLOCKING FINDINGS');
      lines.push('─'.repeat(60));
      lines.push('');
      for (const finding of blocking) {
        lines.push(...this.formatFinding('❌', finding));
      }
    }

    if (verbose && other.length > 0) {
      lines.push('─'.repeat(60));
      lines.push('  TRACKED FINDINGS');
      lines.push('─'.repeat(60));
      lines.push('');
      for (const finding of other) {
        lines.push(...this.formatFinding('ℹ️', finding));
      }
    } else if (other.length > 0) {
      lines.push(`  ${other.length} non-blocking finding(s) hidden; use --verbose to list them`);
      lines.push('');
    }

    // Footer
    lines.push('═'.repeat(60));
    lines.push('');

    return lines.join('\n');
  }

  private formatFinding(icon: string, finding: Finding): string[] {
    const lines = [
      `  ${icon} [${finding.profileId}] ${finding.crate} ${finding.version} (${finding.decision}, risk ${finding.riskScore})`,
      `     ${finding.reason}`,
      `     chain: ${finding.ancestorChain.join(' > ')}`,
      `     fix: ${finding.remediation}`,
    ];
    if (finding.transitionStatus !== 'none') {
      lines.push(`     transition: ${finding.transitionStatus}${finding.transitionIssue ? ` (${finding.transitionIssue})` : ''}`);
    }
    lines.push('');
    return lines;
  }
}
