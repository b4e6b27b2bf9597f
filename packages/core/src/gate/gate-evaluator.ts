/**
 * Gate Evaluator
 *
 * @license Apache-2.0
 *
 * Aggregates findings from every scanned profile into one verdict.
 *
 * - Forbidden findings always block; no transition exempts them.
 * - Findings at or above the high-risk threshold block unless an
 *   active or resolved transition covers them.
 * - Expired transitions block regardless of decision or risk.
 */

import type { Finding, GateSummary } from '../types.js';

export function evaluateGate(
  findings: readonly Pick<Finding, 'decision' | 'riskScore' | 'transitionStatus'>[],
  highRiskThreshold: number
): GateSummary {
  let forbiddenCount = 0;
  let unresolvedHighRiskCount = 0;
  let expiredTransitionCount = 0;

  for (const finding of findings) {
    if (finding.decision === 'forbidden') {
      forbiddenCount++;
    }
    if (
      finding.riskScore >= highRiskThreshold &&
      finding.transitionStatus !== 'active' &&
      finding.transitionStatus !== 'resolved'
    ) {
      unresolvedHighRiskCount++;
    }
    if (finding.transitionStatus === 'expired') {
      expiredTransitionCount++;
    }
  }

  return {
    passed: forbiddenCount === 0 && unresolvedHighRiskCount === 0 && expiredTransitionCount === 0,
    forbiddenCount,
    unresolvedHighRiskCount,
    expiredTransitionCount,
    highRiskThreshold,
  };
}

/**
 * Whether a single finding contributes to a failing verdict.
 */
export function isBlocking(
  finding: Pick<Finding, 'decision' | 'riskScore' | 'transitionStatus'>,
  highRiskThreshold: number
): boolean {
  return !evaluateGate([finding], highRiskThreshold).passed;
}
