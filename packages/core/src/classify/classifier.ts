/**
 * Classifier
 *
 * @license Apache-2.0
 *
 * Assigns a policy decision to a crate name. Forbidden entries take
 * precedence over conditional ones; names in neither map are outside
 * policy scope and produce no finding.
 */

import type { Classification, Decision, PolicyEntry, PolicyMaps } from '../types.js';
import { evaluateTransition } from './transition-validity.js';

export function classifyDependency(
  crate: string,
  maps: PolicyMaps,
  now: Date
): Classification | null {
  let decision: Decision;
  let entry: PolicyEntry | undefined = maps.forbidden.get(crate);
  if (entry) {
    decision = 'forbidden';
  } else {
    entry = maps.conditional.get(crate);
    if (!entry) return null;
    decision = 'conditional';
  }

  const transition = maps.transitions.get(crate);

  return {
    decision,
    reason: entry.reason,
    remediation: entry.remediation,
    riskScore: entry.riskScore,
    transitionStatus: evaluateTransition(transition, now),
    transitionIssue: transition?.replacementIssue ?? null,
  };
}
