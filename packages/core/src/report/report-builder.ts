/**
 * Report Builder
 *
 * @license Apache-2.0
 *
 * Deduplicates findings and puts them in a deterministic order so that
 * identical inputs and an identical `now` give byte-identical output.
 */

import { CHAIN_DELIMITER, type Finding } from '../types.js';

function identityKey(finding: Finding): string {
  return JSON.stringify([
    finding.profileId,
    finding.crate,
    finding.version,
    finding.decision,
    finding.ancestorChain,
  ]);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ascending by profile, decision, crate, version, then rendered chain.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareText(a.profileId, b.profileId) ||
    compareText(a.decision, b.decision) ||
    compareText(a.crate, b.crate) ||
    compareText(a.version, b.version) ||
    compareText(a.ancestorChain.join(CHAIN_DELIMITER), b.ancestorChain.join(CHAIN_DELIMITER))
  );
}

/**
 * Collapse duplicate findings and sort the remainder.
 */
export function buildFindingList(findings: Iterable<Finding>): Finding[] {
  const unique = new Map<string, Finding>();
  for (const finding of findings) {
    const key = identityKey(finding);
    if (!unique.has(key)) {
      unique.set(key, finding);
    }
  }
  return [...unique.values()].sort(compareFindings);
}
