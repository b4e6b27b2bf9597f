/**
 * Audit Report Serialization
 *
 * @license Apache-2.0
 *
 * On-disk shapes of the audit report (JSON) and the structured finding
 * log (NDJSON). Keys are emitted in a fixed order.
 */

import { formatUtc } from '../policy/timestamps.js';
import {
  FINDING_LOG_EVENT,
  REPORT_SCHEMA_VERSION,
  type AuditResult,
  type Finding,
  type GateSummary,
  type ProfileScanStats,
} from '../types.js';

export interface FindingRecord {
  profile_id: string;
  target: string;
  crate: string;
  version: string;
  transitive_chain: string[];
  decision: Finding['decision'];
  decision_reason: string;
  remediation: string;
  risk_score: number;
  transition_status: Finding['transitionStatus'];
  transition_issue: string | null;
}

export interface ProfileStatsRecord {
  profile_id: string;
  target: string;
  command: string;
  line_count: number;
  finding_count: number;
  forbidden_count: number;
  conditional_count: number;
}

export interface GateRecord {
  passed: boolean;
  forbidden_count: number;
  unresolved_high_risk_count: number;
  expired_transition_count: number;
  high_risk_threshold: number;
}

export interface AuditReportDocument {
  schema_version: typeof REPORT_SCHEMA_VERSION;
  generated_at_utc: string;
  policy_path: string;
  policy_schema_version: string;
  profiles: ProfileStatsRecord[];
  gate: GateRecord;
  finding_count: number;
  findings: FindingRecord[];
}

export interface FindingLogRow extends FindingRecord {
  event: typeof FINDING_LOG_EVENT;
  ts_utc: string;
}

export function toFindingRecord(finding: Finding): FindingRecord {
  return {
    profile_id: finding.profileId,
    target: finding.target,
    crate: finding.crate,
    version: finding.version,
    transitive_chain: [...finding.ancestorChain],
    decision: finding.decision,
    decision_reason: finding.reason,
    remediation: finding.remediation,
    risk_score: finding.riskScore,
    transition_status: finding.transitionStatus,
    transition_issue: finding.transitionIssue,
  };
}

function toProfileStatsRecord(stats: ProfileScanStats): ProfileStatsRecord {
  return {
    profile_id: stats.profileId,
    target: stats.target,
    command: stats.command,
    line_count: stats.lineCount,
    finding_count: stats.findingCount,
    forbidden_count: stats.forbiddenCount,
    conditional_count: stats.conditionalCount,
  };
}

function toGateRecord(gate: GateSummary): GateRecord {
  return {
    passed: gate.passed,
    forbidden_count: gate.forbiddenCount,
    unresolved_high_risk_count: gate.unresolvedHighRiskCount,
    expired_transition_count: gate.expiredTransitionCount,
    high_risk_threshold: gate.highRiskThreshold,
  };
}

export function buildAuditReport(result: AuditResult): AuditReportDocument {
  return {
    schema_version: REPORT_SCHEMA_VERSION,
    generated_at_utc: formatUtc(result.generatedAt),
    policy_path: result.policyPath,
    policy_schema_version: result.policySchemaVersion,
    profiles: result.profiles.map(toProfileStatsRecord),
    gate: toGateRecord(result.gate),
    finding_count: result.findings.length,
    findings: result.findings.map(toFindingRecord),
  };
}

export function buildFindingLogRows(result: AuditResult): FindingLogRow[] {
  const ts = formatUtc(result.generatedAt);
  return result.findings.map(finding => ({
    event: FINDING_LOG_EVENT,
    ts_utc: ts,
    ...toFindingRecord(finding),
  }));
}
