/**
 * Dependency Policy Gate - Type Definitions
 *
 * @license Apache-2.0
 *
 * Shared types for the policy store, tree parser, classifier,
 * gate evaluator and reporters.
 */

// =============================================================================
// SECTION 1: Core Enums and Constants
// =============================================================================

/**
 * Policy decision for a dependency occurrence.
 * Allowed occurrences never produce findings.
 */
export type Decision = 'forbidden' | 'conditional';

/**
 * Stored status of a transition record.
 */
export type TransitionRecordStatus = 'active' | 'resolved';

/**
 * Temporal status of a transition, computed at evaluation time.
 */
export type TransitionStatus = 'none' | 'active' | 'expired' | 'resolved';

/**
 * Output format options for the console reporter
 */
export type OutputFormat = 'text' | 'json' | 'ndjson' | 'github';

export const POLICY_SCHEMA_VERSION = 'dependency-policy-v1';
export const REPORT_SCHEMA_VERSION = 'dependency-audit-report-v1';
export const FINDING_LOG_EVENT = 'dependency_policy_finding';

/** Placeholder inserted when the listing skips an ancestor level. */
export const MISSING_PARENT = '<missing-parent>';

/** Version recorded when the listing carries no `v`-prefixed version. */
export const UNKNOWN_VERSION = 'v?';

/** Delimiter used when an ancestor chain is rendered as one string. */
export const CHAIN_DELIMITER = '>';

// =============================================================================
// SECTION 2: Policy Types
// =============================================================================

/**
 * A forbidden or conditional crate entry.
 */
export interface PolicyEntry {
  readonly name: string;
  readonly reason: string;
  readonly remediation: string;
  /** Integer in [0, 100] */
  readonly riskScore: number;
}

/**
 * A time-boxed exception tracking removal or replacement of a crate.
 */
export interface Transition {
  readonly crate: string;
  readonly status: TransitionRecordStatus;
  readonly owner: string;
  readonly replacementIssue: string;
  /** Timestamp as written in the policy, with explicit offset */
  readonly expiresAtRaw: string;
  /** Parsed expiry */
  readonly expiresAt: Date;
  readonly notes: string;
}

/**
 * A build profile (target triple plus feature selection).
 */
export interface Profile {
  readonly id: string;
  readonly target: string;
  readonly allFeatures: boolean;
  readonly noDefaultFeatures: boolean;
  /** Sorted feature names */
  readonly features: readonly string[];
}

export interface OutputPaths {
  readonly summaryPath: string;
  readonly logPath: string;
}

/**
 * Lookup maps consumed by the classifier.
 */
export interface PolicyMaps {
  readonly forbidden: ReadonlyMap<string, PolicyEntry>;
  readonly conditional: ReadonlyMap<string, PolicyEntry>;
  readonly transitions: ReadonlyMap<string, Transition>;
}

// =============================================================================
// SECTION 3: Scan Types
// =============================================================================

/**
 * One parsed line of a depth-prefixed dependency listing.
 */
export interface TreeLine {
  readonly depth: number;
  readonly crate: string;
  readonly version: string;
}

/**
 * A dependency occurrence with its full ancestor chain.
 */
export interface DependencyOccurrence {
  readonly profileId: string;
  readonly crate: string;
  readonly version: string;
  /** Crate names from workspace root to this node, inclusive */
  readonly ancestorChain: readonly string[];
}

/**
 * Raw listing returned by a dependency tree source.
 */
export interface DependencyListing {
  /** Human-readable command that produced the listing */
  readonly command: string;
  readonly lines: readonly string[];
}

/**
 * Result of classifying a single crate name.
 */
export interface Classification {
  readonly decision: Decision;
  readonly reason: string;
  readonly remediation: string;
  readonly riskScore: number;
  readonly transitionStatus: TransitionStatus;
  readonly transitionIssue: string | null;
}

/**
 * A non-allowed dependency occurrence.
 */
export interface Finding extends Classification {
  readonly profileId: string;
  readonly target: string;
  readonly crate: string;
  readonly version: string;
  readonly ancestorChain: readonly string[];
}

/**
 * Per-profile scan statistics.
 */
export interface ProfileScanStats {
  readonly profileId: string;
  readonly target: string;
  readonly command: string;
  readonly lineCount: number;
  readonly findingCount: number;
  readonly forbiddenCount: number;
  readonly conditionalCount: number;
}

// =============================================================================
// SECTION 4: Gate Types
// =============================================================================

/**
 * Aggregated gate verdict.
 */
export interface GateSummary {
  readonly passed: boolean;
  readonly forbiddenCount: number;
  readonly unresolvedHighRiskCount: number;
  readonly expiredTransitionCount: number;
  readonly highRiskThreshold: number;
}

/**
 * Full outcome of one audit run.
 */
export interface AuditResult {
  readonly generatedAt: Date;
  readonly policyPath: string;
  readonly policySchemaVersion: string;
  /** Sorted by profile id */
  readonly profiles: readonly ProfileScanStats[];
  readonly gate: GateSummary;
  /** Deduplicated and sorted */
  readonly findings: readonly Finding[];
  /** 0 when the gate passed, 1 otherwise */
  readonly exitCode: 0 | 1;
}

// =============================================================================
// SECTION 5: Reporter Types
// =============================================================================

export interface ReporterOptions {
  /** Output file path; stdout when omitted */
  outputPath?: string;
  /** Include non-blocking findings and remediation details */
  verbose?: boolean;
}
