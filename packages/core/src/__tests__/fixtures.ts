/**
 * Shared test fixtures
 *
 * @license Apache-2.0
 */

import { PolicyStore } from '../policy/policy-store.js';
import type { AuditResult, DependencyListing, Finding, Profile } from '../types.js';
import type { DependencyTreeSource } from '../source/cargo-tree-source.js';

export const NOW = new Date('2026-01-01T00:00:00Z');

/**
 * A fresh, valid policy document. Mutate the copy freely.
 */
export function policyDocument(): Record<string, unknown> & {
  profiles: Array<Record<string, unknown>>;
  forbidden_crates: Array<Record<string, unknown>>;
  conditional_crates: Array<Record<string, unknown>>;
  transitions: Array<Record<string, unknown>>;
} {
  return {
    schema_version: 'dependency-policy-v1',
    profiles: [
      { id: 'wasm-default', target: 'wasm32-unknown-unknown' },
      { id: 'wasm-full', target: 'wasm32-unknown-unknown', all_features: true, features: ['zeta', 'alpha'] },
    ],
    forbidden_crates: [
      {
        name: 'openssl-sys',
        reason: 'native TLS does not build for wasm',
        remediation: 'use rustls',
        risk_score: 95,
      },
    ],
    conditional_crates: [
      {
        name: 'getrandom',
        reason: 'needs the js feature on wasm',
        remediation: 'enable the js feature',
        risk_score: 40,
      },
      {
        name: 'mio',
        reason: 'no sockets in the browser',
        remediation: 'gate behind a native feature',
        risk_score: 80,
      },
    ],
    transitions: [
      {
        crate: 'mio',
        status: 'active',
        owner: 'platform-team',
        replacement_issue: 'ISSUE-12',
        expires_at_utc: '2026-06-30T00:00:00Z',
      },
    ],
    risk_thresholds: { high: 70 },
    output: { summary_path: 'artifacts/report.json', log_path: 'artifacts/findings.ndjson' },
  };
}

export function createPolicy(doc: unknown = policyDocument()): PolicyStore {
  return PolicyStore.parse(doc, 'policy.json');
}

export function createProfile(id: string, overrides: Partial<Profile> = {}): Profile {
  return {
    id,
    target: 'wasm32-unknown-unknown',
    allFeatures: false,
    noDefaultFeatures: false,
    features: [],
    ...overrides,
  };
}

export function createFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    profileId: 'wasm-default',
    target: 'wasm32-unknown-unknown',
    crate: 'openssl-sys',
    version: 'v0.9.100',
    ancestorChain: ['app', 'reqwest', 'openssl-sys'],
    decision: 'forbidden',
    reason: 'native TLS does not build for wasm',
    remediation: 'use rustls',
    riskScore: 95,
    transitionStatus: 'none',
    transitionIssue: null,
    ...overrides,
  };
}

export function createResult(findings: Finding[], overrides: Partial<AuditResult> = {}): AuditResult {
  return {
    generatedAt: NOW,
    policyPath: 'policy.json',
    policySchemaVersion: 'dependency-policy-v1',
    profiles: [
      {
        profileId: 'wasm-default',
        target: 'wasm32-unknown-unknown',
        command: 'cargo tree --target wasm32-unknown-unknown',
        lineCount: 3,
        findingCount: findings.length,
        forbiddenCount: findings.filter(f => f.decision === 'forbidden').length,
        conditionalCount: findings.filter(f => f.decision === 'conditional').length,
      },
    ],
    gate: {
      passed: findings.length === 0,
      forbiddenCount: findings.filter(f => f.decision === 'forbidden').length,
      unresolvedHighRiskCount: 0,
      expiredTransitionCount: 0,
      highRiskThreshold: 70,
    },
    findings,
    exitCode: findings.length === 0 ? 0 : 1,
    ...overrides,
  };
}

/**
 * In-memory listing source keyed by profile id.
 */
export class FakeTreeSource implements DependencyTreeSource {
  readonly calls: string[] = [];

  constructor(
    private readonly listings: Record<string, string[]>,
    private readonly failure?: Error
  ) {}

  async list(profile: Profile): Promise<DependencyListing> {
    this.calls.push(profile.id);
    if (this.failure) {
      throw this.failure;
    }
    return { command: `fake tree ${profile.id}`, lines: this.listings[profile.id] ?? [] };
  }
}
