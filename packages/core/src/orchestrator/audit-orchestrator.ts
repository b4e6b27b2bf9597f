/**
 * Audit Orchestrator
 *
 * @license Apache-2.0
 *
 * Runs the full audit pipeline: select profiles, obtain each listing,
 * reconstruct chains, classify, then merge, order and gate the findings.
 */

import { classifyDependency } from '../classify/classifier.js';
import { evaluateGate } from '../gate/gate-evaluator.js';
import { silentLogger, type Logger } from '../logger.js';
import type { PolicyStore } from '../policy/policy-store.js';
import { resolveProfiles } from '../profiles/profile-resolver.js';
import { buildFindingList } from '../report/report-builder.js';
import type { DependencyTreeSource } from '../source/cargo-tree-source.js';
import { parseDependencyTree } from '../tree/tree-parser.js';
import type { AuditResult, DependencyListing, Finding, Profile, ProfileScanStats } from '../types.js';
import { ProfileExecutor } from './profile-executor.js';

export interface AuditOrchestratorOptions {
  logger?: Logger;
  /** Treat skipped ancestor levels as parse errors */
  strictAncestry?: boolean;
}

export interface AuditRunOptions {
  /** Restrict the run to these profile ids; all profiles when empty */
  profileIds?: readonly string[];
  /** Evaluation time; defaults to the current wall-clock time */
  now?: Date;
}

export interface ProfileScan {
  findings: Finding[];
  stats: ProfileScanStats;
}

export class AuditOrchestrator {
  private readonly executor = new ProfileExecutor();
  private readonly logger: Logger;
  private readonly strictAncestry: boolean;

  constructor(
    private readonly policy: PolicyStore,
    private readonly source: DependencyTreeSource,
    options: AuditOrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.strictAncestry = options.strictAncestry ?? false;
  }

  /**
   * Run the audit. Rejects on the first source or parse failure;
   * no partial result is ever produced.
   */
  async run(options: AuditRunOptions = {}): Promise<AuditResult> {
    const now = options.now ?? new Date();
    const profiles = resolveProfiles(this.policy.profiles, options.profileIds);
    this.logger.info(`Scanning ${profiles.length} profile(s): ${profiles.map(p => p.id).join(', ')}`);

    const scans = await this.executor.execute(profiles, async profile => {
      const listing = await this.source.list(profile);
      return this.scanProfile(profile, listing, now);
    });

    const findings = buildFindingList(scans.flatMap(({ result }) => result.findings));
    const gate = evaluateGate(findings, this.policy.highRiskThreshold);
    const profileStats = scans
      .map(({ result }) => result.stats)
      .sort((a, b) => (a.profileId < b.profileId ? -1 : a.profileId > b.profileId ? 1 : 0));

    this.logger.info(
      `Gate ${gate.passed ? 'passed' : 'failed'}: findings=${findings.length} ` +
        `forbidden=${gate.forbiddenCount} unresolved_high_risk=${gate.unresolvedHighRiskCount} ` +
        `expired_transitions=${gate.expiredTransitionCount}`
    );

    return {
      generatedAt: now,
      policyPath: this.policy.sourcePath,
      policySchemaVersion: this.policy.schemaVersion,
      profiles: profileStats,
      gate,
      findings,
      exitCode: gate.passed ? 0 : 1,
    };
  }

  /**
   * Classify every occurrence of one profile's listing.
   */
  scanProfile(profile: Profile, listing: DependencyListing, now: Date): ProfileScan {
    const { occurrences, lineCount } = parseDependencyTree(listing.lines, {
      profileId: profile.id,
      strictAncestry: this.strictAncestry,
    });

    const raw: Finding[] = [];
    for (const occurrence of occurrences) {
      const classification = classifyDependency(occurrence.crate, this.policy.maps, now);
      if (classification === null) continue;
      raw.push({
        profileId: profile.id,
        target: profile.target,
        crate: occurrence.crate,
        version: occurrence.version,
        ancestorChain: occurrence.ancestorChain,
        ...classification,
      });
    }

    const findings = buildFindingList(raw);
    const stats: ProfileScanStats = {
      profileId: profile.id,
      target: profile.target,
      command: listing.command,
      lineCount,
      findingCount: findings.length,
      forbiddenCount: findings.filter(f => f.decision === 'forbidden').length,
      conditionalCount: findings.filter(f => f.decision === 'conditional').length,
    };

    this.logger.debug(
      `profile ${profile.id}: ${lineCount} lines, ${stats.forbiddenCount} forbidden, ${stats.conditionalCount} conditional`
    );

    return { findings, stats };
  }
}
