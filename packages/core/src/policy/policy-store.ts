/**
 * Policy Store
 *
 * @license Apache-2.0
 *
 * Loads and validates the dependency policy document into immutable
 * lookup maps. Validation collects every problem it can find and
 * rejects the document as a whole; no partially built store escapes.
 */

import * as fs from 'node:fs/promises';
import { ConfigurationError } from '../errors.js';
import type { OutputPaths, PolicyEntry, PolicyMaps, Profile, Transition } from '../types.js';
import {
  PolicyDocumentSchema,
  formatIssues,
  type PolicyDocument,
  type RawPolicyEntry,
} from './policy-schema.js';
import { parseTimestamp } from './timestamps.js';

/**
 * Validated, immutable policy.
 */
export class PolicyStore implements PolicyMaps {
  readonly forbidden: ReadonlyMap<string, PolicyEntry>;
  readonly conditional: ReadonlyMap<string, PolicyEntry>;
  readonly transitions: ReadonlyMap<string, Transition>;

  private constructor(
    readonly sourcePath: string,
    readonly schemaVersion: string,
    readonly profiles: readonly Profile[],
    forbidden: Map<string, PolicyEntry>,
    conditional: Map<string, PolicyEntry>,
    transitions: Map<string, Transition>,
    readonly highRiskThreshold: number,
    readonly output: OutputPaths
  ) {
    this.forbidden = forbidden;
    this.conditional = conditional;
    this.transitions = transitions;
    Object.freeze(this);
  }

  /**
   * Read and validate a policy file.
   */
  static async load(policyPath: string): Promise<PolicyStore> {
    let content: string;
    try {
      content = await fs.readFile(policyPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`policy file not found: ${policyPath}`);
      }
      throw new ConfigurationError(
        `cannot read policy file ${policyPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return PolicyStore.fromJson(content, policyPath);
  }

  /**
   * Validate a policy given as JSON text.
   */
  static fromJson(content: string, sourcePath = '<inline>'): PolicyStore {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `invalid JSON in policy file ${sourcePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return PolicyStore.parse(data, sourcePath);
  }

  /**
   * Validate an already-decoded policy document.
   */
  static parse(data: unknown, sourcePath = '<inline>'): PolicyStore {
    const result = PolicyDocumentSchema.safeParse(data);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error));
    }
    return PolicyStore.fromDocument(result.data, sourcePath);
  }

  /**
   * Flat view of the lookup maps for the classifier.
   */
  get maps(): PolicyMaps {
    return { forbidden: this.forbidden, conditional: this.conditional, transitions: this.transitions };
  }

  /**
   * Run duplicate and cross-reference checks, then freeze the maps.
   */
  private static fromDocument(doc: PolicyDocument, sourcePath: string): PolicyStore {
    const issues: string[] = [];

    const profiles: Profile[] = [];
    const seenProfiles = new Set<string>();
    for (const raw of doc.profiles) {
      if (seenProfiles.has(raw.id)) {
        issues.push(`duplicate profile id: ${raw.id}`);
        continue;
      }
      seenProfiles.add(raw.id);
      profiles.push(
        Object.freeze({
          id: raw.id,
          target: raw.target,
          allFeatures: raw.all_features,
          noDefaultFeatures: raw.no_default_features,
          features: Object.freeze([...raw.features].sort()),
        })
      );
    }

    const forbidden = buildEntryMap(doc.forbidden_crates, 'forbidden_crates', issues);
    const conditional = buildEntryMap(doc.conditional_crates, 'conditional_crates', issues);

    const overlap = [...forbidden.keys()].filter(name => conditional.has(name)).sort();
    if (overlap.length > 0) {
      issues.push(`ambiguous policy mapping; crate(s) in forbidden and conditional: ${overlap.join(', ')}`);
    }

    const transitions = new Map<string, Transition>();
    for (const raw of doc.transitions) {
      if (transitions.has(raw.crate)) {
        issues.push(`duplicate transition for crate ${raw.crate}`);
        continue;
      }
      if (!forbidden.has(raw.crate) && !conditional.has(raw.crate)) {
        issues.push(`transition references crate not present in forbidden/conditional maps: ${raw.crate}`);
      }
      const expiresAt = parseTimestamp(raw.expires_at_utc);
      if (expiresAt === null) {
        // unreachable once the schema has accepted the document
        issues.push(`transition ${raw.crate}: invalid expires_at_utc`);
        continue;
      }
      transitions.set(
        raw.crate,
        Object.freeze({
          crate: raw.crate,
          status: raw.status,
          owner: raw.owner,
          replacementIssue: raw.replacement_issue,
          expiresAtRaw: raw.expires_at_utc,
          expiresAt,
          notes: raw.notes,
        })
      );
    }

    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    return new PolicyStore(
      sourcePath,
      doc.schema_version,
      Object.freeze(profiles),
      forbidden,
      conditional,
      transitions,
      doc.risk_thresholds.high,
      Object.freeze({ summaryPath: doc.output.summary_path, logPath: doc.output.log_path })
    );
  }
}

function buildEntryMap(
  entries: readonly RawPolicyEntry[],
  section: string,
  issues: string[]
): Map<string, PolicyEntry> {
  const map = new Map<string, PolicyEntry>();
  for (const raw of entries) {
    if (map.has(raw.name)) {
      issues.push(`duplicate entry ${raw.name} in ${section}`);
      continue;
    }
    map.set(
      raw.name,
      Object.freeze({
        name: raw.name,
        reason: raw.reason,
        remediation: raw.remediation,
        riskScore: raw.risk_score,
      })
    );
  }
  return map;
}
