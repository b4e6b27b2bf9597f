/**
 * Shared helpers for command tests
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { DependencyListing, DependencyTreeSource, Logger, Profile } from 'depgate-core';

export interface CapturedLogger extends Logger {
  readonly messages: Array<{ level: keyof Logger; message: string }>;
}

export function createCapturedLogger(): CapturedLogger {
  const messages: CapturedLogger['messages'] = [];
  return {
    messages,
    error: (message) => messages.push({ level: 'error', message }),
    warn: (message) => messages.push({ level: 'warn', message }),
    info: (message) => messages.push({ level: 'info', message }),
    debug: (message) => messages.push({ level: 'debug', message }),
  };
}

export class StaticTreeSource implements DependencyTreeSource {
  constructor(private readonly lines: string[] | Error) {}

  async list(profile: Profile): Promise<DependencyListing> {
    if (this.lines instanceof Error) {
      throw this.lines;
    }
    return { command: `cargo tree --target ${profile.target}`, lines: this.lines };
  }
}

/**
 * Write a one-profile policy into `dir` and return its path.
 */
export async function writePolicy(dir: string): Promise<string> {
  const policyPath = path.join(dir, 'policy.json');
  const policy = {
    schema_version: 'dependency-policy-v1',
    profiles: [{ id: 'wasm-default', target: 'wasm32-unknown-unknown' }],
    forbidden_crates: [
      { name: 'openssl-sys', reason: 'native TLS does not build for wasm', remediation: 'use rustls', risk_score: 95 },
    ],
    conditional_crates: [
      { name: 'mio', reason: 'no sockets in the browser', remediation: 'gate behind a native feature', risk_score: 80 },
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
    output: {
      summary_path: path.join(dir, 'artifacts', 'report.json'),
      log_path: path.join(dir, 'artifacts', 'findings.ndjson'),
    },
  };
  await fs.writeFile(policyPath, JSON.stringify(policy, null, 2));
  return policyPath;
}
