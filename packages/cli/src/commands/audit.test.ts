/**
 * Audit Command Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ExternalToolError } from 'depgate-core';
import { runAudit } from './audit.js';
import { EXIT_CODES } from './exit-codes.js';
import { StaticTreeSource, createCapturedLogger, writePolicy } from './test-helpers.js';

const NOW = '2026-01-01T00:00:00Z';

describe('runAudit', () => {
  let tempDir: string;
  let policyPath: string;
  let printed: string[];
  const print = (text: string) => {
    printed.push(text);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'depgate-audit-'));
    policyPath = await writePolicy(tempDir);
    printed = [];
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should fail the gate on a forbidden crate and write both artifacts', async () => {
    const logger = createCapturedLogger();
    const source = new StaticTreeSource(['0app v0.1.0', '1openssl-sys v0.9.100']);

    const code = await runAudit({ policy: policyPath, now: NOW, format: 'text' }, { source, logger, print });

    expect(code).toBe(EXIT_CODES.gateFailed);

    const report = JSON.parse(await fs.readFile(path.join(tempDir, 'artifacts', 'report.json'), 'utf-8'));
    expect(report.gate).toEqual({
      passed: false,
      forbidden_count: 1,
      unresolved_high_risk_count: 1,
      expired_transition_count: 0,
      high_risk_threshold: 70,
    });
    expect(report.findings[0].transitive_chain).toEqual(['app', 'openssl-sys']);

    const log = await fs.readFile(path.join(tempDir, 'artifacts', 'findings.ndjson'), 'utf-8');
    expect(log.split('\n')).toHaveLength(2);
    expect(JSON.parse(log.split('\n')[0] ?? '')).toMatchObject({
      event: 'dependency_policy_finding',
      ts_utc: '2026-01-01T00:00:00.000Z',
      crate: 'openssl-sys',
      decision: 'forbidden',
    });

    expect(printed.some(line => line.includes('Dependency policy gate failed: forbidden=1 unresolved_high_risk=1 expired_transitions=0'))).toBe(true);
    expect(printed).toContain(`Summary: ${path.join(tempDir, 'artifacts', 'report.json')}`);
    expect(printed).toContain(`Log: ${path.join(tempDir, 'artifacts', 'findings.ndjson')}`);
  });

  it('should pass when tracked crates are covered by an active transition', async () => {
    const source = new StaticTreeSource(['0app v0.1.0', '1mio v1.0.0', '1serde v1.0.200']);

    const code = await runAudit({ policy: policyPath, now: NOW, format: 'text' }, { source, logger: createCapturedLogger(), print });

    expect(code).toBe(EXIT_CODES.passed);
    expect(printed.some(line => line.includes('Dependency policy gate passed: findings=1 forbidden=0'))).toBe(true);
    expect(printed.some(line => line.startsWith('Summary: '))).toBe(false);
  });

  it('should fail once the transition has expired', async () => {
    const source = new StaticTreeSource(['0app v0.1.0', '1mio v1.0.0']);

    const code = await runAudit(
      { policy: policyPath, now: '2026-06-30T00:00:00Z', format: 'text' },
      { source, logger: createCapturedLogger(), print }
    );

    expect(code).toBe(EXIT_CODES.gateFailed);
    const report = JSON.parse(await fs.readFile(path.join(tempDir, 'artifacts', 'report.json'), 'utf-8'));
    expect(report.gate.expired_transition_count).toBe(1);
  });

  it('should write an empty log for a clean run', async () => {
    const source = new StaticTreeSource(['0app v0.1.0', '1serde v1.0.200']);

    const code = await runAudit({ policy: policyPath, now: NOW, format: 'text' }, { source, logger: createCapturedLogger(), print });

    expect(code).toBe(EXIT_CODES.passed);
    expect(await fs.readFile(path.join(tempDir, 'artifacts', 'findings.ndjson'), 'utf-8')).toBe('');
  });

  it('should honour output path overrides', async () => {
    const summaryOutput = path.join(tempDir, 'out', 'summary.json');
    const logOutput = path.join(tempDir, 'out', 'log.ndjson');
    const source = new StaticTreeSource(['0app v0.1.0']);

    await runAudit(
      { policy: policyPath, now: NOW, format: 'text', summaryOutput, logOutput },
      { source, logger: createCapturedLogger(), print }
    );

    expect(JSON.parse(await fs.readFile(summaryOutput, 'utf-8')).finding_count).toBe(0);
    expect(await fs.readFile(logOutput, 'utf-8')).toBe('');
  });

  it('should write identical artifacts for identical inputs', async () => {
    const lines = ['0app v0.1.0', '1mio v1.0.0', '1openssl-sys v0.9.100', '2openssl-sys v0.9.100'];
    const summaryPath = path.join(tempDir, 'artifacts', 'report.json');
    const logPath = path.join(tempDir, 'artifacts', 'findings.ndjson');
    const options = { policy: policyPath, now: NOW, format: 'text' };

    const firstCode = await runAudit(options, { source: new StaticTreeSource(lines), logger: createCapturedLogger(), print });
    const firstSummary = await fs.readFile(summaryPath, 'utf-8');
    const firstLog = await fs.readFile(logPath, 'utf-8');

    const secondCode = await runAudit(options, { source: new StaticTreeSource(lines), logger: createCapturedLogger(), print });

    expect(secondCode).toBe(firstCode);
    expect(await fs.readFile(summaryPath, 'utf-8')).toBe(firstSummary);
    expect(await fs.readFile(logPath, 'utf-8')).toBe(firstLog);
  });

  it('should print only the report in json format', async () => {
    const source = new StaticTreeSource(['0app v0.1.0', '1openssl-sys v0.9.100']);

    await runAudit({ policy: policyPath, now: NOW, format: 'json' }, { source, logger: createCapturedLogger(), print });

    expect(printed).toHaveLength(1);
    expect(printed[0]).toBe(await fs.readFile(path.join(tempDir, 'artifacts', 'report.json'), 'utf-8'));
  });

  it('should return 2 for a missing policy', async () => {
    const logger = createCapturedLogger();
    const missing = path.join(tempDir, 'missing.json');

    const code = await runAudit({ policy: missing, now: NOW, format: 'text' }, { source: new StaticTreeSource([]), logger, print });

    expect(code).toBe(EXIT_CODES.error);
    expect(logger.messages).toContainEqual({
      level: 'error',
      message: `Dependency policy configuration error: policy file not found: ${missing}`,
    });
  });

  it('should return 2 for an unknown profile', async () => {
    const code = await runAudit(
      { policy: policyPath, now: NOW, format: 'text', onlyProfile: ['linux'] },
      { source: new StaticTreeSource([]), logger: createCapturedLogger(), print }
    );
    expect(code).toBe(EXIT_CODES.error);
  });

  it('should return 2 for a malformed listing', async () => {
    const logger = createCapturedLogger();

    const code = await runAudit(
      { policy: policyPath, now: NOW, format: 'text' },
      { source: new StaticTreeSource(['0app v0.1.0', 'not a tree line']), logger, print }
    );

    expect(code).toBe(EXIT_CODES.error);
    expect(logger.messages).toContainEqual({
      level: 'error',
      message: 'Dependency listing parse error: profile wasm-default: line 2: invalid dependency tree line format: "not a tree line"',
    });
  });

  it('should return 2 when the listing command fails', async () => {
    const logger = createCapturedLogger();
    const failure = new ExternalToolError('cargo tree failed for profile=wasm-default', 'cargo tree', 101, '');

    const code = await runAudit({ policy: policyPath, now: NOW, format: 'text' }, { source: new StaticTreeSource(failure), logger, print });

    expect(code).toBe(EXIT_CODES.error);
    expect(logger.messages).toContainEqual({
      level: 'error',
      message: 'Dependency listing command failed: cargo tree failed for profile=wasm-default',
    });
  });

  it('should return 2 for an invalid --now or --format', async () => {
    const deps = { source: new StaticTreeSource([]), logger: createCapturedLogger(), print };

    expect(await runAudit({ policy: policyPath, now: '2026-01-01T00:00:00', format: 'text' }, deps)).toBe(EXIT_CODES.error);
    expect(await runAudit({ policy: policyPath, now: NOW, format: 'sarif' }, deps)).toBe(EXIT_CODES.error);
  });

  it('should rethrow unexpected errors', async () => {
    const source = new StaticTreeSource(new Error('boom'));

    await expect(
      runAudit({ policy: policyPath, now: NOW, format: 'text' }, { source, logger: createCapturedLogger(), print })
    ).rejects.toThrow('boom');
  });
});
