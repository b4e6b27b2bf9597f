/**
 * Validate Command Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { runValidate } from './validate.js';
import { EXIT_CODES } from './exit-codes.js';
import { createCapturedLogger, writePolicy } from './test-helpers.js';

describe('runValidate', () => {
  let tempDir: string;
  let policyPath: string;
  let printed: string[];
  const print = (text: string) => {
    printed.push(text);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'depgate-validate-'));
    policyPath = await writePolicy(tempDir);
    printed = [];
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should summarize a valid policy', async () => {
    const code = await runValidate({ policy: policyPath, now: '2026-01-01T00:00:00Z' }, { logger: createCapturedLogger(), print });

    expect(code).toBe(EXIT_CODES.passed);
    expect(printed).toHaveLength(2);
    expect(printed[0]).toContain('1 profile(s), 1 forbidden, 1 conditional, 1 transition(s), high risk threshold 70');
    expect(printed[1]).toBe('  mio: active (ISSUE-12, owner platform-team, expires 2026-06-30T00:00:00.000Z)');
  });

  it('should show expired transitions', async () => {
    await runValidate({ policy: policyPath, now: '2026-07-01T00:00:00Z' }, { logger: createCapturedLogger(), print });

    expect(printed[1]).toContain('mio: expired (ISSUE-12');
  });

  it('should return 2 for an invalid policy', async () => {
    await fs.writeFile(policyPath, JSON.stringify({ schema_version: 'dependency-policy-v1' }));
    const logger = createCapturedLogger();

    const code = await runValidate({ policy: policyPath }, { logger, print });

    expect(code).toBe(EXIT_CODES.error);
    expect(logger.messages[0]?.message.startsWith('Dependency policy configuration error: 6 problems:')).toBe(true);
  });

  it('should return 2 for an unknown profile', async () => {
    const code = await runValidate({ policy: policyPath, onlyProfile: ['linux'] }, { logger: createCapturedLogger(), print });
    expect(code).toBe(EXIT_CODES.error);
  });
});
