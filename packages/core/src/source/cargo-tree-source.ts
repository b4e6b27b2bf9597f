/**
 * Cargo Tree Source
 *
 * @license Apache-2.0
 *
 * Obtains the depth-prefixed dependency listing for a profile. The
 * command runs exactly once per profile; there is no retry and no
 * timeout beyond what the command itself imposes.
 */

import { spawn } from 'node:child_process';
import { ExternalToolError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { DependencyListing, Profile } from '../types.js';

/**
 * Anything that can produce a raw listing for a profile.
 */
export interface DependencyTreeSource {
  list(profile: Profile): Promise<DependencyListing>;
}

export interface CargoTreeSourceOptions {
  /** Cargo executable */
  cargoBin?: string;
  /** Working directory (workspace root) */
  cwd?: string;
  logger?: Logger;
}

/**
 * Arguments for `cargo tree` that produce a depth-prefixed listing.
 */
export function buildCargoTreeArgs(profile: Profile): string[] {
  const args = [
    'tree',
    '--workspace',
    '--target',
    profile.target,
    '-e',
    'normal',
    '--prefix',
    'depth',
    '--charset',
    'ascii',
  ];

  if (profile.noDefaultFeatures) {
    args.push('--no-default-features');
  }
  if (profile.allFeatures) {
    args.push('--all-features');
  }
  if (profile.features.length > 0) {
    args.push('--features', profile.features.join(','));
  }

  return args;
}

export class CargoTreeSource implements DependencyTreeSource {
  private readonly cargoBin: string;
  private readonly cwd: string;
  private readonly logger: Logger;

  constructor(options: CargoTreeSourceOptions = {}) {
    this.cargoBin = options.cargoBin ?? 'cargo';
    this.cwd = options.cwd ?? process.cwd();
    this.logger = options.logger ?? silentLogger;
  }

  async list(profile: Profile): Promise<DependencyListing> {
    const args = buildCargoTreeArgs(profile);
    const command = [this.cargoBin, ...args].join(' ');
    this.logger.debug(`running ${command}`);

    const stdout = await this.run(args, command, profile);
    const lines = stdout.split(/\r?\n/).filter(line => line.trim().length > 0);
    this.logger.debug(`profile ${profile.id}: ${lines.length} dependency lines`);

    return { command, lines };
  }

  private run(args: string[], command: string, profile: Profile): Promise<string> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.cargoBin, args, {
        cwd: this.cwd,
        shell: false,
      });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code, signal) => {
        if (code === 0) {
          resolve(stdout);
          return;
        }
        const detail = stderr.trim() || (signal ? `terminated by ${signal}` : `exit code ${code}`);
        reject(
          new ExternalToolError(
            `cargo tree failed for profile=${profile.id} target=${profile.target}: ${detail}`,
            command,
            code,
            stderr.trim()
          )
        );
      });

      proc.on('error', (err) => {
        reject(
          new ExternalToolError(
            `cannot run ${this.cargoBin} for profile=${profile.id}: ${err.message}`,
            command,
            null,
            ''
          )
        );
      });
    });
  }
}
