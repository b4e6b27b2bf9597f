/**
 * Profile Executor
 *
 * @license Apache-2.0
 *
 * Scans profiles concurrently. Profiles share no mutable state, so each
 * scan runs independently; results are only returned once every scan
 * has finished. The first failure rejects the whole batch.
 */

import type { Profile } from '../types.js';

export class ProfileExecutor {
  async execute<T>(
    profiles: readonly Profile[],
    scan: (profile: Profile) => Promise<T>
  ): Promise<Array<{ profile: Profile; result: T }>> {
    return Promise.all(
      profiles.map(async profile => ({ profile, result: await scan(profile) }))
    );
  }
}
