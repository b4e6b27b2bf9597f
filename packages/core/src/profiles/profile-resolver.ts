/**
 * Profile Resolver
 *
 * @license Apache-2.0
 *
 * Selects which configured build profiles a run scans.
 */

import { ConfigurationError } from '../errors.js';
import type { Profile } from '../types.js';

/**
 * Return the selected profiles in configured order.
 *
 * An empty or omitted `requested` list selects every profile.
 */
export function resolveProfiles(
  profiles: readonly Profile[],
  requested: readonly string[] = []
): Profile[] {
  const wanted = new Set(requested);

  if (wanted.size > 0) {
    const known = new Set(profiles.map(p => p.id));
    const unknown = [...wanted].filter(id => !known.has(id)).sort();
    if (unknown.length > 0) {
      throw new ConfigurationError(`unknown profile(s) selected: ${unknown.join(', ')}`);
    }
  }

  const selected = wanted.size > 0 ? profiles.filter(p => wanted.has(p.id)) : [...profiles];
  if (selected.length === 0) {
    throw new ConfigurationError('no profiles selected for scanning');
  }
  return selected;
}
