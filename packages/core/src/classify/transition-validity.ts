/**
 * Transition Validity
 *
 * @license Apache-2.0
 *
 * Temporal status of a tracked exception. The status is a pure function
 * of the record and `now`; it is recomputed on every evaluation so that
 * expiry follows the wall clock.
 */

import type { Transition, TransitionStatus } from '../types.js';

export function evaluateTransition(
  transition: Pick<Transition, 'status' | 'expiresAt'> | undefined,
  now: Date
): TransitionStatus {
  if (transition === undefined) return 'none';
  // A resolved exception never expires.
  if (transition.status === 'resolved') return 'resolved';
  return transition.expiresAt.getTime() <= now.getTime() ? 'expired' : 'active';
}
