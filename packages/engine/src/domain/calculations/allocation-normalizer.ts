/**
 * Allocation normalization
 *
 * Turns raw consumption shares into a distribution over the current
 * participants:
 * - missing participants count as 0, unknown names are ignored
 * - negative (and non-finite) shares are clamped to 0
 * - when nothing positive remains, every participant gets an equal split
 */

import type { AllocationShares, Participant } from '@cashsplit/shared';

// Defined as own properties so names such as `__proto__` are stored as shares
function setShare(shares: AllocationShares, participant: Participant, value: number): void {
  Object.defineProperty(shares, participant, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Share held by `participant`, ignoring inherited keys
 */
export function getShare(shares: AllocationShares, participant: Participant): number {
  return Object.hasOwn(shares, participant) ? shares[participant] ?? 0 : 0;
}

function clampShare(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, value);
}

/**
 * Normalize raw shares so they sum to 1 over `participants`
 *
 * An empty participant list yields an empty mapping; the denominator of the
 * equal split is floored at 1 so no division by zero can happen.
 */
export function normalizeAllocations(
  raw: AllocationShares,
  participants: readonly Participant[]
): AllocationShares {
  const clamped = participants.map((participant) =>
    clampShare(Object.hasOwn(raw, participant) ? raw[participant] : undefined)
  );
  const total = clamped.reduce((sum, share) => sum + share, 0);

  const normalized: AllocationShares = {};
  if (total <= 0) {
    const equalShare = 1 / Math.max(1, participants.length);
    participants.forEach((participant) => {
      setShare(normalized, participant, equalShare);
    });
    return normalized;
  }

  participants.forEach((participant, index) => {
    setShare(normalized, participant, (clamped[index] ?? 0) / total);
  });
  return normalized;
}

/**
 * Equal split over `participants`
 */
export function equalAllocations(participants: readonly Participant[]): AllocationShares {
  return normalizeAllocations({}, participants);
}
