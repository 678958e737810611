/**
 * Display formatting for report tables
 */

import { REPORT_CONFIG } from '@cashsplit/shared';
import type { AllocationShares, CalendarDate, Participant } from '@cashsplit/shared';
import { formatIsoDate } from '../calendar/calendar-date';

/**
 * Format an amount with a fixed number of decimals (e.g. "1234.50")
 */
export function formatAmount(
  value: number,
  decimals: number = REPORT_CONFIG.AMOUNT_DECIMALS
): string {
  // Avoid printing "-0.00" for tiny negative residues
  const fixed = value.toFixed(decimals);
  return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
}

/**
 * Format a cashback rate as a percentage (e.g. 0.015 -> "1.50%")
 */
export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(REPORT_CONFIG.RATE_DECIMALS)}%`;
}

/**
 * Format a normalized allocation in participant order (e.g. "A:0.50  B:0.50")
 */
export function formatAllocation(
  allocation: AllocationShares,
  participants: readonly Participant[]
): string {
  return participants
    .map((participant) => {
      const share = Object.hasOwn(allocation, participant) ? allocation[participant] : undefined;
      return `${participant}:${(share ?? 0).toFixed(REPORT_CONFIG.ALLOCATION_DECIMALS)}`;
    })
    .join('  ');
}

export function formatWindowBound(bound: CalendarDate | undefined): string {
  return bound ? formatIsoDate(bound) : REPORT_CONFIG.EMPTY_BOUND_LABEL;
}
