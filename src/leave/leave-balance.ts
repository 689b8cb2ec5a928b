/**
 * Leave Balance Calculator
 *
 * Converts approved leave request counts into days used, according to a
 * leave policy. Leave types outside the policy are charged the policy's
 * `unknownTypeDays` and reported as unrecognized.
 */

import type { LeaveBalance, LeaveBreakdownEntry, LeavePolicy, LeaveTypeCount } from './types.js';

export const DEFAULT_LEAVE_WEIGHTS: Readonly<Record<string, number>> = {
  'FULL DAY': 1,
  'HALF DAY': 0.5,
  'COMPENSATION HALF DAY': 0.5,
  '2 HRS': 0.25,
  'COMPENSATION 2 HRS': 0.25,
};

export function createLeavePolicy(overrides: Partial<LeavePolicy> = {}): LeavePolicy {
  return {
    weights: { ...DEFAULT_LEAVE_WEIGHTS, ...overrides.weights },
    unknownTypeDays: overrides.unknownTypeDays ?? 1,
  };
}

export function daysPerLeave(leaveType: string, policy: LeavePolicy): { days: number; recognized: boolean } {
  const key = leaveType.trim().toUpperCase();
  const weight = Object.hasOwn(policy.weights, key) ? policy.weights[key] : undefined;
  return weight === undefined
    ? { days: policy.unknownTypeDays, recognized: false }
    : { days: weight, recognized: true };
}

export function calculateLeaveBalance(
  openingBalance: number,
  counts: readonly LeaveTypeCount[],
  policy: LeavePolicy
): LeaveBalance {
  const breakdown: LeaveBreakdownEntry[] = counts.map(({ leaveType, count }) => {
    const { days, recognized } = daysPerLeave(leaveType, policy);
    return {
      leaveType: leaveType.trim().toUpperCase(),
      count,
      daysPerLeave: days,
      days: count * days,
      recognized,
    };
  });

  const usedLeaves = breakdown.reduce((sum, entry) => sum + entry.days, 0);

  return {
    openingBalance,
    usedLeaves,
    currentBalance: openingBalance - usedLeaves,
    breakdown,
  };
}
