/**
 * Types for leave balance calculation
 */

export interface LeaveTypeCount {
  leaveType: string;
  count: number;  // approved requests of this type
}

export interface LeavePolicy {
  /** Days consumed per approved request, keyed by upper-case leave type */
  weights: Record<string, number>;
  /** Days charged for a leave type missing from `weights` */
  unknownTypeDays: number;
}

export interface LeaveBreakdownEntry {
  leaveType: string;
  count: number;
  daysPerLeave: number;
  days: number;
  recognized: boolean;
}

export interface LeaveBalance {
  openingBalance: number;
  usedLeaves: number;
  currentBalance: number;
  breakdown: LeaveBreakdownEntry[];
}
