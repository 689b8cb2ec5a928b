/**
 * Leave Module
 */

export { calculateLeaveBalance, createLeavePolicy, daysPerLeave, DEFAULT_LEAVE_WEIGHTS } from './leave-balance.js';
export type { LeaveTypeCount, LeavePolicy, LeaveBreakdownEntry, LeaveBalance } from './types.js';
