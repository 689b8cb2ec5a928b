import { describe, expect, it } from 'vitest';
import { calculateLeaveBalance, createLeavePolicy, daysPerLeave } from '../src/leave/leave-balance.js';

describe('daysPerLeave', () => {
  const policy = createLeavePolicy();

  it('looks leave types up case-insensitively', () => {
    expect(daysPerLeave('Full Day', policy)).toEqual({ days: 1, recognized: true });
    expect(daysPerLeave(' half day ', policy)).toEqual({ days: 0.5, recognized: true });
    expect(daysPerLeave('COMPENSATION 2 HRS', policy)).toEqual({ days: 0.25, recognized: true });
  });

  it('charges unknown types the policy default', () => {
    expect(daysPerLeave('Sabbatical', policy)).toEqual({ days: 1, recognized: false });
    expect(daysPerLeave('', policy)).toEqual({ days: 1, recognized: false });
    expect(daysPerLeave('constructor', policy)).toEqual({ days: 1, recognized: false });
  });
});

describe('calculateLeaveBalance', () => {
  const counts = [
    { leaveType: 'FULL DAY', count: 3 },
    { leaveType: 'half day', count: 2 },
    { leaveType: '2 HRS', count: 4 },
    { leaveType: 'Sick', count: 1 },
  ];

  it('subtracts weighted leave from the opening balance', () => {
    const balance = calculateLeaveBalance(12, counts, createLeavePolicy());

    expect(balance.openingBalance).toBe(12);
    expect(balance.usedLeaves).toBe(6);
    expect(balance.currentBalance).toBe(6);
    expect(balance.breakdown).toEqual([
      { leaveType: 'FULL DAY', count: 3, daysPerLeave: 1, days: 3, recognized: true },
      { leaveType: 'HALF DAY', count: 2, daysPerLeave: 0.5, days: 1, recognized: true },
      { leaveType: '2 HRS', count: 4, daysPerLeave: 0.25, days: 1, recognized: true },
      { leaveType: 'SICK', count: 1, daysPerLeave: 1, days: 1, recognized: false },
    ]);
  });

  it('follows policy overrides', () => {
    const policy = createLeavePolicy({ weights: { SICK: 0.5 }, unknownTypeDays: 0 });
    const balance = calculateLeaveBalance(12, [...counts, { leaveType: 'Jury Duty', count: 2 }], policy);

    expect(balance.usedLeaves).toBe(5.5);
    expect(balance.currentBalance).toBe(6.5);
    expect(balance.breakdown.at(-1)).toEqual({
      leaveType: 'JURY DUTY', count: 2, daysPerLeave: 0, days: 0, recognized: false,
    });
  });

  it('keeps the opening balance when nothing was taken', () => {
    expect(calculateLeaveBalance(15, [], createLeavePolicy())).toEqual({
      openingBalance: 15,
      usedLeaves: 0,
      currentBalance: 15,
      breakdown: [],
    });
  });

  it('can go negative', () => {
    expect(calculateLeaveBalance(1, [{ leaveType: 'FULL DAY', count: 3 }], createLeavePolicy()).currentBalance).toBe(-2);
  });
});
