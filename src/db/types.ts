/**
 * Types for the HR data-access layer
 */

import type { Employee, EmployeeLookup } from '../employees/types.js';
import type { LeaveTypeCount } from '../leave/types.js';

export interface WorkReport {
  id: number;
  employeeId: number;
  reportDate: string | null;  // YYYY-MM-DD
  hours: number;
  project: string | null;
  description: string | null;
}

export interface WorkReportFilter {
  from?: string;  // YYYY-MM-DD, inclusive
  to?: string;    // YYYY-MM-DD, inclusive
  limit: number;
}

/**
 * Everything the tools read from the HR store
 */
export interface HrDataSource extends EmployeeLookup {
  getEmployeeById(id: number): Promise<Employee | null>;
  getApprovedLeaveCounts(employeeId: number): Promise<LeaveTypeCount[]>;
  listWorkReports(employeeId: number, filter: WorkReportFilter): Promise<WorkReport[]>;
}
