/**
 * PostgreSQL-backed HR repository
 *
 * Serves the resolver's exact and active-employee lookups plus the leave and
 * work-report queries used by the tools.
 */

import type { Employee } from '../employees/types.js';
import type { LeaveTypeCount } from '../leave/types.js';
import type { SqlClient, SqlRow } from './pool.js';
import { readDate, readNumber, readOptionalString, readString } from './rows.js';
import type { HrDataSource, WorkReport, WorkReportFilter } from './types.js';

const EMPLOYEE_SELECT = `
  SELECT d.id, d.developer_name, d.designation, d.email_id, d.mobile,
         d.status, d.doj, d.emp_number, d.blood_group,
         u.username, d.opening_leave_balance
  FROM developer d
  LEFT JOIN "user" u ON d.user_id = u.user_id`;

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

export function toEmployee(row: SqlRow): Employee {
  return {
    id: readNumber(row, 'id'),
    name: readString(row, 'developer_name').trim(),
    designation: readOptionalString(row, 'designation'),
    email: readOptionalString(row, 'email_id'),
    mobile: readOptionalString(row, 'mobile'),
    employeeNumber: readOptionalString(row, 'emp_number'),
    status: readNumber(row, 'status'),
    dateOfJoining: readDate(row, 'doj'),
    bloodGroup: readOptionalString(row, 'blood_group'),
    username: readOptionalString(row, 'username'),
    openingLeaveBalance: readNumber(row, 'opening_leave_balance'),
  };
}

function toWorkReport(row: SqlRow): WorkReport {
  return {
    id: readNumber(row, 'id'),
    employeeId: readNumber(row, 'developer_id'),
    reportDate: readDate(row, 'report_date'),
    hours: readNumber(row, 'hours'),
    project: readOptionalString(row, 'project_name'),
    description: readOptionalString(row, 'description'),
  };
}

export class PgHrRepository implements HrDataSource {
  private db: SqlClient;

  constructor(db: SqlClient) {
    this.db = db;
  }

  async lookupExact(query: string): Promise<Employee[]> {
    // A blank pattern would match every row
    if (!query.trim()) {
      return [];
    }

    const rows = await this.db.query(
      `${EMPLOYEE_SELECT}
       WHERE d.developer_name ILIKE $1 OR d.email_id ILIKE $1
          OR d.mobile ILIKE $1 OR d.emp_number ILIKE $1
       ORDER BY d.developer_name`,
      [`%${escapeLike(query)}%`]
    );
    return rows.map(toEmployee);
  }

  async listActive(): Promise<Employee[]> {
    const rows = await this.db.query(`${EMPLOYEE_SELECT} WHERE d.status = 1 ORDER BY d.id`);
    return rows.map(toEmployee);
  }

  async getEmployeeById(id: number): Promise<Employee | null> {
    const rows = await this.db.query(`${EMPLOYEE_SELECT} WHERE d.id = $1`, [id]);
    return rows.length > 0 ? toEmployee(rows[0]) : null;
  }

  async getApprovedLeaveCounts(employeeId: number): Promise<LeaveTypeCount[]> {
    const rows = await this.db.query(
      `SELECT leave_type, COUNT(*) AS count
       FROM leave_requests
       WHERE developer_id = $1 AND status = 'Approved'
       GROUP BY leave_type
       ORDER BY leave_type`,
      [employeeId]
    );
    return rows.map(row => ({
      leaveType: readString(row, 'leave_type'),
      count: readNumber(row, 'count'),
    }));
  }

  async listWorkReports(employeeId: number, filter: WorkReportFilter): Promise<WorkReport[]> {
    const rows = await this.db.query(
      `SELECT id, developer_id, report_date, hours, project_name, description
       FROM work_reports
       WHERE developer_id = $1
         AND ($2::date IS NULL OR report_date >= $2::date)
         AND ($3::date IS NULL OR report_date <= $3::date)
       ORDER BY report_date DESC, id DESC
       LIMIT $4`,
      [employeeId, filter.from ?? null, filter.to ?? null, filter.limit]
    );
    return rows.map(toWorkReport);
  }
}
