/**
 * MCP Tool Registration
 *
 * Registers the HR tools with the MCP server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod';
import type { ApiKeyService } from '../auth/api-keys.js';
import type { HrDataSource } from '../db/types.js';
import type { EmployeeResolver } from '../employees/employee-resolver.js';
import type { Employee } from '../employees/types.js';
import { AppError, EmployeeLookupError } from '../errors.js';
import { calculateLeaveBalance, type LeaveBalance, type LeavePolicy } from '../leave/index.js';
import { getSchema } from '../schema/definitions.js';
import {
  ambiguousMessage,
  describeApiKey,
  describeEmployee,
  errorResult,
  jsonResult,
  notFoundMessage,
  textResult,
} from './format.js';

export interface ToolDependencies {
  resolver: EmployeeResolver;
  hr: HrDataSource;
  apiKeys: ApiKeyService;
  leavePolicy: LeavePolicy;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const employeeQueryShape = {
  name: z.string().describe('Employee name, email, mobile, or employee number (typos are tolerated)'),
  additional_context: z.string().optional()
    .describe('Extra detail to pick between several matches: designation, email, or employee number'),
};

// Tools that act on one employee also take an id from an earlier result
const employeeTargetShape = {
  name: employeeQueryShape.name.optional(),
  employee_id: z.number().int().positive().optional()
    .describe('Employee id from a previous result; takes precedence over name'),
  additional_context: employeeQueryShape.additional_context,
};

interface EmployeeTarget {
  name?: string;
  employee_id?: number;
  additional_context?: string;
}

/**
 * Run a tool body, turning known failures into error results
 */
async function handle(fn: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof EmployeeLookupError) {
      return errorResult(`Employee lookup failed: ${error.message}`);
    }
    if (error instanceof AppError) {
      return errorResult(`${error.code}: ${error.message}`);
    }
    throw error;
  }
}

export function registerTools(server: McpServer, deps: ToolDependencies): void {
  const { resolver, hr, apiKeys, leavePolicy } = deps;

  async function leaveBalanceFor(employee: Employee): Promise<LeaveBalance> {
    const counts = await hr.getApprovedLeaveCounts(employee.id);
    return calculateLeaveBalance(employee.openingLeaveBalance, counts, leavePolicy);
  }

  /**
   * Find the employee by id or resolve the name, answering not-found and
   * ambiguous outcomes directly
   */
  async function withEmployee(
    target: EmployeeTarget,
    onResolved: (employee: Employee) => Promise<CallToolResult>
  ): Promise<CallToolResult> {
    const { name, employee_id, additional_context } = target;

    if (employee_id !== undefined) {
      const employee = await hr.getEmployeeById(employee_id);
      return employee ? onResolved(employee) : textResult(`No employee found with id ${employee_id}.`);
    }

    if (name === undefined) {
      return errorResult('Provide an employee name or employee_id.');
    }

    const resolution = await resolver.resolve(name, additional_context);
    switch (resolution.status) {
      case 'not_found':
        return textResult(notFoundMessage(name));
      case 'ambiguous':
        return textResult(ambiguousMessage(name, resolution.candidates));
      case 'resolved':
        return onResolved(resolution.employee);
    }
  }

  // ============================================
  // EMPLOYEE TOOLS
  // ============================================

  server.tool(
    'hr_resolve_employee',
    'Resolve a possibly misspelled employee name to a single employee record. Returns status "resolved" with the employee, "ambiguous" with ranked candidates, or "not_found".',
    employeeQueryShape,
    async ({ name, additional_context }) => handle(async () => {
      const resolution = await resolver.resolve(name, additional_context);
      if (resolution.status === 'resolved') {
        return jsonResult({ status: resolution.status, employee: describeEmployee(resolution.employee) });
      }
      if (resolution.status === 'ambiguous') {
        return jsonResult({ status: resolution.status, candidates: resolution.candidates.map(describeEmployee) });
      }
      return jsonResult(resolution);
    })
  );

  server.tool(
    'hr_get_employee_details',
    'Get details for an employee including personal info and leave balance',
    employeeTargetShape,
    async (target) => handle(() =>
      withEmployee(target, async (employee) => {
        const leaveBalance = await leaveBalanceFor(employee);
        return jsonResult({
          employee: describeEmployee(employee),
          leave_balance: {
            current_balance: leaveBalance.currentBalance,
            opening_balance: leaveBalance.openingBalance,
            used_leaves: leaveBalance.usedLeaves,
          },
        });
      })
    )
  );

  server.tool(
    'hr_get_leave_balance',
    'Get detailed leave balance for an employee, with a breakdown of used leave by type',
    employeeTargetShape,
    async (target) => handle(() =>
      withEmployee(target, async (employee) => {
        const leaveBalance = await leaveBalanceFor(employee);
        return jsonResult({
          employee: {
            id: employee.id,
            name: employee.name,
            designation: employee.designation,
            email: employee.email,
          },
          leave_balance: leaveBalance,
        });
      })
    )
  );

  server.tool(
    'hr_search_employees',
    'Search employees by name, email, mobile, or employee number. Falls back to fuzzy name matching among active employees when nothing matches exactly.',
    {
      search_query: z.string().describe('Search text'),
    },
    async ({ search_query }) => handle(async () => {
      const employees = await resolver.search(search_query);
      if (employees.length === 0) {
        return textResult(`No employees found matching '${search_query}'.`);
      }

      const results = await Promise.all(
        employees.map(async (employee) => ({
          ...describeEmployee(employee),
          current_leave_balance: (await leaveBalanceFor(employee)).currentBalance,
        }))
      );

      return jsonResult({
        query: search_query,
        total: results.length,
        employees: results,
      });
    })
  );

  // ============================================
  // WORK REPORT TOOLS
  // ============================================

  server.tool(
    'hr_get_work_reports',
    'List daily work reports for an employee, newest first, optionally within a date range',
    {
      ...employeeTargetShape,
      from: z.string().regex(DATE_PATTERN).optional().describe('Start date (YYYY-MM-DD)'),
      to: z.string().regex(DATE_PATTERN).optional().describe('End date (YYYY-MM-DD)'),
      limit: z.number().int().min(1).max(200).optional().describe('Maximum reports to return (default: 30)'),
    },
    async ({ from, to, limit, ...target }) => handle(() =>
      withEmployee(target, async (employee) => {
        const reports = await hr.listWorkReports(employee.id, { from, to, limit: limit ?? 30 });
        const totalHours = reports.reduce((sum, report) => sum + report.hours, 0);

        return jsonResult({
          employee: { id: employee.id, name: employee.name },
          from: from ?? null,
          to: to ?? null,
          total_reports: reports.length,
          total_hours: totalHours,
          reports,
        });
      })
    )
  );

  // ============================================
  // API KEY TOOLS
  // ============================================

  server.tool(
    'hr_generate_api_key',
    'Generate a new API key for a client application. The key is shown only once.',
    {
      name: z.string().min(1).max(100).describe('Label for the key owner or purpose'),
      expires_in_days: z.number().int().min(1).max(3650).optional().describe('Days until expiry (default: 365)'),
    },
    async ({ name, expires_in_days }) => handle(async () => {
      const { key, record } = await apiKeys.generate(name, expires_in_days);
      return textResult([
        'New API key generated',
        '',
        `Name: ${record.name}`,
        `API Key: ${key}`,
        `Expires: ${record.expiresAt?.toISOString() ?? 'never'}`,
        '',
        'Store this key securely - it will not be shown again.',
        'Send it in the x-api-key header or as Authorization: Bearer <key>.',
      ].join('\n'));
    })
  );

  server.tool(
    'hr_list_api_keys',
    'List API keys with masked key values',
    {},
    async () => handle(async () => {
      const keys = await apiKeys.list();
      return jsonResult({
        total: keys.length,
        active: keys.filter(key => key.isActive).length,
        keys: keys.map(describeApiKey),
      });
    })
  );

  server.tool(
    'hr_revoke_api_key',
    'Revoke an API key by its id (see hr_list_api_keys)',
    {
      id: z.number().int().describe('API key id'),
    },
    async ({ id }) => handle(async () => {
      const revoked = await apiKeys.revoke(id);
      return revoked
        ? textResult(`API key ${id} has been revoked.`)
        : errorResult(`No active API key with id ${id}.`);
    })
  );

  // ============================================
  // SCHEMA TOOL
  // ============================================

  server.tool(
    'hr_get_schema',
    'Get schema definitions, field types, and enum values for HR entities returned by the other tools',
    {
      category: z.string().optional()
        .describe('Schema category: employees, leave, work_reports, security'),
      entity: z.string().optional()
        .describe('Specific entity to describe: Employee, LeaveBalance, WorkReport, ApiKey'),
      enum: z.string().optional()
        .describe('Specific enum to describe: resolution_status, match_type, leave_type, employee_status'),
    },
    async (params) => jsonResult(getSchema({
      category: params.category,
      entity: params.entity,
      enum: params.enum,
    }))
  );
}
