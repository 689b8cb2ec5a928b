/**
 * Result shaping for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { StoredApiKey } from '../auth/types.js';
import { ApiKeyService } from '../auth/api-keys.js';
import { isActiveEmployee, type Employee } from '../employees/types.js';

export function jsonResult(data: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

export function textResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

export function errorResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    isError: true,
  };
}

export function describeEmployee(employee: Employee) {
  return {
    ...employee,
    active: isActiveEmployee(employee),
  };
}

/**
 * One numbered line per candidate, for disambiguation prompts
 */
export function formatEmployeeOptions(employees: readonly Employee[]): string {
  return employees
    .map((employee, index) => {
      const parts = [`${index + 1}. ${employee.name}`];
      if (employee.designation) parts.push(employee.designation);
      if (employee.email) parts.push(employee.email);
      if (employee.employeeNumber) parts.push(`#${employee.employeeNumber}`);
      parts.push(isActiveEmployee(employee) ? 'Active' : 'Inactive');
      return parts.join(' | ');
    })
    .join('\n');
}

export function notFoundMessage(query: string): string {
  return `No employee found matching '${query}'.`;
}

export function ambiguousMessage(query: string, candidates: readonly Employee[]): string {
  return [
    `Found ${candidates.length} employees matching '${query}'. Please specify:`,
    '',
    formatEmployeeOptions(candidates),
    '',
    'Tip: pass additional_context with a designation, email, or employee number to narrow the match.',
  ].join('\n');
}

export function describeApiKey(record: StoredApiKey) {
  return {
    id: record.id,
    name: record.name,
    key: ApiKeyService.mask(record),
    isActive: record.isActive,
    createdAt: record.createdAt?.toISOString() ?? null,
    lastUsedAt: record.lastUsedAt?.toISOString() ?? null,
    expiresAt: record.expiresAt?.toISOString() ?? null,
  };
}
