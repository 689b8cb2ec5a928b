/**
 * Schema Definitions
 *
 * Structured documentation of the HR entities and enums returned by the
 * tools, served by the hr_get_schema tool.
 */

import { DEFAULT_LEAVE_WEIGHTS } from '../leave/leave-balance.js';

export interface FieldDefinition {
  name: string;
  type: string;
  description: string;
  required?: boolean;
  enum_values?: string[];
}

export interface EntityDefinition {
  name: string;
  description: string;
  fields: FieldDefinition[];
}

export interface EnumDefinition {
  name: string;
  description: string;
  values: { value: string; description: string }[];
}

export interface SchemaCategory {
  name: string;
  description: string;
  entities?: EntityDefinition[];
  enums?: EnumDefinition[];
}

// ============================================
// ENUM DEFINITIONS
// ============================================

export const ENUMS: EnumDefinition[] = [
  {
    name: 'resolution_status',
    description: 'Outcome of resolving an employee name',
    values: [
      { value: 'resolved', description: 'Exactly one employee matched, possibly after narrowing by additional_context' },
      { value: 'ambiguous', description: 'Several employees matched; repeat the call with additional_context' },
      { value: 'not_found', description: 'No employee matched the query' },
    ],
  },
  {
    name: 'match_type',
    description: 'How a candidate employee was found',
    values: [
      { value: 'exact', description: 'Substring match on name, email, mobile or employee number' },
      { value: 'fuzzy', description: 'Similarity-ranked match among active employees (used only when no exact match exists)' },
    ],
  },
  {
    name: 'leave_type',
    description: 'Leave request types and the days each approved request consumes',
    values: Object.entries(DEFAULT_LEAVE_WEIGHTS).map(([value, days]) => ({
      value,
      description: `${days} day(s) per approved request`,
    })),
  },
  {
    name: 'employee_status',
    description: 'Employment status flag',
    values: [
      { value: '1', description: 'Active employee' },
      { value: '0', description: 'Former/inactive employee (still found by exact lookup)' },
    ],
  },
];

// ============================================
// ENTITY DEFINITIONS
// ============================================

export const ENTITIES: EntityDefinition[] = [
  {
    name: 'Employee',
    description: 'An employee record',
    fields: [
      { name: 'id', type: 'number', description: 'Unique identifier', required: true },
      { name: 'name', type: 'string', description: 'Display name', required: true },
      { name: 'designation', type: 'string | null', description: 'Job title' },
      { name: 'email', type: 'string | null', description: 'Work email' },
      { name: 'mobile', type: 'string | null', description: 'Mobile number' },
      { name: 'employeeNumber', type: 'string | null', description: 'Employee number' },
      { name: 'status', type: 'number', description: 'Employment status', required: true, enum_values: ['1', '0'] },
      { name: 'dateOfJoining', type: 'string (YYYY-MM-DD) | null', description: 'Date of joining' },
      { name: 'bloodGroup', type: 'string | null', description: 'Blood group' },
      { name: 'username', type: 'string | null', description: 'Linked login username' },
      { name: 'openingLeaveBalance', type: 'number', description: 'Leave days at the start of the period', required: true },
    ],
  },
  {
    name: 'LeaveBalance',
    description: 'Leave balance computed from approved leave requests',
    fields: [
      { name: 'openingBalance', type: 'number', description: 'Opening balance in days', required: true },
      { name: 'usedLeaves', type: 'number', description: 'Days consumed by approved requests', required: true },
      { name: 'currentBalance', type: 'number', description: 'openingBalance - usedLeaves', required: true },
      { name: 'breakdown', type: 'LeaveBreakdownEntry[]', description: 'Per leave type: count, daysPerLeave, days, recognized', required: true },
    ],
  },
  {
    name: 'WorkReport',
    description: 'A daily work report submitted by an employee',
    fields: [
      { name: 'id', type: 'number', description: 'Unique identifier', required: true },
      { name: 'employeeId', type: 'number', description: 'Employee the report belongs to', required: true },
      { name: 'reportDate', type: 'string (YYYY-MM-DD)', description: 'Day the work was done', required: true },
      { name: 'hours', type: 'number', description: 'Hours reported', required: true },
      { name: 'project', type: 'string | null', description: 'Project name' },
      { name: 'description', type: 'string | null', description: 'Work summary' },
    ],
  },
  {
    name: 'ApiKey',
    description: 'An API key record (the key itself is never returned after creation)',
    fields: [
      { name: 'id', type: 'number', description: 'Unique identifier', required: true },
      { name: 'name', type: 'string', description: 'Owner/purpose label', required: true },
      { name: 'key', type: 'string', description: 'Masked key prefix', required: true },
      { name: 'isActive', type: 'boolean', description: 'False once revoked', required: true },
      { name: 'createdAt', type: 'string (ISO 8601)', description: 'Creation time' },
      { name: 'lastUsedAt', type: 'string (ISO 8601) | null', description: 'Last successful use' },
      { name: 'expiresAt', type: 'string (ISO 8601) | null', description: 'Expiry time' },
    ],
  },
];

// ============================================
// SCHEMA CATEGORIES
// ============================================

export const SCHEMA_CATEGORIES: SchemaCategory[] = [
  {
    name: 'employees',
    description: 'Employees and name resolution',
    entities: ENTITIES.filter(e => e.name === 'Employee'),
    enums: ENUMS.filter(e => ['resolution_status', 'match_type', 'employee_status'].includes(e.name)),
  },
  {
    name: 'leave',
    description: 'Leave balances',
    entities: ENTITIES.filter(e => e.name === 'LeaveBalance'),
    enums: ENUMS.filter(e => e.name === 'leave_type'),
  },
  {
    name: 'work_reports',
    description: 'Daily work reports',
    entities: ENTITIES.filter(e => e.name === 'WorkReport'),
  },
  {
    name: 'security',
    description: 'API key management',
    entities: ENTITIES.filter(e => e.name === 'ApiKey'),
  },
];

function findByName<T extends { name: string }>(items: T[], name: string): T | undefined {
  return items.find(item => item.name.toLowerCase() === name.toLowerCase());
}

/**
 * Get schema information
 */
export function getSchema(params: {
  category?: string;
  entity?: string;
  enum?: string;
}): {
  categories?: SchemaCategory[];
  entity?: EntityDefinition;
  enum?: EnumDefinition;
  available_categories?: string[];
  available_entities?: string[];
  available_enums?: string[];
} {
  if (params.entity) {
    const entity = findByName(ENTITIES, params.entity);
    return entity ? { entity } : { available_entities: ENTITIES.map(e => e.name) };
  }

  if (params.enum) {
    const enumDef = findByName(ENUMS, params.enum);
    return enumDef ? { enum: enumDef } : { available_enums: ENUMS.map(e => e.name) };
  }

  if (params.category) {
    const category = findByName(SCHEMA_CATEGORIES, params.category);
    return category
      ? { categories: [category] }
      : { available_categories: SCHEMA_CATEGORIES.map(c => c.name) };
  }

  // Full schema overview
  return {
    categories: SCHEMA_CATEGORIES,
    available_entities: ENTITIES.map(e => e.name),
    available_enums: ENUMS.map(e => e.name),
  };
}
