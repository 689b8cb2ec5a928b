import { distance } from 'fastest-levenshtein';
import type { ApiKeyStore, NewApiKey, StoredApiKey } from '../src/auth/types.js';
import type { HrDataSource, WorkReport, WorkReportFilter } from '../src/db/types.js';
import { NameMatcher } from '../src/employees/name-matcher.js';
import { createLevenshteinSimilarity } from '../src/employees/similarity.js';
import type { Employee, EmployeeLookup, NameVariant } from '../src/employees/types.js';
import type { LeaveTypeCount } from '../src/leave/types.js';

export function makeEmployee(fields: Partial<Employee> & { id: number; name: string }): Employee {
  return {
    designation: null,
    email: null,
    mobile: null,
    employeeNumber: null,
    status: 1,
    dateOfJoining: null,
    bloodGroup: null,
    username: null,
    openingLeaveBalance: 0,
    ...fields,
  };
}

export function levenshteinMatcher(variants?: NameVariant[]): NameMatcher {
  return new NameMatcher(createLevenshteinSimilarity(distance), variants ? { variants } : {});
}

/**
 * Lookup with fixed answers, recording how often each capability is used
 */
export class StubLookup implements EmployeeLookup {
  exactCalls: string[] = [];
  activeCalls = 0;

  constructor(
    private exact: Employee[] | Error,
    private active: Employee[] | Error = []
  ) {}

  async lookupExact(query: string): Promise<Employee[]> {
    this.exactCalls.push(query);
    if (this.exact instanceof Error) throw this.exact;
    return this.exact;
  }

  async listActive(): Promise<Employee[]> {
    this.activeCalls++;
    if (this.active instanceof Error) throw this.active;
    return this.active;
  }
}

/**
 * In-memory HR store with the same matching rules as the SQL queries
 */
export class InMemoryHrStore implements HrDataSource {
  failing = false;

  constructor(
    private employees: Employee[],
    private leaveCounts: Record<number, LeaveTypeCount[]> = {},
    private workReports: WorkReport[] = []
  ) {}

  private check(): void {
    if (this.failing) throw new Error('connection refused');
  }

  async lookupExact(query: string): Promise<Employee[]> {
    this.check();
    if (!query.trim()) return [];
    const needle = query.toLowerCase();
    return this.employees
      .filter(e => [e.name, e.email, e.mobile, e.employeeNumber].some(f => (f ?? '').toLowerCase().includes(needle)))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async listActive(): Promise<Employee[]> {
    this.check();
    return this.employees.filter(e => e.status === 1);
  }

  async getEmployeeById(id: number): Promise<Employee | null> {
    this.check();
    return this.employees.find(e => e.id === id) ?? null;
  }

  async getApprovedLeaveCounts(employeeId: number): Promise<LeaveTypeCount[]> {
    this.check();
    return this.leaveCounts[employeeId] ?? [];
  }

  async listWorkReports(employeeId: number, filter: WorkReportFilter): Promise<WorkReport[]> {
    this.check();
    return this.workReports
      .filter(r => r.employeeId === employeeId)
      .filter(r => !filter.from || (r.reportDate ?? '') >= filter.from)
      .filter(r => !filter.to || (r.reportDate ?? '') <= filter.to)
      .slice(0, filter.limit);
  }
}

export class InMemoryApiKeyStore implements ApiKeyStore {
  records: Array<StoredApiKey & { keyHash: string }> = [];
  touches: number[] = [];

  async ensureTable(): Promise<void> {}

  async findActiveByHash(keyHash: string): Promise<StoredApiKey | null> {
    return this.records.find(r => r.keyHash === keyHash && r.isActive) ?? null;
  }

  async touch(id: number): Promise<void> {
    this.touches.push(id);
  }

  async create(key: NewApiKey): Promise<StoredApiKey> {
    const record = {
      id: this.records.length + 1,
      name: key.name,
      keyPrefix: key.keyPrefix,
      keyHash: key.keyHash,
      isActive: true,
      createdAt: new Date('2026-01-01T00:00:00Z'),
      lastUsedAt: null,
      expiresAt: key.expiresAt,
    };
    this.records.push(record);
    return record;
  }

  async list(): Promise<StoredApiKey[]> {
    return [...this.records];
  }

  async revoke(id: number): Promise<boolean> {
    const record = this.records.find(r => r.id === id && r.isActive);
    if (!record) return false;
    record.isActive = false;
    return true;
  }

  async countActive(): Promise<number> {
    return this.records.filter(r => r.isActive).length;
  }
}
