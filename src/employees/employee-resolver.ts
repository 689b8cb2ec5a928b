/**
 * Employee Resolution Service
 *
 * Turns a free-text query into a single employee, a disambiguation list, or
 * nothing. Exact lookup is tried first; fuzzy ranking over active employees
 * is the fallback. A caller-supplied context can narrow an ambiguous set.
 */

import { ConfigError, EmployeeLookupError, describeError } from '../errors.js';
import type { NameMatcher } from './name-matcher.js';
import type { Employee, EmployeeLookup, ResolutionResult, ResolverOptions } from './types.js';

const DEFAULT_OPTIONS: ResolverOptions = {
  threshold: 0.6,
  maxFuzzyCandidates: 5,
};

function matchesContext(employee: Employee, context: string): boolean {
  const fields = [employee.designation, employee.email, employee.name, employee.employeeNumber];
  return fields.some(field => (field ?? '').toLowerCase().includes(context));
}

export class EmployeeResolver {
  private lookup: EmployeeLookup;
  private matcher: NameMatcher;
  private options: ResolverOptions;

  constructor(lookup: EmployeeLookup, matcher: NameMatcher, options: Partial<ResolverOptions> = {}) {
    this.lookup = lookup;
    this.matcher = matcher;
    this.options = { ...DEFAULT_OPTIONS, ...options };

    const { maxFuzzyCandidates } = this.options;
    if (!Number.isInteger(maxFuzzyCandidates) || maxFuzzyCandidates < 1) {
      throw new ConfigError(`maxFuzzyCandidates must be a positive integer, got ${maxFuzzyCandidates}`);
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof EmployeeLookupError) throw error;
      throw new EmployeeLookupError(`Employee ${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Candidate employees for a query: exact matches, or else the best fuzzy
   * matches among active employees.
   */
  async search(query: string): Promise<Employee[]> {
    const exact = await this.call('exact lookup', () => this.lookup.lookupExact(query));
    if (exact.length > 0) {
      return exact;
    }

    const active = await this.call('active listing', () => this.lookup.listActive());
    return this.matcher
      .rankMatches(query, active, this.options.threshold)
      .slice(0, this.options.maxFuzzyCandidates)
      .map(match => match.employee);
  }

  async resolve(query: string, context?: string): Promise<ResolutionResult> {
    const candidates = await this.search(query);

    if (candidates.length === 0) {
      return { status: 'not_found', query };
    }

    if (candidates.length === 1) {
      return { status: 'resolved', employee: candidates[0] };
    }

    const needle = (context ?? '').trim().toLowerCase();
    if (needle) {
      const narrowed = candidates.filter(employee => matchesContext(employee, needle));
      if (narrowed.length === 1) {
        return { status: 'resolved', employee: narrowed[0] };
      }
    }

    return { status: 'ambiguous', candidates };
  }
}
