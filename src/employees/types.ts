/**
 * Types for employee name resolution
 */

export interface Employee {
  readonly id: number;
  readonly name: string;
  readonly designation: string | null;
  readonly email: string | null;
  readonly mobile: string | null;
  readonly employeeNumber: string | null;
  readonly status: number;        // 1 = active
  readonly dateOfJoining: string | null;  // YYYY-MM-DD
  readonly bloodGroup: string | null;
  readonly username: string | null;
  readonly openingLeaveBalance: number;
}

export function isActiveEmployee(employee: Employee): boolean {
  return employee.status === 1;
}

export type MatchType = 'exact' | 'fuzzy';

export interface MatchCandidate<T extends { name: string } = Employee> {
  employee: T;
  score: number;  // 0-1
  matchType: MatchType;
}

export type ResolutionResult =
  | { status: 'not_found'; query: string }
  | { status: 'resolved'; employee: Employee }
  | { status: 'ambiguous'; candidates: Employee[] };

/**
 * Data-access capability the resolver depends on
 */
export interface EmployeeLookup {
  /** Substring match on name, email, phone and employee number; any status */
  lookupExact(query: string): Promise<Employee[]>;
  /** Every employee with active status */
  listActive(): Promise<Employee[]>;
}

export const EDIT_SIMILARITY_KINDS = ['levenshtein', 'sequence-ratio'] as const;
export type EditSimilarityKind = (typeof EDIT_SIMILARITY_KINDS)[number];

/**
 * Similarity of two already-normalized strings, in [0, 1]
 */
export interface EditSimilarity {
  readonly kind: EditSimilarityKind;
  similarity(a: string, b: string): number;
}

export const NAME_VARIANTS = ['reversed', 'token-split'] as const;
export type NameVariant = (typeof NAME_VARIANTS)[number];

export interface NameMatcherOptions {
  editSimilarity: EditSimilarity;
  editWeight: number;       // default: 0.6
  sequenceWeight: number;   // default: 0.4
  threshold: number;        // default: 0.6
  variants: NameVariant[];  // default: all
}

export interface ResolverOptions {
  threshold: number;           // default: 0.6
  maxFuzzyCandidates: number;  // default: 5
}
