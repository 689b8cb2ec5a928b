/**
 * Employee Resolution Module
 */

export { NameMatcher } from './name-matcher.js';
export { EmployeeResolver } from './employee-resolver.js';
export {
  sequenceRatio,
  sequenceRatioSimilarity,
  createLevenshteinSimilarity,
  detectEditSimilarity,
} from './similarity.js';
export { isActiveEmployee, EDIT_SIMILARITY_KINDS, NAME_VARIANTS } from './types.js';
export type {
  Employee,
  EmployeeLookup,
  MatchCandidate,
  MatchType,
  ResolutionResult,
  EditSimilarity,
  EditSimilarityKind,
  NameVariant,
  NameMatcherOptions,
  ResolverOptions,
} from './types.js';
