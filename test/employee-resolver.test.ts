import { describe, expect, it } from 'vitest';
import { EmployeeResolver } from '../src/employees/employee-resolver.js';
import { ConfigError, EmployeeLookupError } from '../src/errors.js';
import { StubLookup, levenshteinMatcher, makeEmployee } from './fixtures.js';

const matcher = levenshteinMatcher();

const backendRavi = makeEmployee({
  id: 21,
  name: 'Ravi Kumar',
  designation: 'Backend Developer',
  email: 'ravi.k@example.com',
  employeeNumber: 'EMP021',
});
const testerRavi = makeEmployee({
  id: 22,
  name: 'Ravi Menon',
  designation: 'QA Engineer',
  email: 'ravi.m@example.com',
  employeeNumber: 'EMP022',
});

describe('EmployeeResolver.resolve', () => {
  it('resolves a unique exact match without listing active employees', async () => {
    const john = makeEmployee({ id: 1, name: 'John Doe' });
    const lookup = new StubLookup([john], [john]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('John Doe');

    expect(result).toEqual({ status: 'resolved', employee: john });
    expect(lookup.exactCalls).toEqual(['John Doe']);
    expect(lookup.activeCalls).toBe(0);
  });

  it('resolves a typo through fuzzy matching', async () => {
    const jon = makeEmployee({ id: 1, name: 'Jon Doe' });
    const alice = makeEmployee({ id: 2, name: 'Alice Smith' });
    const lookup = new StubLookup([], [jon, alice]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('John Doe');

    expect(result).toEqual({ status: 'resolved', employee: jon });
    expect(lookup.activeCalls).toBe(1);
  });

  it('narrows several exact matches with context', async () => {
    const lookup = new StubLookup([backendRavi, testerRavi]);
    const resolver = new EmployeeResolver(lookup, matcher);

    expect(await resolver.resolve('Ravi', 'qa')).toEqual({ status: 'resolved', employee: testerRavi });
    expect(await resolver.resolve('Ravi', '  BACKEND ')).toEqual({ status: 'resolved', employee: backendRavi });
    expect(await resolver.resolve('Ravi', 'emp021')).toEqual({ status: 'resolved', employee: backendRavi });
  });

  it('stays ambiguous when context matches none of the candidates', async () => {
    const lookup = new StubLookup([backendRavi, testerRavi]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('Ravi', 'manager');

    expect(result).toEqual({ status: 'ambiguous', candidates: [backendRavi, testerRavi] });
  });

  it('returns every candidate when context matches more than one', async () => {
    const frontendRavi = makeEmployee({ id: 23, name: 'Ravi Shah', designation: 'Frontend Developer' });
    const lookup = new StubLookup([backendRavi, testerRavi, frontendRavi]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('Ravi', 'developer');

    expect(result).toEqual({ status: 'ambiguous', candidates: [backendRavi, testerRavi, frontendRavi] });
  });

  it('ignores blank context', async () => {
    const lookup = new StubLookup([backendRavi, testerRavi]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('Ravi', '   ');

    expect(result.status).toBe('ambiguous');
  });

  it('reports not found for an empty query and an empty directory', async () => {
    const lookup = new StubLookup([], []);

    expect(await new EmployeeResolver(lookup, matcher).resolve('')).toEqual({ status: 'not_found', query: '' });
  });

  it('resolves an empty query to an active employee with a blank name', async () => {
    const unnamed = makeEmployee({ id: 7, name: '' });
    const lookup = new StubLookup([], [unnamed, makeEmployee({ id: 8, name: 'John Doe' })]);

    expect(await new EmployeeResolver(lookup, matcher).resolve('')).toEqual({ status: 'resolved', employee: unnamed });
  });

  it('lists only candidates above the threshold when fuzzy matching is ambiguous', async () => {
    const jon = makeEmployee({ id: 1, name: 'Jon Doe' });
    const joan = makeEmployee({ id: 2, name: 'Joan Doe' });
    const alice = makeEmployee({ id: 3, name: 'Alice Smith' });
    const lookup = new StubLookup([], [joan, alice, jon]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('John Doe');

    expect(result).toEqual({ status: 'ambiguous', candidates: [jon, joan] });
  });

  it('reports not found when no active employee is close enough', async () => {
    const lookup = new StubLookup([], [makeEmployee({ id: 1, name: 'Alice Smith' })]);

    const result = await new EmployeeResolver(lookup, matcher).resolve('Zed Xylo');

    expect(result).toEqual({ status: 'not_found', query: 'Zed Xylo' });
  });

  it('returns the same result for repeated calls', async () => {
    const jon = makeEmployee({ id: 1, name: 'Jon Doe' });
    const joan = makeEmployee({ id: 2, name: 'Joan Doe' });
    const resolver = new EmployeeResolver(new StubLookup([], [jon, joan]), matcher);

    const first = await resolver.resolve('John Doe');
    const second = await resolver.resolve('John Doe');

    expect(first).toEqual({ status: 'ambiguous', candidates: [jon, joan] });
    expect(second).toEqual(first);
  });
});

describe('EmployeeResolver.search', () => {
  it('returns exact matches as they come from the lookup', async () => {
    const lookup = new StubLookup([testerRavi, backendRavi]);

    expect(await new EmployeeResolver(lookup, matcher).search('ravi')).toEqual([testerRavi, backendRavi]);
  });

  it('keeps at most the configured number of fuzzy candidates, best first', async () => {
    const active = [
      makeEmployee({ id: 1, name: 'Jon Doe' }),
      ...[2, 3, 4, 5, 6, 7].map(id => makeEmployee({ id, name: 'John Doe' })),
    ];
    const lookup = new StubLookup([], active);

    const defaults = await new EmployeeResolver(lookup, matcher).search('John Doe');
    const narrow = await new EmployeeResolver(lookup, matcher, { maxFuzzyCandidates: 2 }).search('John Doe');

    expect(defaults.map(e => e.id)).toEqual([2, 3, 4, 5, 6]);
    expect(narrow.map(e => e.id)).toEqual([2, 3]);
  });

  it('applies the configured threshold', async () => {
    const lookup = new StubLookup([], [makeEmployee({ id: 1, name: 'Jon Doe' })]);

    expect(await new EmployeeResolver(lookup, matcher, { threshold: 0.95 }).search('John Doe')).toEqual([]);
  });

  it('rejects a candidate cap that is not a positive integer', () => {
    const lookup = new StubLookup([]);

    expect(() => new EmployeeResolver(lookup, matcher, { maxFuzzyCandidates: -1 })).toThrow(ConfigError);
    expect(() => new EmployeeResolver(lookup, matcher, { maxFuzzyCandidates: 0 })).toThrow(ConfigError);
    expect(() => new EmployeeResolver(lookup, matcher, { maxFuzzyCandidates: 1.5 })).toThrow(ConfigError);
  });
});

describe('EmployeeResolver lookup failures', () => {
  it('wraps an exact lookup failure', async () => {
    const cause = new Error('connection refused');
    const resolver = new EmployeeResolver(new StubLookup(cause), matcher);

    const error = await resolver.resolve('John').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmployeeLookupError);
    expect(error).toMatchObject({
      code: 'LOOKUP_FAILED',
      message: 'Employee exact lookup failed: connection refused',
      cause,
    });
  });

  it('wraps an active listing failure', async () => {
    const resolver = new EmployeeResolver(new StubLookup([], new Error('timeout')), matcher);

    await expect(resolver.resolve('John')).rejects.toThrow('Employee active listing failed: timeout');
  });

  it('passes an existing lookup error through unchanged', async () => {
    const original = new EmployeeLookupError('pool exhausted');
    const resolver = new EmployeeResolver(new StubLookup(original), matcher);

    await expect(resolver.resolve('John')).rejects.toBe(original);
  });
});
