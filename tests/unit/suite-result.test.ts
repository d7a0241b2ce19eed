import { describe, it, expect, afterEach, vi } from 'vitest';
import { TestSuiteResult } from '../../src/results/suite-result.js';
import { TestResult } from '../../src/results/test-result.js';
import { ConsumedSuiteError, SuiteError } from '../../src/results/errors.js';
import type { Outcome } from '../../src/types.js';

function result(testPath: string, state: Outcome): TestResult {
  return new TestResult(
    { path: testPath, status: 0, stdout: '', stderr: '' },
    state,
  );
}

const pass = (p: string) => result(p, { type: 'correct' });
const miss = (p: string) => result(p, { type: 'missing', generated: 'new' });
const fail = (p: string) =>
  result(p, { type: 'mismatch', generated: 'new', stored: 'old' });

function mixedSuite(errors: Error[] = []): TestSuiteResult {
  return new TestSuiteResult(
    'cli',
    [pass('a.t'), fail('b.t'), miss('c.t'), fail('d.t'), pass('e.t')],
    errors,
  );
}

function collect(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('TestSuiteResult.filter', () => {
  it('keeps every result in order without a category', () => {
    const suite = mixedSuite();
    const before = suite.results;

    const filtered = suite.filter(undefined);

    expect(filtered.results).toEqual(before);
    expect(filtered.results.map((r) => r.path)).toEqual([
      'a.t',
      'b.t',
      'c.t',
      'd.t',
      'e.t',
    ]);
  });

  it('keeps only mismatches for fail', () => {
    const filtered = mixedSuite().filter('fail');

    expect(filtered.results.map((r) => r.path)).toEqual(['b.t', 'd.t']);
    expect(filtered.results.every((r) => r.state.type === 'mismatch')).toBe(
      true,
    );
  });

  it('keeps only correct results for pass', () => {
    const filtered = mixedSuite().filter('pass');

    expect(filtered.results.map((r) => r.path)).toEqual(['a.t', 'e.t']);
  });

  it('keeps only missing results for missing', () => {
    const filtered = mixedSuite().filter('missing');

    expect(filtered.results.map((r) => r.path)).toEqual(['c.t']);
  });

  it('is idempotent', () => {
    const once = mixedSuite().filter('fail');
    const paths = once.results.map((r) => r.path);

    const twice = once.filter('fail');

    expect(twice.results.map((r) => r.path)).toEqual(paths);
  });

  it('never filters suite errors', () => {
    const error = new SuiteError('z.t', 'could not run');

    const filtered = mixedSuite([error]).filter('pass');

    expect(filtered.errors).toEqual([error]);
  });

  it('consumes the original suite', () => {
    const suite = mixedSuite();

    suite.filter('fail');

    expect(suite.isConsumed).toBe(true);
    expect(() => suite.results).toThrow(ConsumedSuiteError);
    expect(() => suite.filter('fail')).toThrow(ConsumedSuiteError);
  });
});

describe('TestSuiteResult.counts', () => {
  it('tallies outcomes and errors without consuming', () => {
    const suite = mixedSuite([new SuiteError('z.t', 'could not run')]);

    expect(suite.counts()).toEqual({ pass: 2, fail: 2, missing: 1, errors: 1 });
    expect(suite.isConsumed).toBe(false);
  });
});

describe('TestSuiteResult.print', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the pre-filter test count after filtering', () => {
    const { lines, write } = collect();

    mixedSuite().filter('fail').print(5, { write });

    expect(lines).toEqual([
      'cli (5 tests)',
      '  ⚬ fail - b.t',
      '  ⚬ fail - d.t',
    ]);
  });

  it('prints every result in order', () => {
    const { lines, write } = collect();

    mixedSuite().print(5, { write });

    expect(lines).toEqual([
      'cli (5 tests)',
      '  ⚬ pass - a.t',
      '  ⚬ fail - b.t',
      '  ⚬ miss - c.t',
      '  ⚬ fail - d.t',
      '  ⚬ pass - e.t',
    ]);
  });

  it('prints suite errors in their own section', () => {
    const { lines, write } = collect();
    const suite = new TestSuiteResult(
      'cli',
      [pass('a.t')],
      [new SuiteError('z.t', 'could not run'), new Error('engine crashed')],
    );

    suite.print(2, { write });

    expect(lines).toEqual([
      'cli (2 tests)',
      '  ⚬ pass - a.t',
      '  suite errors',
      '    z.t: could not run',
      '    engine crashed',
    ]);
  });

  it('omits the error section when there are no errors', () => {
    const { lines, write } = collect();

    new TestSuiteResult('empty', []).print(0, { write });

    expect(lines).toEqual(['empty (0 tests)']);
  });

  it('passes diff options through to each result', () => {
    const { lines, write } = collect();
    const diff = vi.fn(() => 'DIFF');

    new TestSuiteResult('cli', [fail('b.t')]).print(1, {
      write,
      showDiff: true,
      diff,
    });

    expect(lines).toEqual(['cli (1 tests)', '  ⚬ fail - b.t\nDIFF']);
    expect(diff).toHaveBeenCalledWith('old', 'new');
  });

  it('writes to console.log by default', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new TestSuiteResult('cli', [pass('a.t')]).print(1);

    expect(logSpy.mock.calls).toEqual([['cli (1 tests)'], ['  ⚬ pass - a.t']]);
  });

  it('cannot be printed twice', () => {
    const { write } = collect();
    const suite = mixedSuite();

    suite.print(5, { write });

    expect(() => suite.print(5, { write })).toThrow(ConsumedSuiteError);
  });
});
