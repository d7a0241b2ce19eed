import type { OutcomeCategory, OutcomeCounts } from '../types.js';
import type { Painter } from '../utils/colors.js';
import { plainPainter } from '../utils/colors.js';
import type { DiffEngine } from '../utils/diff.js';
import { ConsumedSuiteError } from './errors.js';
import { categoryOf, matchesCategory } from './outcome.js';
import type { TestResult } from './test-result.js';

export interface PrintOptions {
  showDiff?: boolean;
  diff?: DiffEngine;
  paint?: Painter;
  write?: (line: string) => void;
}

/**
 * Results of one suite plus the errors of tests that never produced a
 * result. `filter` and `print` consume the value; using it afterwards
 * throws ConsumedSuiteError.
 */
export class TestSuiteResult {
  private consumed = false;
  private readonly _results: readonly TestResult[];
  private readonly _errors: readonly Error[];

  constructor(
    readonly name: string,
    results: readonly TestResult[],
    errors: readonly Error[] = [],
  ) {
    this._results = [...results];
    this._errors = [...errors];
  }

  get results(): readonly TestResult[] {
    this.assertLive();
    return this._results;
  }

  get errors(): readonly Error[] {
    this.assertLive();
    return this._errors;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  counts(): OutcomeCounts {
    this.assertLive();
    const counts: OutcomeCounts = {
      pass: 0,
      fail: 0,
      missing: 0,
      errors: this._errors.length,
    };
    for (const result of this._results) {
      counts[categoryOf(result.state)]++;
    }
    return counts;
  }

  /** Keep only the results in the given category; errors always stay. */
  filter(only?: OutcomeCategory): TestSuiteResult {
    const { name, results, errors } = this.take();
    return new TestSuiteResult(
      name,
      results.filter((result) => matchesCategory(result.state, only)),
      errors,
    );
  }

  /**
   * Print the results of this suite. `numTests` is the number of tests in
   * the suite before any filtering.
   */
  print(numTests: number, options: PrintOptions = {}): void {
    const { name, results, errors } = this.take();
    const paint = options.paint ?? plainPainter;
    const write = options.write ?? console.log;
    const reportOptions = { diff: options.diff, paint };

    write(`${paint('bold', name)} (${numTests} tests)`);
    for (const result of results) {
      write(`  ${result.reportStr(options.showDiff ?? false, reportOptions)}`);
    }

    if (errors.length > 0) {
      write(`  ${paint('error', 'suite errors')}`);
      for (const error of errors) {
        write(`    ${paint('error', error.message)}`);
      }
    }
  }

  private take(): {
    name: string;
    results: readonly TestResult[];
    errors: readonly Error[];
  } {
    this.assertLive();
    this.consumed = true;
    return { name: this.name, results: this._results, errors: this._errors };
  }

  private assertLive(): void {
    if (this.consumed) {
      throw new ConsumedSuiteError(this.name);
    }
  }
}
