import * as fs from 'fs';
import type { CapturedOutput, Outcome } from '../types.js';
import type { Painter } from '../utils/colors.js';
import { plainPainter } from '../utils/colors.js';
import type { DiffEngine } from '../utils/diff.js';
import { genDiff } from '../utils/diff.js';
import { ExpectWriteError } from './errors.js';
import { expectFile, toExpectString } from './expect-string.js';
import { assertNever, categoryOf, classify } from './outcome.js';

export interface ReportStrOptions {
  diff?: DiffEngine;
  paint?: Painter;
}

const TAGS = {
  missing: 'miss',
  pass: 'pass',
  fail: 'fail',
} as const;

/** Everything known about one test after its output has been classified. */
export class TestResult {
  readonly path: string;
  readonly status: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly state: Outcome;

  constructor(output: CapturedOutput, state: Outcome) {
    this.path = output.path;
    this.status = output.status;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
    this.state = state;
  }

  /**
   * Format the captured output and classify it against the contents of the
   * expect file, if there is one.
   */
  static fromOutput(output: CapturedOutput, stored?: string): TestResult {
    const generated = toExpectString(
      output.status,
      output.stdout,
      output.stderr,
    );
    return new TestResult(output, classify(generated, stored));
  }

  get expectPath(): string {
    return expectFile(this.path);
  }

  /**
   * Save the generated expect string into the expect file. Passing tests
   * leave the filesystem untouched.
   */
  async saveResults(): Promise<void> {
    const state = this.state;
    switch (state.type) {
      case 'correct':
        return;
      case 'missing':
      case 'mismatch':
        try {
          await fs.promises.writeFile(this.expectPath, state.generated);
        } catch (error) {
          throw new ExpectWriteError(this.expectPath, error);
        }
        return;
      default:
        return assertNever(state);
    }
  }

  /** One report line for this test, optionally followed by its diff. */
  reportStr(showDiff: boolean, options: ReportStrOptions = {}): string {
    const diff = options.diff ?? genDiff;
    const paint = options.paint ?? plainPainter;
    const state = this.state;
    const category = categoryOf(state);

    let line =
      paint(category, `⚬ ${TAGS[category]} - `) + paint(category, this.path);

    if (!showDiff) {
      return line;
    }

    switch (state.type) {
      case 'correct':
        break;
      case 'missing':
        line += '\n' + state.generated;
        break;
      case 'mismatch':
        line += '\n' + diff(state.stored, state.generated);
        break;
      default:
        return assertNever(state);
    }

    return line;
  }
}
