import * as fs from 'fs';
import * as path from 'path';
import type {
  CapturedSuite,
  ReportOptions,
  ReportSummary,
  SuiteSummary,
} from '../types.js';
import { ExpectReadError, SuiteError } from '../results/errors.js';
import { expectFile } from '../results/expect-string.js';
import { TestSuiteResult } from '../results/suite-result.js';
import { TestResult } from '../results/test-result.js';
import { parseCapturesFile } from '../utils/captures-file.js';
import type { Painter } from '../utils/colors.js';
import { createPainter } from '../utils/colors.js';
import type { DiffEngine } from '../utils/diff.js';

export interface CollectedSuite {
  name: string;
  totalTests: number;
  results: TestResult[];
  errors: Error[];
}

export interface ReportRunnerOptions extends ReportOptions {
  paint?: Painter;
  diffEngine?: DiffEngine;
  write?: (line: string) => void;
}

/** Contents of an expect file, or undefined when it does not exist yet. */
export async function readExpectFile(file: string): Promise<string | undefined> {
  try {
    return await fs.promises.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw new ExpectReadError(file, error);
  }
}

/**
 * Classify every captured test of a suite. Tests are processed concurrently
 * but results and errors keep the order the tests were captured in.
 */
export async function collectSuite(
  suite: CapturedSuite,
  root: string,
): Promise<CollectedSuite> {
  const settled = await Promise.all(
    suite.tests.map(async (test): Promise<TestResult | Error> => {
      const testPath = path.resolve(root, test.path);

      if ('error' in test) {
        return new SuiteError(testPath, test.error);
      }

      try {
        const stored = await readExpectFile(expectFile(testPath));
        return TestResult.fromOutput({ ...test, path: testPath }, stored);
      } catch (error) {
        return new SuiteError(
          testPath,
          error instanceof Error ? error.message : String(error),
        );
      }
    }),
  );

  const results: TestResult[] = [];
  const errors: Error[] = [];
  for (const entry of settled) {
    if (entry instanceof TestResult) {
      results.push(entry);
    } else {
      errors.push(entry);
    }
  }

  return { name: suite.name, totalTests: suite.tests.length, results, errors };
}

/** Save every result; failures are returned rather than thrown. */
export async function saveSuiteResults(
  results: readonly TestResult[],
): Promise<Error[]> {
  const settled = await Promise.allSettled(
    results.map((result) => result.saveResults()),
  );

  const errors: Error[] = [];
  settled.forEach((outcome, i) => {
    if (outcome.status === 'rejected') {
      const reason: unknown = outcome.reason;
      errors.push(
        new SuiteError(
          results[i].path,
          reason instanceof Error ? reason.message : String(reason),
        ),
      );
    }
  });
  return errors;
}

export async function runReport(
  capturesPath: string,
  options: ReportRunnerOptions = {},
): Promise<ReportSummary> {
  const startTime = Date.now();
  const captures = parseCapturesFile(
    fs.readFileSync(capturesPath, 'utf-8'),
  );
  const root = options.root ?? path.dirname(capturesPath);
  const paint = options.paint ?? createPainter(options.color);

  const suites: SuiteSummary[] = [];

  for (const captured of captures.suites) {
    const collected = await collectSuite(captured, root);

    if (options.save) {
      collected.errors.push(...(await saveSuiteResults(collected.results)));
    }

    const suite = new TestSuiteResult(
      collected.name,
      collected.results,
      collected.errors,
    );
    suites.push({
      name: collected.name,
      totalTests: collected.totalTests,
      ...suite.counts(),
    });

    suite.filter(options.only).print(collected.totalTests, {
      showDiff: options.diff ?? false,
      diff: options.diffEngine,
      paint,
      write: options.write,
    });
  }

  return { suites, durationMs: Date.now() - startTime };
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
