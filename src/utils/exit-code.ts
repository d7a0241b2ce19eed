import type { ReportSummary } from '../types.js';

/** Exit status for a finished report: 1 on suite errors or unresolved tests. */
export function exitCodeFor(
  summary: ReportSummary,
  saved: boolean = false,
): number {
  const failing = summary.suites.some(
    (suite) =>
      suite.errors > 0 || (!saved && (suite.fail > 0 || suite.missing > 0)),
  );
  return failing ? 1 : 0;
}
