export type Outcome =
  | { type: 'correct' }
  | { type: 'missing'; generated: string }
  | { type: 'mismatch'; generated: string; stored: string };

export type OutcomeCategory = 'fail' | 'pass' | 'missing';

export interface CapturedOutput {
  path: string;
  status: number;
  stdout: string;
  stderr: string;
}

export interface CapturedError {
  path: string;
  error: string;
}

export type CapturedTest = CapturedOutput | CapturedError;

export interface CapturedSuite {
  name: string;
  tests: CapturedTest[];
}

export interface CapturesFile {
  suites: CapturedSuite[];
}

export interface OutcomeCounts {
  pass: number;
  fail: number;
  missing: number;
  errors: number;
}

export interface SuiteSummary extends OutcomeCounts {
  name: string;
  totalTests: number;
}

export interface ReportSummary {
  suites: SuiteSummary[];
  durationMs: number;
}

export interface ReportOptions {
  only?: OutcomeCategory;
  diff?: boolean;
  save?: boolean;
  root?: string;
  color?: boolean;
}
