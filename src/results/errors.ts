export class ExpectWriteError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write expect file ${path}: ${causeMessage(cause)}`, {
      cause,
    });
    this.name = 'ExpectWriteError';
  }
}

export class ExpectReadError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to read expect file ${path}: ${causeMessage(cause)}`, { cause });
    this.name = 'ExpectReadError';
  }
}

/** A test that never produced a result, reported apart from outcomes. */
export class SuiteError extends Error {
  constructor(
    readonly testPath: string,
    message: string,
  ) {
    super(`${testPath}: ${message}`);
    this.name = 'SuiteError';
  }
}

export class ConsumedSuiteError extends Error {
  constructor(readonly suiteName: string) {
    super(`Suite result "${suiteName}" was already consumed`);
    this.name = 'ConsumedSuiteError';
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
