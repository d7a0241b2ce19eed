import type {
  CapturedSuite,
  CapturedTest,
  CapturesFile,
} from '../types.js';

export function parseCapturesFile(content: string): CapturesFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new Error(`Invalid JSON in captures file: ${(e as Error).message}`);
  }

  if (!isRecord(parsed)) {
    throw new Error('Captures file must contain a JSON object');
  }

  if (!Array.isArray(parsed.suites)) {
    throw new Error('Captures file missing required "suites" array');
  }

  return {
    suites: parsed.suites.map((suite, i) => parseSuite(suite, `suites[${i}]`)),
  };
}

function parseSuite(value: unknown, where: string): CapturedSuite {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }
  if (typeof value.name !== 'string') {
    throw new Error(`${where} missing required "name" string`);
  }
  if (!Array.isArray(value.tests)) {
    throw new Error(`${where} missing required "tests" array`);
  }

  const seen = new Set<string>();
  const tests = value.tests.map((test, i) => {
    const parsed = parseTest(test, `${where}.tests[${i}]`);
    if (seen.has(parsed.path)) {
      throw new Error(
        `${where}.tests[${i}] duplicates path "${parsed.path}"`,
      );
    }
    seen.add(parsed.path);
    return parsed;
  });

  return { name: value.name, tests };
}

function parseTest(value: unknown, where: string): CapturedTest {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }
  if (typeof value.path !== 'string' || value.path === '') {
    throw new Error(`${where} missing required "path" string`);
  }

  if ('error' in value) {
    if (typeof value.error !== 'string') {
      throw new Error(`${where} "error" must be a string`);
    }
    return { path: value.path, error: value.error };
  }

  if (typeof value.status !== 'number' || !Number.isInteger(value.status)) {
    throw new Error(`${where} "status" must be an integer`);
  }
  if (typeof value.stdout !== 'string') {
    throw new Error(`${where} "stdout" must be a string`);
  }
  if (typeof value.stderr !== 'string') {
    throw new Error(`${where} "stderr" must be a string`);
  }

  return {
    path: value.path,
    status: value.status,
    stdout: value.stdout,
    stderr: value.stderr,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
