import type { Outcome, OutcomeCategory } from '../types.js';

const CATEGORIES: OutcomeCategory[] = ['fail', 'pass', 'missing'];

export function classify(generated: string, stored?: string): Outcome {
  if (stored === undefined) {
    return { type: 'missing', generated };
  }
  if (stored === generated) {
    return { type: 'correct' };
  }
  return { type: 'mismatch', generated, stored };
}

export function categoryOf(outcome: Outcome): OutcomeCategory {
  switch (outcome.type) {
    case 'correct':
      return 'pass';
    case 'missing':
      return 'missing';
    case 'mismatch':
      return 'fail';
    default:
      return assertNever(outcome);
  }
}

export function matchesCategory(
  outcome: Outcome,
  only?: OutcomeCategory,
): boolean {
  return only === undefined || categoryOf(outcome) === only;
}

export function parseOutcomeCategory(value: string): OutcomeCategory {
  const found = CATEGORIES.find((category) => category === value);
  if (!found) {
    throw new Error(
      `Invalid outcome category: "${value}". Must be one of ${CATEGORIES.join(', ')}`,
    );
  }
  return found;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected outcome: ${JSON.stringify(value)}`);
}
