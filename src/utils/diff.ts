/**
 * Line-based unified diff between the stored expect file and freshly
 * generated output.
 */

export type DiffEngine = (actual: string, expected: string) => string;

type LineChange =
  | { type: 'equal'; line: string }
  | { type: 'delete'; line: string }
  | { type: 'insert'; line: string };

interface Hunk {
  start: number;
  end: number;
}

const CONTEXT_LINES = 2;

/**
 * Render the changes needed to turn `actual` (the stored expect file) into
 * `expected` (the generated output). Returns an empty string when both are
 * equal.
 */
export const genDiff: DiffEngine = (actual, expected) => {
  const changes = computeLineChanges(actual.split('\n'), expected.split('\n'));
  const hunks = groupChanges(changes);

  if (hunks.length === 0) {
    return '';
  }

  const out: string[] = ['--- expect file', '+++ generated'];

  for (const hunk of hunks) {
    const from = Math.max(0, hunk.start - CONTEXT_LINES);
    const to = Math.min(changes.length - 1, hunk.end + CONTEXT_LINES);

    const { oldStart, oldCount, newStart, newCount } = hunkRanges(
      changes,
      from,
      to,
    );
    out.push(`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`);

    for (let i = from; i <= to; i++) {
      const change = changes[i];
      switch (change.type) {
        case 'equal':
          out.push(` ${change.line}`);
          break;
        case 'delete':
          out.push(`-${change.line}`);
          break;
        case 'insert':
          out.push(`+${change.line}`);
          break;
      }
    }
  }

  return out.join('\n');
};

// Largest LCS table (in cells) built for the lines between the common
// prefix and suffix. Beyond it the changed block is shown as a whole.
const MAX_LCS_CELLS = 4_000_000;

function computeLineChanges(before: string[], after: string[]): LineChange[] {
  let prefix = 0;
  while (
    prefix < before.length &&
    prefix < after.length &&
    before[prefix] === after[prefix]
  ) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < before.length - prefix &&
    suffix < after.length - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++;
  }

  const changes: LineChange[] = before
    .slice(0, prefix)
    .map((line): LineChange => ({ type: 'equal', line }));

  const oldMiddle = before.slice(prefix, before.length - suffix);
  const newMiddle = after.slice(prefix, after.length - suffix);

  if (oldMiddle.length * newMiddle.length > MAX_LCS_CELLS) {
    for (const line of oldMiddle) changes.push({ type: 'delete', line });
    for (const line of newMiddle) changes.push({ type: 'insert', line });
  } else {
    for (const change of lcsChanges(oldMiddle, newMiddle)) changes.push(change);
  }

  for (const line of before.slice(before.length - suffix)) {
    changes.push({ type: 'equal', line });
  }

  return changes;
}

// LCS table over line suffixes, then a forward walk preferring deletions.
function lcsChanges(before: string[], after: string[]): LineChange[] {
  const rows = before.length;
  const cols = after.length;
  const lcs: Uint32Array[] = Array.from(
    { length: rows + 1 },
    () => new Uint32Array(cols + 1),
  );

  for (let i = rows - 1; i >= 0; i--) {
    for (let j = cols - 1; j >= 0; j--) {
      lcs[i][j] =
        before[i] === after[j]
          ? lcs[i + 1][j + 1] + 1
          : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const changes: LineChange[] = [];
  let i = 0;
  let j = 0;
  while (i < rows && j < cols) {
    if (before[i] === after[j]) {
      changes.push({ type: 'equal', line: before[i] });
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      changes.push({ type: 'delete', line: before[i] });
      i++;
    } else {
      changes.push({ type: 'insert', line: after[j] });
      j++;
    }
  }
  for (; i < rows; i++) changes.push({ type: 'delete', line: before[i] });
  for (; j < cols; j++) changes.push({ type: 'insert', line: after[j] });

  return changes;
}

function groupChanges(changes: LineChange[]): Hunk[] {
  const hunks: Hunk[] = [];

  changes.forEach((change, index) => {
    if (change.type === 'equal') return;

    const last = hunks[hunks.length - 1];
    if (last && index - last.end <= CONTEXT_LINES * 2 + 1) {
      last.end = index;
    } else {
      hunks.push({ start: index, end: index });
    }
  });

  return hunks;
}

function hunkRanges(
  changes: LineChange[],
  from: number,
  to: number,
): { oldStart: number; oldCount: number; newStart: number; newCount: number } {
  let oldLine = 1;
  let newLine = 1;
  for (let i = 0; i < from; i++) {
    if (changes[i].type !== 'insert') oldLine++;
    if (changes[i].type !== 'delete') newLine++;
  }

  let oldCount = 0;
  let newCount = 0;
  for (let i = from; i <= to; i++) {
    if (changes[i].type !== 'insert') oldCount++;
    if (changes[i].type !== 'delete') newCount++;
  }

  return { oldStart: oldLine, oldCount, newStart: newLine, newCount };
}
