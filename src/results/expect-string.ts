import * as path from 'path';

/**
 * Format the output of a test into an expect string:
 *
 *   ---CODE---
 *   <exit code>
 *   ---STDOUT---
 *   <contents of stdout>---STDERR---
 *   <contents of stderr>
 *
 * Marker text inside stdout/stderr is not escaped, so the result is only
 * ever written and compared, never parsed back.
 */
export function toExpectString(
  status: number,
  stdout: string,
  stderr: string,
): string {
  return (
    '---CODE---\n' +
    `${status}\n` +
    '---STDOUT---\n' +
    stdout +
    '---STDERR---\n' +
    stderr
  );
}

/** Path of the expect file stored next to a test. */
export function expectFile(testPath: string): string {
  const { dir, name } = path.parse(testPath);
  return path.format({ dir, name, ext: '.expect' });
}
