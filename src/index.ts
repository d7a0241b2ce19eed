#!/usr/bin/env node

import { InvalidArgumentError, program } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { runReport } from './runner/report-runner.js';
import { parseOutcomeCategory } from './results/outcome.js';
import { exitCodeFor } from './utils/exit-code.js';
import type { OutcomeCategory } from './types.js';

function parseOnly(value: string): OutcomeCategory {
  try {
    return parseOutcomeCategory(value);
  } catch (error) {
    throw new InvalidArgumentError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

program
  .name('expect-report')
  .description(
    'Classify captured test output against expect files and report the results',
  )
  .version('1.0.0')
  .argument('<captures>', 'Path to the JSON file with captured test output')
  .option(
    '--only <category>',
    'Only show tests in this category: fail, pass or missing',
    parseOnly,
  )
  .option('-d, --diff', 'Show diffs for failing tests and output of new ones')
  .option('-s, --save', 'Write generated output to the expect files')
  .option('-r, --root <dir>', 'Directory test paths are relative to')
  .option('-o, --output <file>', 'Output JSON summary to file')
  .option('--no-color', 'Disable colored output')
  .action(
    async (
      captures: string,
      options: {
        only?: OutcomeCategory;
        diff?: boolean;
        save?: boolean;
        root?: string;
        output?: string;
        color: boolean;
      },
    ) => {
      try {
        const capturesPath = path.resolve(captures);
        if (!fs.existsSync(capturesPath)) {
          console.error(`Error: Captures file does not exist: ${capturesPath}`);
          process.exit(1);
        }

        const summary = await runReport(capturesPath, {
          only: options.only,
          diff: options.diff,
          save: options.save,
          root: options.root ? path.resolve(options.root) : undefined,
          color: options.color,
        });

        if (options.output) {
          const outputPath = path.resolve(options.output);
          fs.writeFileSync(outputPath, JSON.stringify(summary, null, 2));
          console.log(`\nSummary written to: ${outputPath}`);
        }

        process.exit(exitCodeFor(summary, options.save ?? false));
      } catch (error) {
        console.error(
          'Error:',
          error instanceof Error ? error.message : error,
        );
        process.exit(1);
      }
    },
  );

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
