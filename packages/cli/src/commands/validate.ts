/**
 * @module commands/validate
 * `stepflow validate <file>` — Load and validate a test case without running it.
 */

import { Command } from 'commander';

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';

export function registerValidate(program: Command): void {
  program
    .command('validate')
    .description('Validate a test case file')
    .argument('<file>', 'YAML test case file')
    .action(async (file: string) => {
      const { loadTestCase } = await import('stepflow-core');
      try {
        const testCase = await loadTestCase(file);
        console.log(`${GREEN}✓${RESET} ${testCase.name}: ${testCase.steps.length} steps`);
      } catch (err) {
        console.error(`${RED}✗ ${err instanceof Error ? err.message : String(err)}${RESET}`);
        process.exitCode = 1;
      }
    });
}
