/**
 * @module commands/run
 * `stepflow run <file>` — Execute one test case file.
 *
 * Steps:
 * 1. Load and validate the YAML case
 * 2. Attach the reporter to an event bus
 * 3. Execute with the bundled HTTP and SQLite leaves, once per parameter
 *    set when the case is data-driven (`ddts` or `csv_datasource`)
 * 4. Print the report; exit code 1 unless every run passed
 */

import { Command, InvalidArgumentError } from 'commander';

// ── ANSI colours ──────────────────────────────────────────────────────
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';

const REPORTERS = ['console', 'json'];

interface RunOptions {
  profile?: string;
  reporter: string;
  var: Record<string, string>;
}

/**
 * Commander collector for repeated `--var key=value` options.
 */
export function collectVar(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`expected key=value, got "${value}"`);
  }
  return { ...previous, [value.slice(0, eq).trim()]: value.slice(eq + 1) };
}

export function registerRun(program: Command): void {
  program
    .command('run')
    .description('Run a test case file')
    .argument('<file>', 'YAML test case file')
    .option('-p, --profile <name>', 'profile to activate (overrides active_profile)')
    .option('--reporter <type>', 'report format (console|json)', 'console')
    .option('--var <key=value>', 'override a variable; repeatable', collectVar, {})
    .action(async (file: string, opts: RunOptions) => {
      if (!REPORTERS.includes(opts.reporter)) {
        console.error(`${RED}Unknown reporter "${opts.reporter}" (expected ${REPORTERS.join('|')})${RESET}`);
        process.exitCode = 1;
        return;
      }

      // Lazy import keeps --help/--version fast
      const {
        loadTestCase,
        createDefaultLeafRegistry,
        createEventBus,
        createReporter,
        DataDrivenExecutor,
        HttpLeaf,
        isDataDriven,
        parseLiteral,
        SqliteLeaf,
        TestCaseExecutor,
      } = await import('stepflow-core');

      let testCase;
      try {
        testCase = await loadTestCase(file);
      } catch (err) {
        console.error(`${RED}Failed to load test case: ${err instanceof Error ? err.message : String(err)}${RESET}`);
        process.exitCode = 1;
        return;
      }

      const verbose = program.opts<{ verbose?: boolean }>().verbose ?? false;
      const bus = createEventBus();
      const reporter = createReporter(opts.reporter, { verbose });
      const detach = reporter.attach(bus);
      const leaves = createDefaultLeafRegistry();

      const overrides: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(opts.var)) {
        overrides[key] = parseLiteral(value);
      }

      try {
        let passed: boolean;
        if (isDataDriven(testCase)) {
          const dataDriven = await new DataDrivenExecutor({ leaves, bus, profile: opts.profile, overrides }).execute(testCase);
          passed = dataDriven.failedRuns === 0;
          if (opts.reporter === 'console') {
            const colour = passed ? GREEN : RED;
            console.log(
              `\n${colour}Data-driven "${dataDriven.datasetName}": ${dataDriven.passedRuns}/${dataDriven.totalRuns} runs passed (${dataDriven.passRate}%)${RESET}`,
            );
          }
        } else {
          const result = await new TestCaseExecutor({ leaves, bus, profile: opts.profile, overrides }).execute(testCase);
          passed = result.status === 'passed';
        }
        if (opts.reporter === 'json') {
          console.log(JSON.stringify(reporter.generate(), null, 2));
        }
        if (!passed) {
          process.exitCode = 1;
        }
      } catch (err) {
        console.error(`${RED}Failed to run test case: ${err instanceof Error ? err.message : String(err)}${RESET}`);
        process.exitCode = 1;
      } finally {
        detach();
        const database = leaves.get('database');
        if (database instanceof SqliteLeaf) {
          database.close();
        }
        const http = leaves.get('request');
        if (http instanceof HttpLeaf) {
          await http.close();
        }
      }
    });
}
