/**
 * @module reporter
 * Test result reporters.
 *
 * Provides two built-in {@link Reporter} implementations:
 * - {@link ConsoleReporter} — streams coloured output as steps complete
 * - {@link JSONReporter}    — collects results and generates a JSON report
 *
 * Both subscribe to an {@link EventBus}; neither influences execution.
 */

import type { EventBus } from './event-bus.js';
import { subResultsOf } from './step-executor.js';
import type { EngineEvent, LogEvent, StepResult, TestCaseResult, TestCaseStatus } from './types.js';

// =====================================================================
// ANSI helpers (no external dependency)
// =====================================================================

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GRAY = '\x1b[90m';

// =====================================================================
// Report model
// =====================================================================

export interface StepReport {
  name: string;
  type: StepResult['type'];
  status: StepResult['status'];
  /** Milliseconds */
  duration: number;
  retryCount: number;
  skipReason?: string;
  error?: { category: string; message: string; suggestion: string };
  steps?: StepReport[];
}

export interface CaseReport {
  name: string;
  status: TestCaseStatus;
  /** Seconds */
  duration: number;
  totalSteps: number;
  passedSteps: number;
  failedSteps: number;
  skippedSteps: number;
  steps: StepReport[];
}

export interface TestReport {
  timestamp: number;
  /** Milliseconds */
  duration: number;
  totals: Record<TestCaseStatus, number> & { cases: number; steps: number };
  cases: CaseReport[];
}

export interface Reporter {
  readonly id: string;
  /**
   * Start listening on a bus.
   *
   * @returns A function that detaches the reporter
   */
  attach(bus: EventBus): () => void;
  generate(): TestReport;
}

// =====================================================================
// Console Reporter
// =====================================================================

export interface ConsoleReporterOptions {
  /** Line sink, default `console.log` */
  write?: (line: string) => void;
  /** Also print `debug`/`info` log records */
  verbose?: boolean;
  /** Strip ANSI colours */
  plain?: boolean;
}

/**
 * Reporter that prints one line per completed step and a summary per case.
 */
export class ConsoleReporter implements Reporter {
  readonly id = 'console';
  private readonly results: TestCaseResult[] = [];
  private readonly write: (line: string) => void;
  private readonly verbose: boolean;
  private readonly plain: boolean;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.verbose = options.verbose ?? false;
    this.plain = options.plain ?? false;
  }

  attach(bus: EventBus): () => void {
    const offEvents = bus.subscribe('events', (event) => this.onEvent(event));
    const offLog = bus.subscribe('log', (record) => this.onLog(record));
    return () => {
      offEvents();
      offLog();
    };
  }

  /**
   * Handle a lifecycle event. Prints immediately.
   */
  onEvent(event: EngineEvent): void {
    switch (event.type) {
      case 'test_start':
        this.write(`\n${this.c(BOLD)}Test: ${event.testName}${this.c(RESET)} ${this.c(GRAY)}(${event.totalSteps} steps)${this.c(RESET)}`);
        break;
      case 'step_start':
        // Result is printed on completion
        break;
      case 'step_complete':
        this.printStep(event.result, '  ');
        break;
      case 'test_complete': {
        const r = event.result;
        this.results.push(r);
        if (r.status === 'skipped') {
          this.write(`  ${this.c(YELLOW)}○ skipped${this.c(RESET)}`);
          break;
        }
        this.write(
          `\n  ${this.c(GREEN)}${r.passedSteps} passed${this.c(RESET)}` +
            (r.failedSteps > 0 ? `, ${this.c(RED)}${r.failedSteps} failed${this.c(RESET)}` : '') +
            (r.skippedSteps > 0 ? `, ${this.c(YELLOW)}${r.skippedSteps} skipped${this.c(RESET)}` : '') +
            ` ${this.c(GRAY)}(${r.duration.toFixed(2)}s)${this.c(RESET)}`,
        );
        if (r.status === 'error' && r.errorInfo) {
          this.write(`  ${this.c(RED)}${r.errorInfo.message}${this.c(RESET)}`);
        }
        break;
      }
    }
  }

  onLog(record: LogEvent): void {
    if (!this.verbose && (record.level === 'debug' || record.level === 'info')) return;
    const colour = record.level === 'error' ? RED : record.level === 'warn' ? YELLOW : GRAY;
    this.write(`  ${this.c(colour)}[${record.level}]${this.c(RESET)} ${record.message}`);
  }

  generate(): TestReport {
    return buildReport(this.results);
  }

  private printStep(result: StepResult, indent: string): void {
    const duration = `${this.c(GRAY)}(${result.duration ?? 0}ms)${this.c(RESET)}`;
    const retries = result.retryCount > 0 ? ` ${this.c(GRAY)}[${result.retryCount} retries]${this.c(RESET)}` : '';
    switch (result.status) {
      case 'success':
        this.write(`${indent}${this.c(GREEN)}✓${this.c(RESET)} ${result.name} ${duration}${retries}`);
        break;
      case 'skipped':
        this.write(`${indent}${this.c(YELLOW)}○${this.c(RESET)} ${result.name}${result.skipReason ? ` — ${result.skipReason}` : ''}`);
        break;
      default:
        this.write(`${indent}${this.c(RED)}✗${this.c(RESET)} ${result.name} ${duration}${retries}`);
        if (result.errorInfo) {
          this.write(`${indent}  ${this.c(RED)}${result.errorInfo.message}${this.c(RESET)}`);
          this.write(`${indent}  ${this.c(GRAY)}${result.errorInfo.suggestion}${this.c(RESET)}`);
        }
        break;
    }
  }

  private c(code: string): string {
    return this.plain ? '' : code;
  }
}

// =====================================================================
// JSON Reporter
// =====================================================================

/**
 * Reporter that collects results silently and produces a JSON-friendly
 * {@link TestReport} via `generate()`.
 */
export class JSONReporter implements Reporter {
  readonly id = 'json';
  private readonly results: TestCaseResult[] = [];

  attach(bus: EventBus): () => void {
    return bus.subscribe('events', (event) => this.onEvent(event));
  }

  onEvent(event: EngineEvent): void {
    if (event.type === 'test_complete') {
      this.results.push(event.result);
    }
  }

  generate(): TestReport {
    return buildReport(this.results);
  }
}

/**
 * Create a reporter by id.
 *
 * @throws {Error} For an unknown id
 */
export function createReporter(id: string, options: ConsoleReporterOptions = {}): Reporter {
  switch (id) {
    case 'console':
      return new ConsoleReporter(options);
    case 'json':
      return new JSONReporter();
    default:
      throw new Error(`Unknown reporter "${id}" (expected console or json)`);
  }
}

// =====================================================================
// Shared report builder
// =====================================================================

function toStepReport(result: StepResult): StepReport {
  const nested = subResultsOf(result.response);
  return {
    name: result.name,
    type: result.type,
    status: result.status,
    duration: result.duration ?? 0,
    retryCount: result.retryCount,
    ...(result.skipReason ? { skipReason: result.skipReason } : {}),
    ...(result.errorInfo
      ? {
          error: {
            category: result.errorInfo.category,
            message: result.errorInfo.message,
            suggestion: result.errorInfo.suggestion,
          },
        }
      : {}),
    ...(nested.length > 0 ? { steps: nested.map(toStepReport) } : {}),
  };
}

/**
 * Build a {@link TestReport} from finished test case results.
 */
export function buildReport(results: TestCaseResult[]): TestReport {
  const totals: TestReport['totals'] = { cases: results.length, steps: 0, passed: 0, failed: 0, skipped: 0, error: 0 };
  let first = Infinity;
  let last = 0;

  const cases = results.map((r): CaseReport => {
    totals[r.status]++;
    totals.steps += r.stepResults.length;
    first = Math.min(first, r.startTime);
    last = Math.max(last, r.endTime);
    return {
      name: r.name,
      status: r.status,
      duration: r.duration,
      totalSteps: r.totalSteps,
      passedSteps: r.passedSteps,
      failedSteps: r.failedSteps,
      skippedSteps: r.skippedSteps,
      steps: r.stepResults.map(toStepReport),
    };
  });

  return {
    timestamp: first === Infinity ? Date.now() : first,
    duration: last > first ? last - first : 0,
    totals,
    cases,
  };
}
