/**
 * @module data-driven
 * Data-driven execution: one run of a test case per parameter set.
 *
 * Parameter sets come from inline `ddts.parameters` or, when those are
 * absent, from the CSV file named by `config.csv_datasource` (header row =
 * variable names, values stay strings). Every run starts from a fresh
 * variable manager with its row in the global scope.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseCsvText } from 'csv-parse/sync';
import { z } from 'zod';
import { CaseLoadError } from './errors.js';
import { errorMessage, isRecord } from './helpers.js';
import { createBusLogger, silentLogger, type Logger } from './logger.js';
import { TestCaseExecutor, type TestCaseExecutorOptions } from './test-case-executor.js';
import type {
  DataDrivenResult,
  DataDrivenRun,
  DataDrivenSource,
  TestCase,
  Variables,
} from './types.js';

// =====================================================================
// CSV datasets
// =====================================================================

const CsvRowsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text into one record per data row.
 *
 * @throws {CaseLoadError} `CSV_PARSE_ERROR` for malformed input
 */
export function parseCsv(content: string, source = 'CSV data'): Record<string, string>[] {
  let records: unknown;
  try {
    records = parseCsvText(content, { columns: true, skip_empty_lines: true, trim: true });
  } catch (err) {
    throw new CaseLoadError('CSV_PARSE_ERROR', `CSV parse error in ${source}: ${errorMessage(err)}`);
  }
  return CsvRowsSchema.parse(records);
}

/**
 * Read and parse a CSV dataset file.
 *
 * @throws {CaseLoadError} `CSV_FILE_NOT_FOUND` or `CSV_PARSE_ERROR`
 */
export async function loadCsvDataset(filePath: string): Promise<Record<string, string>[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') {
      throw new CaseLoadError('CSV_FILE_NOT_FOUND', `CSV file not found: ${filePath}`);
    }
    throw err;
  }
  return parseCsv(content, filePath);
}

// =====================================================================
// Parameter sets
// =====================================================================

export interface ParameterSets {
  source: DataDrivenSource;
  datasetName: string;
  parameters: Variables[];
}

/** Whether a case declares inline parameters or a CSV datasource. */
export function isDataDriven(testCase: TestCase): boolean {
  return (testCase.ddts?.parameters.length ?? 0) > 0 || Boolean(testCase.config?.csvDatasource?.trim());
}

/**
 * Resolve the parameter sets of a case. Inline `ddts` wins over the CSV file.
 */
export async function getParameterSets(testCase: TestCase): Promise<ParameterSets> {
  const ddts = testCase.ddts;
  if (ddts && ddts.parameters.length > 0) {
    return { source: 'yaml_inline', datasetName: ddts.name ?? 'ddts', parameters: ddts.parameters };
  }
  const csv = testCase.config?.csvDatasource?.trim();
  if (csv) {
    return { source: 'csv_file', datasetName: path.parse(csv).name, parameters: await loadCsvDataset(csv) };
  }
  return { source: 'yaml_inline', datasetName: '', parameters: [] };
}

// =====================================================================
// Executor
// =====================================================================

export type DataDrivenExecutorOptions = Omit<TestCaseExecutorOptions, 'variables' | 'parameters'>;

/**
 * Runs a test case once per parameter set and aggregates the runs.
 */
export class DataDrivenExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: DataDrivenExecutorOptions) {
    this.logger = options.logger ?? (options.bus ? createBusLogger(options.bus, 'data-driven') : silentLogger);
  }

  /**
   * @throws {CaseLoadError} When the CSV dataset cannot be loaded
   */
  async execute(testCase: TestCase): Promise<DataDrivenResult> {
    const { source, datasetName, parameters } = await getParameterSets(testCase);
    const runs: DataDrivenRun[] = [];

    for (const [runIndex, row] of parameters.entries()) {
      this.logger.info(`Data-driven run ${runIndex + 1}/${parameters.length} of "${testCase.name}"`, { parameters: row });
      const result = await new TestCaseExecutor({ ...this.options, parameters: row }).execute(testCase);
      runs.push({ runIndex, parameters: row, status: result.status, duration: result.duration, result });
    }

    const passedRuns = runs.filter((run) => run.status === 'passed').length;
    return {
      enabled: runs.length > 0,
      source,
      datasetName,
      totalRuns: runs.length,
      passedRuns,
      failedRuns: runs.length - passedRuns,
      passRate: runs.length > 0 ? Math.round((passedRuns / runs.length) * 1000) / 10 : 0,
      runs,
    };
  }
}
