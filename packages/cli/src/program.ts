/**
 * @module program
 * Commander program for the stepflow CLI.
 */

import { Command } from 'commander';
import { registerRun } from './commands/run.js';
import { registerValidate } from './commands/validate.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stepflow')
    .description('Run YAML-defined API test cases')
    .version('0.1.0')
    .option('--verbose', 'print debug and info log records');

  registerRun(program);
  registerValidate(program);

  return program;
}
