#!/usr/bin/env node
/**
 * @module stepflow-cli
 * CLI entry point for stepflow.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
