#!/usr/bin/env node
/**
 * CLI entry point for manual-metric.
 */

import { createProgram } from '../cli.js';

await createProgram().parseAsync();
