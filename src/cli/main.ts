#!/usr/bin/env node
/**
 * region-query CLI
 *
 * Usage:
 *   region-query query --query <file.json> [--output <file.txt>]
 *   region-query load --data-directory <dir>
 *   region-query init-schema
 */

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
