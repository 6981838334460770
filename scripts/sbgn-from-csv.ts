#!/usr/bin/env npx tsx
/**
 * Render nodes.csv + edges.csv as an SBGN-ML Process Description map.
 */

import { runCommand, runSbgnFromCsv } from '../src/cli';

process.exitCode = runCommand('sbgn-from-csv', process.argv.slice(2), runSbgnFromCsv);
