#!/usr/bin/env npx tsx
/**
 * Validate nodes.csv + edges.csv and write the cleaned bundle:
 * nodes.cleaned.csv, edges.cleaned.csv and bundle.meta.json.
 */

import { runCommand, runValidateAndPack } from '../src/cli';

process.exitCode = runCommand('validate-and-pack', process.argv.slice(2), runValidateAndPack);
