#!/usr/bin/env node
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parseCliArgs, runCommand, runSbgnFromCsv, runValidateAndPack } from '../src/cli';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, 'fixtures');

function assertEqual(actual: unknown, expected: unknown, message: string) {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(`${message}\n  expected: ${e}\n  actual:   ${a}`);
  }
}

const nodesCsv = join(FIXTURES, 'nodes.csv');
const edgesCsv = join(FIXTURES, 'edges.csv');
const danglingCsv = join(FIXTURES, 'edges-dangling.csv');

// Flag parsing
{
  assertEqual(
    parseCliArgs(['--nodes', 'n.csv', '--edges', 'e.csv', '--out', 'out']),
    { nodes: 'n.csv', edges: 'e.csv', out: 'out' },
    'all required flags'
  );
  assertEqual(
    parseCliArgs(['--out', 'o', '--config', 'c.yaml', '--edges', 'e.csv', '--nodes', 'n.csv']),
    { nodes: 'n.csv', edges: 'e.csv', out: 'o', config: 'c.yaml' },
    'flags in any order, optional config'
  );
  assertEqual(parseCliArgs(['--nodes', 'n.csv', '--edges', 'e.csv']), null, 'missing --out');
  assertEqual(parseCliArgs(['--nodes', '--edges', 'e.csv', '--out', 'o']), null, 'flag followed by another flag has no value');
  assertEqual(parseCliArgs(['--nodes', 'n.csv', '--edges', 'e.csv', '--out']), null, 'trailing flag has no value');
}

const workDir = mkdtempSync(join(tmpdir(), 'network-cli-'));

try {
  // SBGN command
  {
    const out = join(workDir, 'maps', 'network.sbgn');
    const status = runCommand('sbgn-from-csv', ['--nodes', nodesCsv, '--edges', edgesCsv, '--out', out], runSbgnFromCsv);
    assertEqual(status, 0, 'successful render exits 0');
    const xml = readFileSync(out, 'utf-8');
    assertEqual(xml.split('\n').filter(line => line.includes('<glyph ')).length, 5, 'one glyph per node');
    assertEqual(xml.split('\n').filter(line => line.includes('<arc ')).length, 5, 'one arc per edge');
  }

  // No document for a network with dangling references
  {
    const out = join(workDir, 'dangling', 'network.sbgn');
    const status = runCommand('sbgn-from-csv', ['--nodes', nodesCsv, '--edges', danglingCsv, '--out', out], runSbgnFromCsv);
    assertEqual(status, 1, 'validation failure exits 1');
    if (existsSync(out) || existsSync(dirname(out))) {
      throw new Error('No SBGN document should be written when validation fails.');
    }
  }

  // Bundle command
  {
    const out = join(workDir, 'bundle');
    const status = runCommand('validate-and-pack', ['--nodes', nodesCsv, '--edges', edgesCsv, '--out', out], runValidateAndPack);
    assertEqual(status, 0, 'successful pack exits 0');
    assertEqual(readdirSync(out).sort(), ['bundle.meta.json', 'edges.cleaned.csv', 'nodes.cleaned.csv'], 'bundle files');

    const failedOut = join(workDir, 'bundle-dangling');
    const failed = runCommand('validate-and-pack', ['--nodes', nodesCsv, '--edges', danglingCsv, '--out', failedOut], runValidateAndPack);
    assertEqual(failed, 1, 'failed pack exits 1');
    if (existsSync(failedOut)) {
      throw new Error('No bundle should be written when validation fails.');
    }
  }

  // Usage errors and unreadable inputs
  {
    let ran = false;
    const status = runCommand('validate-and-pack', ['--nodes', nodesCsv], () => {
      ran = true;
    });
    assertEqual([status, ran], [1, false], 'missing flags exit 1 without running');

    const missingInput = runCommand(
      'sbgn-from-csv',
      ['--nodes', join(workDir, 'absent.csv'), '--edges', edgesCsv, '--out', join(workDir, 'x.sbgn')],
      runSbgnFromCsv
    );
    assertEqual(missingInput, 1, 'unreadable input exits 1');
  }
} finally {
  rmSync(workDir, { recursive: true, force: true });
}

console.log('network cli test passed.');
