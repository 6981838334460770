#!/usr/bin/env node
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { SchemaError } from '../src/errors';
import {
  LOGICAL_AND,
  normalizeCell,
  normalizeEdgeRows,
  normalizeNodeRows,
  normalizeTables,
} from '../src/network/normalize';
import { loadTables, parseEdgeTable, parseNodeTable } from '../src/network/tables';
import type { EdgeRow } from '../src/types';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, 'fixtures');

function expectError<E extends Error>(fn: () => unknown, ctor: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof ctor) return err;
    throw new Error(`Expected ${ctor.name}, got ${String(err)}`);
  }
  throw new Error(`Expected ${ctor.name} to be thrown`);
}

function assertEqual(actual: unknown, expected: unknown, message: string) {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(`${message}\n  expected: ${e}\n  actual:   ${a}`);
  }
}

// Column presence
{
  const err = expectError(() => parseNodeTable('Nodes,Type,Class\nA,process,biological_activity\n'), SchemaError);
  assertEqual(err.table, 'nodes', 'missing node column should be reported against nodes.csv');
  assertEqual(err.values, ['compartmentRef'], 'missing node column should be named');

  const edgeErr = expectError(() => parseEdgeTable('source,target,Class\nA,B,logic_arc\n'), SchemaError);
  assertEqual(edgeErr.values, ['Confidence', 'Papers', 'Notes'], 'every missing edge column should be listed');

  const emptyErr = expectError(() => parseNodeTable(''), SchemaError);
  assertEqual(emptyErr.values, ['Nodes', 'Type', 'Class', 'compartmentRef'], 'an empty table lacks every column');
}

// Header alias and extra columns
{
  const rows = parseEdgeTable(
    'source,target,Class,Confidence,Papers,Notes short explanation of edge,Extra\nA,B,logic_arc,high,P1,why,ignored\n'
  );
  assertEqual(
    rows,
    [{ source: 'A', target: 'B', Class: 'logic_arc', Confidence: 'high', Papers: 'P1', Notes: 'why' }],
    'descriptive Notes header should map onto Notes'
  );
}

// Cell values are not validated and row order is kept
{
  const rows = parseNodeTable('Type,Nodes,compartmentRef,Class\nbogus,Z,c1,x\nprocess,A,c2,y\n');
  assertEqual(rows.map(r => r.Nodes), ['Z', 'A'], 'rows should stay in input order');
  assertEqual(rows[0].Type, 'bogus', 'loader should not check enumerations');
}

// Fixture files
{
  const tables = loadTables(join(FIXTURES, 'nodes.csv'), join(FIXTURES, 'edges.csv'));
  assertEqual(tables.nodes.length, 5, 'fixture node rows');
  assertEqual(tables.edges.length, 6, 'fixture edge rows (duplicates still present)');
  assertEqual(tables.nodes[1].Nodes, 'FT protein ', 'loader keeps raw whitespace');
  assertEqual(tables.edges[0].Papers, 'PMID:123, PMID:456', 'quoted cell should keep its comma');

  const normalized = normalizeTables(tables);
  assertEqual(normalized.nodes[1].Nodes, 'FT protein', 'normalizer trims labels');
  assertEqual(normalized.nodes[1].compartmentRef, 'nucleus', 'normalizer trims every node cell');
  assertEqual(normalized.edges.length, 5, 'duplicate edge row should collapse');
  assertEqual(normalized.edges[2].Notes, `GI ${LOGICAL_AND} FKF1 stabilise CO`, 'mis-decoded AND glyph should be repaired');
  assertEqual(normalized.edges[4].Notes, 'needs blue light', 'normalizer trims every edge cell');
}

// Cell normalization
{
  assertEqual(normalizeCell('  A  and  B \t'), 'A  and  B', 'internal whitespace is preserved');
  assertEqual(normalizeCell('A â\u0088§ B'), `A ${LOGICAL_AND} B`, 'Latin-1 variant of the AND glyph is repaired');
  assertEqual(normalizeCell(`A ${LOGICAL_AND} B`), `A ${LOGICAL_AND} B`, 'a correct AND glyph is untouched');
}

// Deduplication
{
  const row = (notes: string): EdgeRow => ({
    source: 'A',
    target: 'B',
    Class: 'positive_influence',
    Confidence: 'high',
    Papers: 'P1',
    Notes: notes,
  });

  const input = [row('x'), row(' x '), row('y'), row('x')];
  const once = normalizeEdgeRows(input);
  assertEqual(once.map(r => r.Notes), ['x', 'y'], 'rows equal after trimming collapse, first occurrence wins');

  const twice = normalizeEdgeRows(once);
  assertEqual(twice, once, 'edge normalization should be idempotent');

  const nodes = normalizeNodeRows([{ Nodes: ' A ', Type: ' process', Class: 'x ', compartmentRef: ' c ' }]);
  assertEqual(normalizeNodeRows(nodes), nodes, 'node normalization should be idempotent');
}

console.log('network tables test passed.');
