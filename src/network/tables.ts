import { readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { SchemaError } from '../errors';
import type { EdgeRow, NetworkTables, NodeRow } from '../types';

export const NODE_COLUMNS = ['Nodes', 'Type', 'Class', 'compartmentRef'] as const;
export const EDGE_COLUMNS = ['source', 'target', 'Class', 'Confidence', 'Papers', 'Notes'] as const;

type NodeColumn = typeof NODE_COLUMNS[number];
type EdgeColumn = typeof EDGE_COLUMNS[number];

// Alternative header spellings seen in the wild, mapped to the canonical column
const HEADER_ALIASES: Record<string, string> = {
  'Notes short explanation of edge': 'Notes',
};

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

function readRecords(text: string): string[][] {
  const records: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  if (!isStringMatrix(records)) {
    throw new Error('CSV parser returned an unexpected shape');
  }
  return records;
}

function canonicalHeader(raw: string): string {
  const trimmed = raw.trim();
  return HEADER_ALIASES[trimmed] ?? trimmed;
}

type CellReader<C extends string> = (record: string[], column: C) => string;

/**
 * Resolve each required column to its position in the header row.
 * Throws a SchemaError listing every missing column at once.
 */
function resolveColumns<C extends string>(
  table: 'nodes' | 'edges',
  header: string[],
  required: readonly C[]
): CellReader<C> {
  const positions = new Map<string, number>();
  header.forEach((raw, i) => {
    const name = canonicalHeader(raw);
    if (!positions.has(name)) positions.set(name, i);
  });

  const missing = required.filter(column => !positions.has(column));
  if (missing.length > 0) {
    throw new SchemaError(table, missing.join(', '), missing, 'is missing required columns');
  }

  return (record, column) => {
    const index = positions.get(column);
    return index === undefined ? '' : record[index] ?? '';
  };
}

export function parseNodeTable(text: string): NodeRow[] {
  const [header = [], ...records] = readRecords(text);
  const cell = resolveColumns<NodeColumn>('nodes', header, NODE_COLUMNS);

  return records.map(record => ({
    Nodes: cell(record, 'Nodes'),
    Type: cell(record, 'Type'),
    Class: cell(record, 'Class'),
    compartmentRef: cell(record, 'compartmentRef'),
  }));
}

export function parseEdgeTable(text: string): EdgeRow[] {
  const [header = [], ...records] = readRecords(text);
  const cell = resolveColumns<EdgeColumn>('edges', header, EDGE_COLUMNS);

  return records.map(record => ({
    source: cell(record, 'source'),
    target: cell(record, 'target'),
    Class: cell(record, 'Class'),
    Confidence: cell(record, 'Confidence'),
    Papers: cell(record, 'Papers'),
    Notes: cell(record, 'Notes'),
  }));
}

/**
 * Read nodes.csv and edges.csv. Only column presence is checked here;
 * row order is kept as written.
 */
export function loadTables(nodesPath: string, edgesPath: string): NetworkTables {
  const nodes = parseNodeTable(readFileSync(nodesPath, 'utf-8'));
  const edges = parseEdgeTable(readFileSync(edgesPath, 'utf-8'));
  console.log(`📥 Read ${nodes.length} node rows from ${nodesPath}`);
  console.log(`📥 Read ${edges.length} edge rows from ${edgesPath}`);
  return { nodes, edges };
}
