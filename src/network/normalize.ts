import type { EdgeRow, NetworkTables, NodeRow } from '../types';

export const LOGICAL_AND = '∧';

// "∧" (UTF-8 E2 88 A7) decoded as Windows-1252, and as Latin-1
const MOJIBAKE_AND = ['âˆ§', 'â\u0088§'];

export function repairLogicalAnd(value: string): string {
  let out = value;
  for (const broken of MOJIBAKE_AND) {
    out = out.split(broken).join(LOGICAL_AND);
  }
  return out;
}

export function normalizeCell(value: string): string {
  return repairLogicalAnd(value).trim();
}

export function normalizeNodeRows(rows: readonly NodeRow[]): NodeRow[] {
  return rows.map(row => ({
    Nodes: normalizeCell(row.Nodes),
    Type: normalizeCell(row.Type),
    Class: normalizeCell(row.Class),
    compartmentRef: normalizeCell(row.compartmentRef),
  }));
}

function edgeKey(row: EdgeRow): string {
  return JSON.stringify([row.source, row.target, row.Class, row.Confidence, row.Papers, row.Notes]);
}

/**
 * Trim every cell and collapse rows that are identical across all fields.
 * The first occurrence keeps its position.
 */
export function normalizeEdgeRows(rows: readonly EdgeRow[]): EdgeRow[] {
  const seen = new Set<string>();
  const out: EdgeRow[] = [];

  for (const row of rows) {
    const cleaned: EdgeRow = {
      source: normalizeCell(row.source),
      target: normalizeCell(row.target),
      Class: normalizeCell(row.Class),
      Confidence: normalizeCell(row.Confidence),
      Papers: normalizeCell(row.Papers),
      Notes: normalizeCell(row.Notes),
    };
    const key = edgeKey(cleaned);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(cleaned);
  }

  return out;
}

export function normalizeTables(tables: NetworkTables): NetworkTables {
  const nodes = normalizeNodeRows(tables.nodes);
  const edges = normalizeEdgeRows(tables.edges);

  const dropped = tables.edges.length - edges.length;
  if (dropped > 0) {
    console.log(`🧹 Dropped ${dropped} duplicate edge row${dropped === 1 ? '' : 's'}`);
  }

  return { nodes, edges };
}
