import type { IdentifierOptions } from '../config';
import type { IdMap, NetworkTables, RegulatoryGraph } from '../types';
import { assignIdentifiers, findIdCollisions } from './identifiers';
import { normalizeTables } from './normalize';
import { loadTables } from './tables';
import { validateGraph } from './validate';

export function buildGraphFromTables(tables: NetworkTables): RegulatoryGraph {
  const { graph, advisories } = validateGraph(normalizeTables(tables));

  console.log(`✅ Validated ${graph.nodes.length} nodes and ${graph.edges.length} edges (trait: "${graph.traitNode.label}")`);
  for (const advisory of advisories) {
    console.warn(`⚠️  ${advisory.message}`);
  }

  return graph;
}

/**
 * Load → normalize → validate. Throws before anything is written.
 */
export function buildGraph(nodesPath: string, edgesPath: string): RegulatoryGraph {
  return buildGraphFromTables(loadTables(nodesPath, edgesPath));
}

export function identifyNodes(graph: RegulatoryGraph, options: Partial<IdentifierOptions> = {}): IdMap {
  const idMap = assignIdentifiers(graph.nodes, options);
  for (const [id, labels] of findIdCollisions(idMap)) {
    console.warn(`⚠️  ${labels.length} labels share id ${id}: ${labels.map(l => JSON.stringify(l)).join(', ')}`);
  }
  return idMap;
}
