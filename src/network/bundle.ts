import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify } from 'csv-stringify/sync';
import { DEFAULT_CONFIG, type BundleOptions } from '../config';
import type { BundleMetadata, IdMap, RegulatoryGraph } from '../types';
import { EDGE_COLUMNS, NODE_COLUMNS } from './tables';

export type BundlePaths = {
  nodesPath: string;
  edgesPath: string;
  metaPath: string;
};

export function buildBundleMetadata(
  graph: RegulatoryGraph,
  idMap: IdMap,
  sampleSize = DEFAULT_CONFIG.bundle.sampleSize
): BundleMetadata {
  return {
    n_nodes: graph.nodes.length,
    n_edges: graph.edges.length,
    id_map_sample: Object.fromEntries([...idMap].slice(0, sampleSize)),
  };
}

export function serializeNodeTable(graph: RegulatoryGraph): string {
  const records = graph.nodes.map(n => ({
    Nodes: n.label,
    Type: n.type,
    Class: n.class,
    compartmentRef: n.compartment,
  }));
  return stringify(records, { header: true, columns: [...NODE_COLUMNS] });
}

export function serializeEdgeTable(graph: RegulatoryGraph): string {
  const records = graph.edges.map(e => ({
    source: e.source,
    target: e.target,
    Class: e.class,
    Confidence: e.confidence,
    Papers: e.papers.join(', '),
    Notes: e.notes,
  }));
  return stringify(records, { header: true, columns: [...EDGE_COLUMNS] });
}

/**
 * Write the cleaned tables and the lineage record into outDir.
 * Filesystem errors are not caught here.
 */
export function writeBundle(
  graph: RegulatoryGraph,
  idMap: IdMap,
  outDir: string,
  options: Partial<BundleOptions> = {}
): BundlePaths {
  const { nodesFile, edgesFile, metaFile, sampleSize } = { ...DEFAULT_CONFIG.bundle, ...options };
  const paths: BundlePaths = {
    nodesPath: join(outDir, nodesFile),
    edgesPath: join(outDir, edgesFile),
    metaPath: join(outDir, metaFile),
  };

  mkdirSync(outDir, { recursive: true });
  writeFileSync(paths.nodesPath, serializeNodeTable(graph));
  writeFileSync(paths.edgesPath, serializeEdgeTable(graph));
  writeFileSync(paths.metaPath, JSON.stringify(buildBundleMetadata(graph, idMap, sampleSize), null, 2));

  return paths;
}
