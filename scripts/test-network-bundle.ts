#!/usr/bin/env node
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from '../src/config';
import { ConfigError, DanglingReferenceError, NetworkError } from '../src/errors';
import { buildBundleMetadata, serializeEdgeTable, writeBundle } from '../src/network/bundle';
import { assignIdentifiers } from '../src/network/identifiers';
import { buildGraph, identifyNodes } from '../src/network/pipeline';
import { renderSbgn } from '../src/network/sbgn';
import { normalizeEdgeRows } from '../src/network/normalize';
import { parseEdgeTable, parseNodeTable } from '../src/network/tables';
import { validateGraph } from '../src/network/validate';
import type { NodeRow } from '../src/types';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, 'fixtures');

function assertEqual(actual: unknown, expected: unknown, message: string) {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(`${message}\n  expected: ${e}\n  actual:   ${a}`);
  }
}

const workDir = mkdtempSync(join(tmpdir(), 'network-bundle-'));

try {
  // Bundle from the fixture tables
  {
    const graph = buildGraph(join(FIXTURES, 'nodes.csv'), join(FIXTURES, 'edges.csv'));
    const idMap = identifyNodes(graph);
    const outDir = join(workDir, 'bundle');
    const paths = writeBundle(graph, idMap, outDir);

    assertEqual(readdirSync(outDir).sort(), ['bundle.meta.json', 'edges.cleaned.csv', 'nodes.cleaned.csv'], 'bundle files');

    assertEqual(
      readFileSync(paths.nodesPath, 'utf-8'),
      [
        'Nodes,Type,Class,compartmentRef',
        'Flowering time,process,biological_activity,compartment_1',
        'FT protein,transcription_factor,macromolecule,nucleus',
        'CO,transcription_factor,macromolecule,nucleus',
        'GI,adapter,macromolecule,cytoplasm',
        'FKF1,receptor,macromolecule,cytoplasm',
        '',
      ].join('\n'),
      'cleaned nodes table'
    );

    assertEqual(
      readFileSync(paths.edgesPath, 'utf-8'),
      [
        'source,target,Class,Confidence,Papers,Notes',
        'FT protein,Flowering time,positive_influence,high,"PMID:123, PMID:456",activates',
        'CO,FT protein,positive_influence,high,PMID:789,CO induces FT',
        'GI,CO,logic_arc,medium,,GI ∧ FKF1 stabilise CO',
        'FKF1,CO,logic_arc,medium,,GI ∧ FKF1 stabilise CO',
        'FKF1,CO,necessary_stimulation,low,PMID:1,needs blue light',
        '',
      ].join('\n'),
      'cleaned edges table'
    );

    assertEqual(
      JSON.parse(readFileSync(paths.metaPath, 'utf-8')),
      {
        n_nodes: 5,
        n_edges: 5,
        id_map_sample: {
          'Flowering time': 'n_Flowering_time',
          'FT protein': 'n_FT_protein',
          CO: 'n_CO',
          GI: 'n_GI',
          FKF1: 'n_FKF1',
        },
      },
      'bundle metadata'
    );

    // The cleaned bundle reads back as the same graph
    const reread = validateGraph({
      nodes: parseNodeTable(readFileSync(paths.nodesPath, 'utf-8')),
      edges: parseEdgeTable(readFileSync(paths.edgesPath, 'utf-8')),
    });
    assertEqual(serializeEdgeTable(reread.graph), serializeEdgeTable(graph), 'cleaned tables are stable');
    assertEqual(renderSbgn(reread.graph), renderSbgn(graph), 'cleaned tables render the same document');
  }

  // Metadata samples at most ten identifiers
  {
    const rows: NodeRow[] = [{ Nodes: 'Trait', Type: 'process', Class: 'biological_activity', compartmentRef: 'c' }];
    for (let i = 1; i <= 11; i++) {
      rows.push({ Nodes: `Gene ${i}`, Type: 'receptor', Class: 'macromolecule', compartmentRef: 'c' });
    }
    const { graph } = validateGraph({ nodes: rows, edges: [] });
    const meta = buildBundleMetadata(graph, assignIdentifiers(graph.nodes));
    assertEqual(meta.n_nodes, 12, 'node count');
    assertEqual(Object.keys(meta.id_map_sample), ['Trait', ...Array.from({ length: 9 }, (_, i) => `Gene ${i + 1}`)], 'first ten entries');
  }

  // Rows that only differ in spelling collapse to one edge
  {
    const nodes: NodeRow[] = [
      { Nodes: 'T', Type: 'process', Class: 'biological_activity', compartmentRef: 'c' },
      { Nodes: 'A', Type: 'hormone', Class: 'macromolecule', compartmentRef: 'c' },
    ];
    const edges = normalizeEdgeRows(
      parseEdgeTable(
        'source,target,Class,Confidence,Papers,Notes\n' +
          'A,T,positive influence,high,"P1,P2",x\n' +
          'A,T,positive_influence,high,"P1, P2",x\n'
      )
    );
    assertEqual(edges.length, 2, 'raw rows differ before canonicalisation');

    const { graph } = validateGraph({ nodes, edges });
    assertEqual(graph.edges.length, 1, 'one canonical edge');
    assertEqual(buildBundleMetadata(graph, assignIdentifiers(graph.nodes)).n_edges, 1, 'edge count in metadata');

    const arcs = renderSbgn(graph).split('\n').filter(line => line.includes('<arc '));
    assertEqual(arcs.length, 1, 'one arc rendered');

    const cleaned = serializeEdgeTable(graph);
    assertEqual(
      cleaned,
      'source,target,Class,Confidence,Papers,Notes\nA,T,positive_influence,high,"P1, P2",x\n',
      'cleaned edge table'
    );

    const renormalized = normalizeEdgeRows(parseEdgeTable(cleaned));
    assertEqual(renormalized.length, 1, 're-normalizing the cleaned table keeps every row');
    assertEqual(serializeEdgeTable(validateGraph({ nodes, edges: renormalized }).graph), cleaned, 'cleaned table is a fixed point');
  }

  // Dangling references abort before anything is written
  {
    const outDir = join(workDir, 'dangling');
    let caught: unknown = null;
    try {
      const graph = buildGraph(join(FIXTURES, 'nodes.csv'), join(FIXTURES, 'edges-dangling.csv'));
      writeBundle(graph, identifyNodes(graph), outDir);
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof DanglingReferenceError)) {
      throw new Error(`Expected DanglingReferenceError, got ${String(caught)}`);
    }
    assertEqual([caught.unknownSources, caught.unknownTargets], [['SOC1'], ['AP1']], 'dangling labels');
    if (existsSync(outDir)) {
      throw new Error('No bundle should be written when validation fails.');
    }
  }

  // Storage failures surface unchanged
  {
    const blocker = join(workDir, 'not-a-directory');
    writeFileSync(blocker, 'x');
    const { graph } = validateGraph({
      nodes: [{ Nodes: 'Trait', Type: 'process', Class: 'biological_activity', compartmentRef: 'c' }],
      edges: [],
    });
    let caught: unknown = null;
    try {
      writeBundle(graph, assignIdentifiers(graph.nodes), join(blocker, 'bundle'));
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof Error) || caught instanceof NetworkError) {
      throw new Error(`Expected the filesystem error, got ${String(caught)}`);
    }
  }

  // Config
  {
    const config = parseConfig('identifiers:\n  disambiguate: true\nlayout:\n  spacingX: 300\nunknown: 1\n');
    assertEqual(config.identifiers, { prefix: 'n_', maxLength: 64, disambiguate: true }, 'identifier section merged');
    assertEqual(config.layout, { originX: 100, originY: 100, spacingX: 300, spacingY: 140 }, 'layout section merged');
    assertEqual(config.bundle, DEFAULT_CONFIG.bundle, 'untouched section keeps defaults');
    assertEqual(parseConfig(''), DEFAULT_CONFIG, 'empty document gives the defaults');

    for (const text of ['layout:\n  spacingX: wide\n', 'glyph: 3\n', '- a\n', 'identifiers:\n  maxLength: 0\n', 'a: [\n']) {
      let caught: unknown = null;
      try {
        parseConfig(text);
      } catch (err) {
        caught = err;
      }
      if (!(caught instanceof ConfigError)) {
        throw new Error(`Expected ConfigError for ${JSON.stringify(text)}, got ${String(caught)}`);
      }
    }

    const configPath = join(workDir, 'network.config.yaml');
    writeFileSync(configPath, 'bundle:\n  metaFile: lineage.json\n');
    assertEqual(loadConfig(configPath).bundle.metaFile, 'lineage.json', 'config read from file');

    let missing: unknown = null;
    try {
      loadConfig(join(workDir, 'absent.yaml'));
    } catch (err) {
      missing = err;
    }
    if (!(missing instanceof ConfigError)) {
      throw new Error('An explicit config path that does not exist should fail.');
    }
  }
} finally {
  rmSync(workDir, { recursive: true, force: true });
}

console.log('network bundle test passed.');
