import {
  ClassConsistencyError,
  DanglingReferenceError,
  SchemaError,
  TraitCardinalityError,
} from '../errors';
import {
  CONFIDENCE_LEVELS,
  EDGE_CLASSES,
  NODE_CLASSES,
  NODE_TYPES,
  type Advisory,
  type EdgeClass,
  type NetworkEdge,
  type NetworkNode,
  type NetworkTables,
  type NodeClass,
  type NodeType,
  type RegulatoryGraph,
} from '../types';
import { findXmlForbiddenChars } from './sbgn';

export type ValidationResult = {
  graph: RegulatoryGraph;
  advisories: Advisory[];
};

const NET_EFFECT_CLASSES: ReadonlySet<EdgeClass> = new Set<EdgeClass>([
  'positive_influence',
  'negative_influence',
  'necessary_stimulation',
]);

/**
 * Match a cell against an enumeration. Upstream tables often spell the
 * values with spaces ("positive influence"); those map onto the canonical
 * underscore form.
 */
export function matchEnum<T extends string>(allowed: readonly T[], raw: string): T | undefined {
  const canonical = raw.trim().replace(/\s+/g, '_');
  return allowed.find(value => value === canonical);
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export function parsePapers(cell: string): string[] {
  return cell
    .split(',')
    .map(p => p.trim())
    .filter(Boolean);
}

export function canonicalEdgeKey(edge: NetworkEdge): string {
  return JSON.stringify([edge.source, edge.target, edge.class, edge.confidence, edge.papers.join(', '), edge.notes]);
}

/**
 * Targets that take logic_arc inputs should carry exactly one net-effect
 * edge. Never fatal; returned for the caller to report.
 */
export function checkLogicArcPairing(edges: readonly NetworkEdge[]): Advisory[] {
  const counts = new Map<string, { logicArcs: number; netEffectEdges: number }>();

  for (const edge of edges) {
    const entry = counts.get(edge.target) ?? { logicArcs: 0, netEffectEdges: 0 };
    if (edge.class === 'logic_arc') entry.logicArcs++;
    else if (NET_EFFECT_CLASSES.has(edge.class)) entry.netEffectEdges++;
    counts.set(edge.target, entry);
  }

  const advisories: Advisory[] = [];
  for (const [target, { logicArcs, netEffectEdges }] of counts) {
    if (logicArcs === 0 || netEffectEdges === 1) continue;
    advisories.push({
      target,
      logicArcs,
      netEffectEdges,
      message: `"${target}" has ${logicArcs} logic arc input${logicArcs === 1 ? '' : 's'} but ${netEffectEdges} net-effect edges (expected exactly 1)`,
    });
  }
  return advisories;
}

function validateNodes(tables: NetworkTables): NetworkNode[] {
  const rows = tables.nodes;

  const types = rows.map(row => matchEnum<NodeType>(NODE_TYPES, row.Type));
  const badTypes = unique(rows.filter((_, i) => types[i] === undefined).map(row => row.Type));
  if (badTypes.length > 0) {
    throw new SchemaError('nodes', 'Type', badTypes, 'has unsupported values');
  }

  const emptyLabels = rows.filter(row => !row.Nodes).length;
  if (emptyLabels > 0) {
    throw new SchemaError('nodes', 'Nodes', [''], `has ${emptyLabels} empty label${emptyLabels === 1 ? '' : 's'}`);
  }

  const unrenderable = rows.filter(row => findXmlForbiddenChars(row.Nodes).length > 0).map(row => row.Nodes);
  if (unrenderable.length > 0) {
    throw new SchemaError('nodes', 'Nodes', unique(unrenderable), 'has labels with characters XML cannot carry');
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.Nodes)) duplicates.add(row.Nodes);
    seen.add(row.Nodes);
  }
  if (duplicates.size > 0) {
    throw new SchemaError('nodes', 'Nodes', [...duplicates], 'has duplicate labels');
  }

  // The trait node's class is authoritative: process always means biological_activity
  const classes = rows.map((row, i): NodeClass | undefined =>
    types[i] === 'process' ? 'biological_activity' : matchEnum<NodeClass>(NODE_CLASSES, row.Class)
  );
  const badClasses = unique(rows.filter((_, i) => classes[i] === undefined).map(row => row.Class));
  if (badClasses.length > 0) {
    throw new SchemaError('nodes', 'Class', badClasses, 'has unsupported values');
  }

  const nodes: NetworkNode[] = [];
  rows.forEach((row, i) => {
    const type = types[i];
    const nodeClass = classes[i];
    if (type === undefined || nodeClass === undefined) return;
    nodes.push({ label: row.Nodes, type, class: nodeClass, compartment: row.compartmentRef });
  });

  const processLabels = nodes.filter(n => n.type === 'process').map(n => n.label);
  if (processLabels.length !== 1) {
    throw new TraitCardinalityError(processLabels);
  }

  const inconsistent = nodes.filter(n => n.type !== 'process' && n.class !== 'macromolecule').map(n => n.label);
  if (inconsistent.length > 0) {
    throw new ClassConsistencyError(inconsistent);
  }

  return nodes;
}

function validateEdges(tables: NetworkTables, nodeIndex: ReadonlyMap<string, NetworkNode>): NetworkEdge[] {
  const rows = tables.edges;

  const classes = rows.map(row => matchEnum<EdgeClass>(EDGE_CLASSES, row.Class));
  const badClasses = unique(rows.filter((_, i) => classes[i] === undefined).map(row => row.Class));
  if (badClasses.length > 0) {
    throw new SchemaError('edges', 'Class', badClasses, 'has unsupported values');
  }

  const confidences = rows.map(row => matchEnum(CONFIDENCE_LEVELS, row.Confidence));
  const badConfidences = unique(rows.filter((_, i) => confidences[i] === undefined).map(row => row.Confidence));
  if (badConfidences.length > 0) {
    throw new SchemaError('edges', 'Confidence', badConfidences, 'has unsupported values');
  }

  // Second pass: every endpoint resolves against the frozen node index
  const unknownSources = unique(rows.filter(row => !nodeIndex.has(row.source)).map(row => row.source));
  const unknownTargets = unique(rows.filter(row => !nodeIndex.has(row.target)).map(row => row.target));
  if (unknownSources.length > 0 || unknownTargets.length > 0) {
    throw new DanglingReferenceError(unknownSources, unknownTargets);
  }

  // Rows spelled differently can still be the same edge once canonical
  const seen = new Set<string>();
  const edges: NetworkEdge[] = [];
  rows.forEach((row, i) => {
    const edgeClass = classes[i];
    const confidence = confidences[i];
    if (edgeClass === undefined || confidence === undefined) return;
    const edge: NetworkEdge = {
      source: row.source,
      target: row.target,
      class: edgeClass,
      confidence,
      papers: parsePapers(row.Papers),
      notes: row.Notes,
    };
    const key = canonicalEdgeKey(edge);
    if (seen.has(key)) return;
    seen.add(key);
    edges.push(edge);
  });
  return edges;
}

/**
 * Turn normalized tables into an immutable graph, or throw the first
 * failing check. Nothing is partially accepted.
 */
export function validateGraph(tables: NetworkTables): ValidationResult {
  const nodes = validateNodes(tables);
  const nodeIndex = new Map(nodes.map(n => [n.label, Object.freeze(n)]));
  const edges = validateEdges(tables, nodeIndex);

  const traitNode = nodes.find(n => n.type === 'process');
  if (!traitNode) {
    throw new TraitCardinalityError([]);
  }

  const graph: RegulatoryGraph = Object.freeze({
    nodes: Object.freeze(nodes),
    edges: Object.freeze(edges.map(e => Object.freeze({ ...e, papers: Object.freeze(e.papers) }))),
    nodeIndex,
    traitNode,
  });

  return { graph, advisories: checkLogicArcPairing(graph.edges) };
}
