#!/usr/bin/env node
import {
  ClassConsistencyError,
  DanglingReferenceError,
  NetworkError,
  SchemaError,
  TraitCardinalityError,
} from '../src/errors';
import { checkLogicArcPairing, matchEnum, parsePapers, validateGraph } from '../src/network/validate';
import { NODE_CLASSES, type EdgeRow, type NetworkEdge, type NetworkTables, type NodeRow } from '../src/types';

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

function node(label: string, type: string, cls: string, compartment = 'nucleus'): NodeRow {
  return { Nodes: label, Type: type, Class: cls, compartmentRef: compartment };
}

function edge(source: string, target: string, cls = 'positive_influence', confidence = 'high'): EdgeRow {
  return { source, target, Class: cls, Confidence: confidence, Papers: 'PMID:123', Notes: 'activates' };
}

const trait = node('Flowering time', 'process', 'biological_activity', 'compartment_1');
const ft = node('FT protein', 'transcription_factor', 'macromolecule');

function tables(nodes: NodeRow[], edges: EdgeRow[]): NetworkTables {
  return { nodes, edges };
}

// Minimal valid network
{
  const { graph, advisories } = validateGraph(tables([trait, ft], [edge('FT protein', 'Flowering time')]));
  assertEqual(graph.nodes.length, 2, 'both nodes accepted');
  assertEqual(graph.traitNode.label, 'Flowering time', 'trait node identified');
  assertEqual(graph.traitNode.class, 'biological_activity', 'trait node class');
  assertEqual(graph.edges[0], {
    source: 'FT protein',
    target: 'Flowering time',
    class: 'positive_influence',
    confidence: 'high',
    papers: ['PMID:123'],
    notes: 'activates',
  }, 'edge typed from its row');
  assertEqual(graph.nodeIndex.get('FT protein')?.type, 'transcription_factor', 'node index resolves labels');
  assertEqual(advisories, [], 'no advisories for a plain edge');
  if (!Object.isFrozen(graph) || !Object.isFrozen(graph.nodes) || !Object.isFrozen(graph.edges[0])) {
    throw new Error('validated graph should be frozen');
  }
}

// Process nodes are coerced to biological_activity
{
  const { graph } = validateGraph(tables([node('Yield', 'process', 'macromolecule'), ft], []));
  assertEqual(graph.traitNode.class, 'biological_activity', 'process class is auto-repaired');

  const { graph: odd } = validateGraph(tables([node('Yield', 'process', 'nonsense'), ft], []));
  assertEqual(odd.traitNode.class, 'biological_activity', 'process class is repaired before the enumeration check');
}

// Spaced enumeration spellings
{
  const { graph } = validateGraph(
    tables([node('Trait', 'process', 'biological activity'), ft], [edge('FT protein', 'Trait', 'necessary stimulation')])
  );
  assertEqual(graph.edges[0].class, 'necessary_stimulation', 'spaced edge class is canonicalised');
  assertEqual(matchEnum(NODE_CLASSES, 'biological activity'), 'biological_activity', 'spaced node class matches');
  assertEqual(matchEnum(NODE_CLASSES, 'Macromolecule'), undefined, 'matching is case-sensitive');
}

// Trait cardinality
{
  const none = expectError(() => validateGraph(tables([ft], [])), TraitCardinalityError);
  assertEqual(none.processLabels, [], 'zero process nodes');

  const two = expectError(
    () => validateGraph(tables([trait, node('Yield', 'process', 'biological_activity'), ft], [])),
    TraitCardinalityError
  );
  assertEqual(two.processLabels, ['Flowering time', 'Yield'], 'both process nodes reported');
  if (!(two instanceof NetworkError) || two.code !== 'TRAIT_CARDINALITY') {
    throw new Error('TraitCardinalityError should be a NetworkError with its code');
  }
}

// Class consistency is rejected, not repaired, for non-process nodes
{
  const err = expectError(
    () => validateGraph(tables([trait, node('GI', 'adapter', 'biological_activity'), ft], [])),
    ClassConsistencyError
  );
  assertEqual(err.labels, ['GI'], 'offending node named');
}

// Enumerations
{
  const badType = expectError(
    () => validateGraph(tables([trait, node('X', 'enzyme', 'macromolecule'), node('Y', 'enzyme', 'macromolecule')], [])),
    SchemaError
  );
  assertEqual([badType.table, badType.column, badType.values], ['nodes', 'Type', ['enzyme']], 'bad node type');

  const badClass = expectError(() => validateGraph(tables([trait, node('X', 'hormone', 'protein')], [])), SchemaError);
  assertEqual([badClass.column, badClass.values], ['Class', ['protein']], 'bad node class');

  const badEdgeClass = expectError(
    () => validateGraph(tables([trait, ft], [edge('FT protein', 'Flowering time', 'inhibition')])),
    SchemaError
  );
  assertEqual([badEdgeClass.table, badEdgeClass.column, badEdgeClass.values], ['edges', 'Class', ['inhibition']], 'bad edge class');

  const badConfidence = expectError(
    () => validateGraph(tables([trait, ft], [edge('FT protein', 'Flowering time', 'logic_arc', 'certain')])),
    SchemaError
  );
  assertEqual([badConfidence.column, badConfidence.values], ['Confidence', ['certain']], 'bad confidence');
}

// Labels
{
  const dup = expectError(() => validateGraph(tables([trait, ft, ft], [])), SchemaError);
  assertEqual([dup.column, dup.values], ['Nodes', ['FT protein']], 'duplicate labels');

  const control = expectError(
    () => validateGraph(tables([trait, node('GI\u0001', 'adapter', 'macromolecule')], [])),
    SchemaError
  );
  assertEqual([control.column, control.values], ['Nodes', ['GI\u0001']], 'label with a control character');

  const multiline = validateGraph(tables([trait, node('GI\nbound', 'adapter', 'macromolecule')], []));
  assertEqual(multiline.graph.nodes[1].label, 'GI\nbound', 'newlines inside a label are allowed');

  const empty = expectError(() => validateGraph(tables([trait, node('', 'hormone', 'macromolecule')], [])), SchemaError);
  assertEqual(empty.column, 'Nodes', 'empty label');
}

// Referential integrity reports every unknown endpoint
{
  const err = expectError(
    () =>
      validateGraph(
        tables(
          [trait, ft],
          [
            edge('SOC1', 'Flowering time'),
            edge('FT protein', 'AP1'),
            edge('SOC1', 'LFY'),
            edge('FT protein', 'Flowering time'),
          ]
        )
      ),
    DanglingReferenceError
  );
  assertEqual(err.unknownSources, ['SOC1'], 'unknown sources');
  assertEqual(err.unknownTargets, ['AP1', 'LFY'], 'unknown targets');
  if (!err.message.includes('"SOC1"') || !err.message.includes('"LFY"')) {
    throw new Error('dangling reference message should name the labels');
  }
}

// Logic-arc pairing is advisory only
{
  const gi = node('GI', 'adapter', 'macromolecule');
  const fkf1 = node('FKF1', 'receptor', 'macromolecule');
  const { graph, advisories } = validateGraph(
    tables([trait, ft, gi, fkf1], [edge('GI', 'FT protein', 'logic_arc'), edge('FKF1', 'FT protein', 'logic_arc')])
  );
  assertEqual(graph.edges.length, 2, 'unpaired logic arcs still validate');
  assertEqual(advisories.map(a => [a.target, a.logicArcs, a.netEffectEdges]), [['FT protein', 2, 0]], 'missing net-effect edge reported');

  const paired: NetworkEdge[] = [
    ...graph.edges,
    { source: 'FKF1', target: 'FT protein', class: 'positive_influence', confidence: 'low', papers: [], notes: '' },
  ];
  assertEqual(checkLogicArcPairing(paired), [], 'exactly one net-effect edge satisfies the convention');
}

assertEqual(parsePapers(' PMID:1 ,PMID:2,, doi:10.1/x '), ['PMID:1', 'PMID:2', 'doi:10.1/x'], 'papers split on commas');
assertEqual(parsePapers(''), [], 'empty papers cell');

console.log('network validate test passed.');
