#!/usr/bin/env node
import { arcClassFor, escapeXml, findXmlForbiddenChars, glyphClassFor, renderSbgn } from '../src/network/sbgn';
import { validateGraph } from '../src/network/validate';
import type { EdgeRow, NodeRow } from '../src/types';

function assertEqual(actual: unknown, expected: unknown, message: string) {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(`${message}\n  expected: ${e}\n  actual:   ${a}`);
  }
}

const nodes: NodeRow[] = [
  { Nodes: 'Flowering time', Type: 'process', Class: 'biological_activity', compartmentRef: 'compartment_1' },
  { Nodes: 'FT protein', Type: 'transcription_factor', Class: 'macromolecule', compartmentRef: 'nucleus' },
];
const edges: EdgeRow[] = [
  { source: 'FT protein', target: 'Flowering time', Class: 'positive_influence', Confidence: 'high', Papers: 'PMID:123', Notes: 'activates' },
];

// Full document for a two-node network
{
  const { graph } = validateGraph({ nodes, edges });
  const xml = renderSbgn(graph);

  const expected = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<sbgn xmlns="http://sbgn.org/libsbgn/0.3">',
    '  <map language="process description">',
    '    <glyph id="n_Flowering_time" class="biological activity">',
    '      <label text="Flowering time"/>',
    '      <bbox x="100" y="100" w="150" h="50"/>',
    '    </glyph>',
    '    <glyph id="n_FT_protein" class="macromolecule">',
    '      <label text="FT protein"/>',
    '      <bbox x="100" y="240" w="150" h="50"/>',
    '    </glyph>',
    '    <arc class="positive influence" source="n_FT_protein" target="n_Flowering_time"><port idref="n_FT_protein"/><port idref="n_Flowering_time"/></arc>',
    '  </map>',
    '</sbgn>',
    '',
  ].join('\n');

  if (xml !== expected) {
    throw new Error(`Rendered document mismatch:\n${xml}`);
  }
  if (renderSbgn(graph) !== xml) {
    throw new Error('Rendering twice should give identical documents.');
  }
}

// Every edge class maps onto its arc kind
{
  const all: NodeRow[] = [
    ...nodes,
    { Nodes: 'GI', Type: 'adapter', Class: 'macromolecule', compartmentRef: 'cytoplasm' },
  ];
  const classes = ['positive_influence', 'negative_influence', 'logic_arc', 'necessary_stimulation'];
  const { graph } = validateGraph({
    nodes: all,
    edges: classes.map(cls => ({ source: 'GI', target: 'FT protein', Class: cls, Confidence: 'medium', Papers: '', Notes: cls })),
  });

  const arcs = renderSbgn(graph)
    .split('\n')
    .filter(line => line.includes('<arc '))
    .map(line => line.match(/class="([^"]+)"/)?.[1]);
  assertEqual(arcs, ['positive influence', 'negative influence', 'logic arc', 'necessary stimulation'], 'arc classes');

  assertEqual(arcClassFor('inhibition'), 'positive influence', 'unknown edge class falls back to positive influence');
}

// Glyph classes come from the type/class pair
{
  assertEqual(glyphClassFor({ type: 'process', class: 'biological_activity' }), 'biological activity', 'trait glyph');
  assertEqual(glyphClassFor({ type: 'hormone', class: 'macromolecule' }), 'macromolecule', 'entity glyph');
  assertEqual(glyphClassFor({ type: 'hormone', class: 'biological_activity' }), 'biological activity', 'non-macromolecule glyph');
}

// Labels are escaped; ids never need it
{
  assertEqual(escapeXml(`A<B> & "C" 'D'`), 'A&lt;B&gt; &amp; &quot;C&quot; &apos;D&apos;', 'xml escaping');

  const { graph } = validateGraph({
    nodes: [
      nodes[0],
      { Nodes: 'A<B> & "C"', Type: 'complex', Class: 'macromolecule', compartmentRef: 'nucleus' },
    ],
    edges: [],
  });
  const xml = renderSbgn(graph);
  if (!xml.includes('    <glyph id="n_A_B_____C_" class="macromolecule">\n      <label text="A&lt;B&gt; &amp; &quot;C&quot;"/>\n')) {
    throw new Error(`Escaped glyph not found:\n${xml}`);
  }
}

// Whitespace controls survive attribute normalization; forbidden code points never reach the document
{
  assertEqual(escapeXml('a\tb\nc\rd'), 'a&#9;b&#10;c&#13;d', 'tab, newline and carriage return become references');
  assertEqual(escapeXml('x\u0001y\uD800z'), 'xyz', 'control characters and lone surrogates are dropped');
  assertEqual(escapeXml('ABA–PYR1 \u{1F331}'), 'ABA–PYR1 \u{1F331}', 'valid non-ASCII text is kept');

  const { graph } = validateGraph({
    nodes: [
      nodes[0],
      { Nodes: 'PIF4\nbound', Type: 'complex', Class: 'macromolecule', compartmentRef: 'nucleus' },
    ],
    edges: [],
  });
  if (!renderSbgn(graph).includes('      <label text="PIF4&#10;bound"/>\n')) {
    throw new Error('multi-line label should be written with a newline reference');
  }
}

assertEqual(findXmlForbiddenChars('a\u0001b\u0002\tc'), ['\u0001', '\u0002'], 'forbidden code points are listed');

// Colliding labels render with the same id
{
  const stem = 'Y'.repeat(64);
  const { graph } = validateGraph({
    nodes: [
      nodes[0],
      { Nodes: `${stem}1`, Type: 'hormone', Class: 'macromolecule', compartmentRef: 'c' },
      { Nodes: `${stem}2`, Type: 'hormone', Class: 'macromolecule', compartmentRef: 'c' },
    ],
    edges: [],
  });
  const ids = renderSbgn(graph)
    .split('\n')
    .filter(line => line.includes('<glyph '))
    .map(line => line.match(/id="([^"]+)"/)?.[1]);
  assertEqual(ids, ['n_Flowering_time', `n_${stem}`, `n_${stem}`], 'truncated labels share an id');

  const glyphSize = renderSbgn(graph, { glyph: { width: 90 } });
  if (!glyphSize.includes('<bbox x="100" y="100" w="90" h="50"/>')) {
    throw new Error('glyph width should be configurable');
  }
}

console.log('network sbgn test passed.');
