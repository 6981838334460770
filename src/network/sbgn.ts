import { DEFAULT_CONFIG, type GlyphOptions, type IdentifierOptions, type LayoutOptions } from '../config';
import type { EdgeClass, IdMap, Layout, NetworkNode, RegulatoryGraph } from '../types';
import { assignIdentifiers, sanitizeId } from './identifiers';
import { computeLayout } from './layout';

export const SBGN_NAMESPACE = 'http://sbgn.org/libsbgn/0.3';

export type GlyphClass = 'biological activity' | 'macromolecule';

export type ArcClass = 'positive influence' | 'negative influence' | 'logic arc' | 'necessary stimulation';

const ARC_CLASSES: Record<EdgeClass, ArcClass> = {
  positive_influence: 'positive influence',
  negative_influence: 'negative influence',
  logic_arc: 'logic arc',
  necessary_stimulation: 'necessary stimulation',
};

export type RenderOptions = {
  identifiers?: Partial<IdentifierOptions>;
  layout?: Partial<LayoutOptions>;
  glyph?: Partial<GlyphOptions>;
};

// Code points XML 1.0 cannot carry at all, lone surrogates included
const XML_FORBIDDEN = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

export function findXmlForbiddenChars(text: string): string[] {
  return text.match(XML_FORBIDDEN) ?? [];
}

/**
 * Escape for attribute values. Tab, newline and carriage return become
 * character references so attribute normalization keeps them; code points
 * XML forbids are dropped.
 */
export function escapeXml(text: string): string {
  return text
    .replace(XML_FORBIDDEN, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
    .replace(/\t/g, '&#9;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;');
}

export function glyphClassFor(node: Pick<NetworkNode, 'type' | 'class'>): GlyphClass {
  if (node.type === 'process' && node.class === 'biological_activity') return 'biological activity';
  return node.class === 'macromolecule' ? 'macromolecule' : 'biological activity';
}

/**
 * Unknown classes cannot get past validation, but still render as positive influence.
 */
export function arcClassFor(edgeClass: string): ArcClass {
  const known = Object.entries(ARC_CLASSES).find(([key]) => key === edgeClass);
  return known ? known[1] : 'positive influence';
}

function idFor(label: string, idMap: IdMap, options: Partial<IdentifierOptions>): string {
  return idMap.get(label) ?? sanitizeId(label, options);
}

/**
 * Serialize a validated graph as an SBGN-ML Process Description map.
 * Pure: the same graph and options always give the same bytes.
 */
export function renderSbgn(
  graph: RegulatoryGraph,
  options: RenderOptions = {},
  idMap: IdMap = assignIdentifiers(graph.nodes, options.identifiers),
  layout: Layout = computeLayout(graph.nodes, options.layout)
): string {
  const { width, height } = { ...DEFAULT_CONFIG.glyph, ...options.glyph };
  const idOptions = options.identifiers ?? {};

  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<sbgn xmlns="${SBGN_NAMESPACE}">`,
    '  <map language="process description">',
  ];

  for (const node of graph.nodes) {
    const id = idFor(node.label, idMap, idOptions);
    const position = layout.get(node.label) ?? { x: 0, y: 0 };
    lines.push(
      `    <glyph id="${escapeXml(id)}" class="${glyphClassFor(node)}">`,
      `      <label text="${escapeXml(node.label)}"/>`,
      `      <bbox x="${position.x}" y="${position.y}" w="${width}" h="${height}"/>`,
      '    </glyph>'
    );
  }

  for (const edge of graph.edges) {
    const sourceId = escapeXml(idFor(edge.source, idMap, idOptions));
    const targetId = escapeXml(idFor(edge.target, idMap, idOptions));
    lines.push(
      `    <arc class="${arcClassFor(edge.class)}" source="${sourceId}" target="${targetId}">` +
        `<port idref="${sourceId}"/><port idref="${targetId}"/></arc>`
    );
  }

  lines.push('  </map>', '</sbgn>');
  return lines.join('\n') + '\n';
}
