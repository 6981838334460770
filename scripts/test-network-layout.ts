#!/usr/bin/env node
import { assignIdentifiers, findIdCollisions, sanitizeId, sanitizeLabel } from '../src/network/identifiers';
import { computeLayout, groupByType } from '../src/network/layout';
import type { NetworkNode, NodeType } from '../src/types';

function assertEqual(actual: unknown, expected: unknown, message: string) {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(`${message}\n  expected: ${e}\n  actual:   ${a}`);
  }
}

function node(label: string, type: NodeType): NetworkNode {
  return {
    label,
    type,
    class: type === 'process' ? 'biological_activity' : 'macromolecule',
    compartment: 'nucleus',
  };
}

// Sanitizing
{
  assertEqual(sanitizeId('FT protein'), 'n_FT_protein', 'spaces become underscores');
  assertEqual(sanitizeId('PIF4/PIF5 (bound)'), 'n_PIF4_PIF5__bound_', 'punctuation becomes underscores');
  assertEqual(sanitizeId('ABA–PYR1'), 'n_ABA_PYR1', 'a non-ASCII dash is one character');
  assertEqual(sanitizeId('ABA', { prefix: 'g_' }), 'g_ABA', 'prefix is configurable');
  assertEqual(sanitizeId('x'.repeat(100)).length, 2 + 64, 'body is cut to 64 characters');

  for (const label of ['FT protein', 'PIF4/PIF5 (bound)', 'a'.repeat(80), 'ABA–PYR1', '']) {
    const once = sanitizeLabel(label);
    assertEqual(sanitizeLabel(once), once, `sanitizing is idempotent for ${JSON.stringify(label)}`);
  }

  const nodes = [node('Flowering time', 'process'), node('FT protein', 'transcription_factor')];
  assertEqual(assignIdentifiers(nodes), assignIdentifiers(nodes), 'identifiers are deterministic');
}

// Collisions are kept by default
{
  const stem = 'X'.repeat(64);
  const nodes = [node(`${stem}alpha`, 'hormone'), node(`${stem}beta`, 'hormone'), node('FT', 'adapter')];

  const idMap = assignIdentifiers(nodes);
  assertEqual(idMap.get(`${stem}alpha`), `n_${stem}`, 'first long label');
  assertEqual(idMap.get(`${stem}beta`), `n_${stem}`, 'second long label shares the id');
  assertEqual([...findIdCollisions(idMap)], [[`n_${stem}`, [`${stem}alpha`, `${stem}beta`]]], 'collision reported');

  const disambiguated = assignIdentifiers(nodes, { disambiguate: true });
  assertEqual(
    [...disambiguated.values()],
    [`n_${stem}`, `n_${stem}_2`, 'n_FT'],
    'disambiguation suffixes later duplicates'
  );
  assertEqual(findIdCollisions(disambiguated).size, 0, 'no collisions once disambiguated');
}

// Grid layout
{
  const nodes = [
    node('Trait', 'process'),
    node('R1', 'receptor'),
    node('R2', 'receptor'),
    node('H1', 'hormone'),
    node('R3', 'receptor'),
  ];

  assertEqual([...groupByType(nodes).keys()], ['process', 'receptor', 'hormone'], 'groups in first-appearance order');

  const layout = computeLayout(nodes);
  assertEqual(
    [...layout],
    [
      ['Trait', { x: 100, y: 100 }],
      ['R1', { x: 100, y: 240 }],
      ['R2', { x: 320, y: 240 }],
      ['R3', { x: 540, y: 240 }],
      ['H1', { x: 100, y: 380 }],
    ],
    'row per type, column per position within type'
  );

  const custom = computeLayout(nodes, { originX: 0, originY: 10, spacingX: 50, spacingY: 5 });
  assertEqual(custom.get('R3'), { x: 100, y: 15 }, 'layout constants are configurable');

  const seen = new Set([...layout.values()].map(p => `${p.x},${p.y}`));
  assertEqual(seen.size, nodes.length, 'no two nodes share a position');
}

console.log('network layout test passed.');
