import { DEFAULT_CONFIG, type IdentifierOptions } from '../config';
import type { IdMap, NetworkNode } from '../types';

const UNSAFE_ID_CHARS = /[^0-9A-Za-z_]/gu;

/**
 * Replace every character outside [0-9A-Za-z_] with "_" and cut to maxLength.
 * Applying it to its own output is a no-op.
 */
export function sanitizeLabel(label: string, maxLength = DEFAULT_CONFIG.identifiers.maxLength): string {
  return label.replace(UNSAFE_ID_CHARS, '_').slice(0, maxLength);
}

export function sanitizeId(label: string, options: Partial<IdentifierOptions> = {}): string {
  const { prefix, maxLength } = { ...DEFAULT_CONFIG.identifiers, ...options };
  return prefix + sanitizeLabel(label, maxLength);
}

/**
 * Map every node label to its document id, in node order.
 *
 * Two labels can sanitize to the same id (e.g. when they only differ past the
 * truncation point). By default both keep that id; with `disambiguate` the
 * later ones get a numeric suffix.
 */
export function assignIdentifiers(nodes: readonly NetworkNode[], options: Partial<IdentifierOptions> = {}): IdMap {
  const resolved = { ...DEFAULT_CONFIG.identifiers, ...options };
  const idMap: IdMap = new Map();
  const used = new Set<string>();

  for (const node of nodes) {
    const base = sanitizeId(node.label, resolved);
    let id = base;

    if (resolved.disambiguate) {
      let n = 1;
      while (used.has(id)) {
        n++;
        id = `${base}_${n}`;
      }
      used.add(id);
    }

    idMap.set(node.label, id);
  }

  return idMap;
}

/**
 * Ids shared by more than one label, with the labels that produced them.
 */
export function findIdCollisions(idMap: IdMap): Map<string, string[]> {
  const byId = new Map<string, string[]>();
  for (const [label, id] of idMap) {
    const labels = byId.get(id) ?? [];
    labels.push(label);
    byId.set(id, labels);
  }

  const collisions = new Map<string, string[]>();
  for (const [id, labels] of byId) {
    if (labels.length > 1) collisions.set(id, labels);
  }
  return collisions;
}
