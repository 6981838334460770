import { DEFAULT_CONFIG, type LayoutOptions } from '../config';
import type { Layout, NetworkNode, NodeType } from '../types';

/**
 * Bucket nodes by type, keeping input order inside each bucket and ordering
 * the buckets by first appearance.
 */
export function groupByType(nodes: readonly NetworkNode[]): Map<NodeType, NetworkNode[]> {
  const groups = new Map<NodeType, NetworkNode[]>();
  for (const node of nodes) {
    const group = groups.get(node.type) ?? [];
    group.push(node);
    groups.set(node.type, group);
  }
  return groups;
}

/**
 * Grid placement: one row per node type, one column per node within its type.
 * Nodes of different types never share a row, so nothing overlaps.
 */
export function computeLayout(nodes: readonly NetworkNode[], options: Partial<LayoutOptions> = {}): Layout {
  const { originX, originY, spacingX, spacingY } = { ...DEFAULT_CONFIG.layout, ...options };
  const layout: Layout = new Map();

  let row = 0;
  for (const group of groupByType(nodes).values()) {
    group.forEach((node, column) => {
      layout.set(node.label, {
        x: originX + column * spacingX,
        y: originY + row * spacingY,
      });
    });
    row++;
  }

  return layout;
}
