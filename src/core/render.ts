import { unhtmlify } from './hierarchy/escape.js';
import type { AnnotatedNode } from './types.js';

export interface TreeStats {
  nodes: number;
  leaves: number;
  splits: number;
  maxDepth: number;
}

export function treeStats(tree: AnnotatedNode): TreeStats {
  const stats: TreeStats = { nodes: 0, leaves: 0, splits: 0, maxDepth: 0 };

  walk(tree, node => {
    stats.nodes++;
    stats.maxDepth = Math.max(stats.maxDepth, node.depth);
    if (node.children.length > 0) stats.splits++;
    else if (node.depth > 0) stats.leaves++;
  });

  return stats;
}

/**
 * Plain-text outline of an annotated tree, two spaces per level:
 *
 *   ruleset (2 leaves)
 *     (b <= 1) (2 leaves)
 *       -> yes [0.9]
 */
export function renderTextTree(tree: AnnotatedNode): string {
  const lines: string[] = [];

  walk(tree, node => {
    const indent = '  '.repeat(node.depth);
    const name = unhtmlify(node.name);
    if (node.children.length === 0 && node.depth > 0) {
      lines.push(`${indent}-> ${name} [${node.score ?? 0}]`);
    } else {
      const leaves = Object.values(node.class_counts).reduce((sum, n) => sum + n, 0);
      lines.push(`${indent}${name} (${leaves} ${leaves === 1 ? 'leaf' : 'leaves'})`);
    }
  });

  return lines.join('\n');
}

// Pre-order, children in order
function walk(tree: AnnotatedNode, visit: (node: AnnotatedNode) => void): void {
  const stack: AnnotatedNode[] = [tree];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    visit(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
}
