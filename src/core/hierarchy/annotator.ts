import type { AnnotatedNode, HierarchyNode } from '../types.js';

export interface AnnotateOptions {
  /** Collapse single-child chains into `A AND B` nodes. */
  merge?: boolean;
}

interface Frame {
  out: AnnotatedNode;
  pending: HierarchyNode[];
  next: number;
}

/**
 * Annotate a raw tree with depth, descendant counts and per-class leaf
 * counts. Walks the tree with an explicit stack so deep chains cannot blow
 * the call stack. The input tree is not modified.
 */
export function annotateTree(root: HierarchyNode, options: AnnotateOptions = {}): AnnotatedNode {
  const merge = options.merge ?? false;
  const rootFrame = openFrame(root, 0, false);
  const stack: Frame[] = [rootFrame];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.pending.length) {
      const child = frame.pending[frame.next];
      frame.next++;
      const childFrame = openFrame(child, frame.out.depth + 1, merge);
      frame.out.children.push(childFrame.out);
      stack.push(childFrame);
      continue;
    }

    stack.pop();
    const parent = stack[stack.length - 1];
    if (parent) accumulate(parent.out, frame.out);
  }

  return rootFrame.out;
}

function openFrame(node: HierarchyNode, depth: number, merge: boolean): Frame {
  let name = node.name;
  let pending = node.children;

  // Never fold a leaf into its parent: the leaf carries the score
  if (merge && depth > 0 && pending.length === 1 && pending[0].children.length > 0) {
    const only = pending[0];
    name = `${name} AND ${only.name}`;
    pending = only.children;
  }

  const out: AnnotatedNode = {
    name,
    children: [],
    depth,
    num_descendants: 0,
    class_counts: {},
  };
  if (node.score !== undefined) out.score = node.score;

  // An empty root is not a leaf
  if (pending.length === 0 && depth > 0) {
    out.class_counts[name] = 1;
  }

  return { out, pending, next: 0 };
}

function accumulate(parent: AnnotatedNode, child: AnnotatedNode): void {
  parent.num_descendants += child.num_descendants + 1;
  for (const [className, count] of Object.entries(child.class_counts)) {
    parent.class_counts[className] = (parent.class_counts[className] ?? 0) + count;
  }
}
