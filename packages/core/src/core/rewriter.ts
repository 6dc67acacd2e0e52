import { Plan, type ConstructionNode, type PlaceholderNode } from './node.js';
import type { OverrideTable } from './overrides.js';

/**
 * Replace every occurrence of `placeholder` in a node tree with `replacement`.
 *
 * Matching is by placeholder identity (its symbol), never by structure.
 * Subtrees without a match are returned as-is, so a tree without the
 * placeholder comes back as the very same object.
 */
export function replaceSubNode(
  root: ConstructionNode,
  placeholder: PlaceholderNode,
  replacement: ConstructionNode
): ConstructionNode {
  const visit = (node: ConstructionNode): ConstructionNode => {
    switch (node.kind) {
      case 'placeholder':
        return node.id === placeholder.id ? replacement : node;
      case 'construct': {
        let changed = false;
        const args = node.args.map((arg) => {
          const next = visit(arg);
          if (next !== arg) changed = true;
          return next;
        });
        return changed ? Plan.construct(node.ctor, args) : node;
      }
      case 'wrap': {
        const inner = visit(node.inner);
        return inner === node.inner ? node : Plan.wrap(inner, node.transform, node.label);
      }
      case 'constant':
      case 'invoke':
        return node;
    }
  };

  return visit(root);
}

/**
 * Substitute every placeholder of an override table with its replacement node.
 */
export function replacePlaceholders(
  root: ConstructionNode,
  overrides: OverrideTable | undefined
): ConstructionNode {
  if (!overrides) return root;
  let node = root;
  for (const entry of overrides.entries()) {
    node = replaceSubNode(node, entry.placeholder, entry.replacement);
  }
  return node;
}
