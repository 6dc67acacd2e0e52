/*
 * Construction nodes
 * ------------------
 * Immutable, side-effect-free description of how an instance is produced.
 * Nodes compose into a tree rooted at the node for the fully built service
 * instance; the FactoryCompiler turns a tree into a factory closure.
 *
 * Variants:
 *  - constant:    a pre-built value
 *  - invoke:      call a stored zero-argument delegate
 *  - construct:   call a constructor signature with one argument node per parameter
 *  - wrap:        apply a one-argument closure to the value of an inner node
 *  - placeholder: identity-only stand-in for an overridden parameter
 *
 * Every node is frozen on creation. Placeholders carry a fresh symbol, so two
 * placeholders never match each other even when they look the same.
 */
import { describeParameter } from '../registry/constructor-registry.js';
import type { ConstructorDescriptor, ParameterDescriptor } from '../types/types.js';

export interface ConstantNode {
  readonly kind: 'constant';
  readonly value: unknown;
}

export interface InvokeNode {
  readonly kind: 'invoke';
  readonly delegate: () => unknown;
  /** Shown in diagnostics in place of the delegate */
  readonly label: string;
}

export interface ConstructNode {
  readonly kind: 'construct';
  readonly ctor: ConstructorDescriptor;
  readonly args: readonly ConstructionNode[];
}

export interface WrapNode {
  readonly kind: 'wrap';
  readonly inner: ConstructionNode;
  readonly transform: (value: unknown) => unknown;
  readonly label: string;
}

export interface PlaceholderNode {
  readonly kind: 'placeholder';
  readonly id: symbol;
  readonly parameter: ParameterDescriptor;
}

export type ConstructionNode = ConstantNode | InvokeNode | ConstructNode | WrapNode | PlaceholderNode;

export type NodeKind = ConstructionNode['kind'];

const NODE_KINDS: ReadonlySet<string> = new Set<NodeKind>([
  'constant',
  'invoke',
  'construct',
  'wrap',
  'placeholder',
]);

/**
 * Node constructors. Every returned node is frozen.
 */
export const Plan = {
  constant(value: unknown): ConstantNode {
    return Object.freeze<ConstantNode>({ kind: 'constant', value });
  },

  invoke(delegate: () => unknown, label = delegate.name || 'delegate'): InvokeNode {
    return Object.freeze<InvokeNode>({ kind: 'invoke', delegate, label });
  },

  construct(ctor: ConstructorDescriptor, args: readonly ConstructionNode[]): ConstructNode {
    return Object.freeze<ConstructNode>({ kind: 'construct', ctor, args: Object.freeze([...args]) });
  },

  wrap(inner: ConstructionNode, transform: (value: unknown) => unknown, label = 'wrap'): WrapNode {
    return Object.freeze<WrapNode>({ kind: 'wrap', inner, transform, label });
  },

  placeholder(parameter: ParameterDescriptor): PlaceholderNode {
    return Object.freeze<PlaceholderNode>({
      kind: 'placeholder',
      id: Symbol(`placeholder:${describeParameter(parameter)}`),
      parameter,
    });
  },
} as const;

/**
 * Runtime type guard for construction nodes, used on values returned by
 * interceptors and parameter resolution policies.
 */
export function isConstructionNode(x: unknown): x is ConstructionNode {
  return (
    typeof x === 'object' &&
    x !== null &&
    typeof (x as { kind?: unknown }).kind === 'string' &&
    NODE_KINDS.has((x as { kind: string }).kind)
  );
}

/**
 * Render a node tree on one line, e.g. `init(new Mailer(invoke(Transport), 42))`.
 */
export function describeNode(node: ConstructionNode): string {
  switch (node.kind) {
    case 'constant':
      return describeValue(node.value);
    case 'invoke':
      return `invoke(${node.label})`;
    case 'construct':
      return `new ${node.ctor.implementation.name}(${node.args.map(describeNode).join(', ')})`;
    case 'wrap':
      return `${node.label}(${describeNode(node.inner)})`;
    case 'placeholder':
      return `<${describeParameter(node.parameter)}>`;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'function') return value.name || 'function';
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ? `[${value.constructor.name}]` : '[object]';
  }
  return String(value);
}
