import { Plan, type ConstructionNode, type PlaceholderNode } from './node.js';
import type { ParameterDescriptor } from '../types/types.js';

/** A parameter descriptor paired with the node that replaces its resolution. */
export type ParameterOverride = readonly [parameter: ParameterDescriptor, replacement: ConstructionNode];

export interface OverrideEntry {
  readonly placeholder: PlaceholderNode;
  readonly replacement: ConstructionNode;
}

/**
 * Parameter overrides of one registration.
 *
 * Keyed by parameter descriptor identity. Each entry gets its own placeholder
 * node; the plan builder puts the placeholder in the constructor call, and the
 * rewriter swaps in the replacement after interception. Entries for
 * parameters of a constructor that is not selected are never used.
 */
export class OverrideTable {
  private readonly byParameter = new Map<ParameterDescriptor, OverrideEntry>();

  constructor(overrides: Iterable<ParameterOverride>) {
    // Later entries for the same parameter replace earlier ones
    for (const [parameter, replacement] of overrides) {
      this.byParameter.set(
        parameter,
        Object.freeze({ placeholder: Plan.placeholder(parameter), replacement })
      );
    }
  }

  get size(): number {
    return this.byParameter.size;
  }

  /**
   * Placeholder standing in for an overridden parameter, if any.
   */
  placeholderFor(parameter: ParameterDescriptor): PlaceholderNode | undefined {
    return this.byParameter.get(parameter)?.placeholder;
  }

  has(parameter: ParameterDescriptor): boolean {
    return this.byParameter.has(parameter);
  }

  *entries(): IterableIterator<OverrideEntry> {
    yield* this.byParameter.values();
  }
}
