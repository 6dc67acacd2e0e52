import type { ConstructionNode } from '../core/node.js';
import type { Registration } from '../core/registration.js';
import type { Token } from '../core/token.js';
import type {
  Constructor,
  ConstructorDescriptor,
  Identity,
  ParameterDescriptor,
} from '../types/types.js';

/**
 * Selects the constructor the container calls to create an implementation.
 *
 * Implementations throw an ActivationError when no constructor qualifies and
 * have no side effects beyond their own caching.
 */
export interface ConstructorResolutionPolicy {
  selectConstructor(service: Identity, implementation: Constructor): ConstructorDescriptor;
}

/**
 * Produces the construction node for one constructor parameter.
 *
 * Throws an ActivationError when the parameter cannot be resolved. Must be
 * safe to call speculatively: building a node may not change container state.
 */
export interface ParameterResolutionPolicy {
  buildParameterNode(parameter: ParameterDescriptor): ConstructionNode;
}

/**
 * The part of the container a resolution policy may consult.
 */
export interface PolicyContext {
  /**
   * False during the registration phase, true once the container has started
   * resolving. Policies may be permissive before and strict after.
   */
  isLocked(): boolean;
  getRegistration(token: Token): Registration | undefined;
  readonly parameterResolution: ParameterResolutionPolicy;
}

export type ConstructorResolutionPolicyFactory = (
  context: PolicyContext
) => ConstructorResolutionPolicy;

export type ParameterResolutionPolicyFactory = (
  context: PolicyContext
) => ParameterResolutionPolicy;
