import {
  ActivationError,
  NoPublicConstructorError,
  NoResolvableConstructorError,
} from '../errors/errors.js';
import { ConstructorRegistry, describeConstructor } from '../registry/constructor-registry.js';
import type {
  Constructor,
  ConstructorDescriptor,
  Identity,
  ParameterDescriptor,
} from '../types/types.js';
import type { ConstructorResolutionPolicy, PolicyContext } from './types.js';

/**
 * Picks the public constructor with the most parameters that can all be
 * resolved.
 *
 * Constructors are tried longest first; among constructors of equal length
 * the one declared first wins. During the registration phase (container not
 * yet locked) the longest constructor is returned unconditionally, because
 * the registrations it depends on may not exist yet. Once the container is
 * locked, a constructor qualifies when every parameter either has a
 * registration or can be built by the parameter resolution policy.
 *
 * @example
 * ```typescript
 * const container = new Container({
 *   constructorResolution: (ctx) => new MostResolvableParametersPolicy(ctx),
 * });
 * ```
 */
export class MostResolvableParametersPolicy implements ConstructorResolutionPolicy {
  constructor(private readonly context: PolicyContext) {}

  selectConstructor(_service: Identity, implementation: Constructor): ConstructorDescriptor {
    const constructors = ConstructorRegistry.getConstructors(implementation);
    if (constructors.length === 0) {
      throw new NoPublicConstructorError(implementation.name);
    }

    // Array.prototype.sort is stable, so equal lengths keep declaration order
    const ordered = [...constructors].sort((a, b) => b.parameters.length - a.parameters.length);

    const registrationPhase = !this.context.isLocked();
    const selected = ordered.find(
      (ctor) => registrationPhase || ctor.parameters.every((p) => this.canBeResolved(p))
    );
    if (selected) return selected;

    throw new NoResolvableConstructorError(
      implementation.name,
      ordered.map(describeConstructor)
    );
  }

  private canBeResolved(parameter: ParameterDescriptor): boolean {
    if (parameter.token && this.context.getRegistration(parameter.token)) return true;
    return this.canBuildParameterNode(parameter);
  }

  private canBuildParameterNode(parameter: ParameterDescriptor): boolean {
    try {
      this.context.parameterResolution.buildParameterNode(parameter);
      return true;
    } catch (e) {
      if (e instanceof ActivationError) return false;
      throw e;
    }
  }
}
