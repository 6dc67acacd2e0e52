import { AmbiguousConstructorError, NoPublicConstructorError } from '../errors/errors.js';
import { ConstructorRegistry, describeConstructor } from '../registry/constructor-registry.js';
import type { Constructor, ConstructorDescriptor, Identity } from '../types/types.js';
import type { ConstructorResolutionPolicy } from './types.js';

/**
 * Default constructor policy: the implementation must have exactly one public
 * constructor.
 */
export class SingleConstructorPolicy implements ConstructorResolutionPolicy {
  selectConstructor(_service: Identity, implementation: Constructor): ConstructorDescriptor {
    const constructors = ConstructorRegistry.getConstructors(implementation);
    const [only] = constructors;
    if (!only) throw new NoPublicConstructorError(implementation.name);
    if (constructors.length > 1) {
      throw new AmbiguousConstructorError(
        implementation.name,
        constructors.map(describeConstructor)
      );
    }
    return only;
  }
}
