import type { Lifestyle } from '../core/lifestyle.js';
import type { Registration } from '../core/registration.js';
import { describeIdentity, type Identity } from '../types/types.js';

/**
 * A consumer that outlives one of its dependencies.
 */
export interface LifestyleMismatch {
  readonly implementation: Identity;
  readonly lifestyle: Lifestyle;
  readonly dependency: Registration;
  readonly description: string;
}

/**
 * Anything that can list its registrations; the Container qualifies.
 */
export interface RegistrationSource {
  getRegistrations(): readonly Registration[];
}

/**
 * Report every recorded relationship where the consumer's lifestyle is
 * longer than the lifestyle of the registration it depends on.
 *
 * Only relationships recorded by a build are seen; call `verify()` first to
 * build every registration.
 *
 * @example
 * ```typescript
 * container.verify();
 * for (const m of analyzeLifestyleMismatches(container)) console.warn(m.description);
 * ```
 */
export function analyzeLifestyleMismatches(source: RegistrationSource): LifestyleMismatch[] {
  const mismatches: LifestyleMismatch[] = [];
  for (const registration of source.getRegistrations()) {
    for (const edge of registration.getRelationships()) {
      if (edge.lifestyle.length > edge.dependency.lifestyle.length) {
        mismatches.push(
          Object.freeze({
            implementation: edge.implementation,
            lifestyle: edge.lifestyle,
            dependency: edge.dependency,
            description:
              `${describeIdentity(edge.implementation)} (${edge.lifestyle.name}) depends on ` +
              `${edge.dependency.describe()}.`,
          })
        );
      }
    }
  }
  return mismatches;
}
