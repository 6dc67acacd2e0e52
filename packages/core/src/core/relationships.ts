import type { Identity } from '../types/types.js';
import { CriticalSection } from './critical-section.js';
import type { Lifestyle } from './lifestyle.js';
import type { Registration } from './registration.js';

/**
 * A dependency discovered while building a plan: `implementation`, created
 * under `lifestyle`, depends on whatever `dependency` produces.
 */
export interface KnownRelationship {
  readonly implementation: Identity;
  readonly lifestyle: Lifestyle;
  readonly dependency: Registration;
}

export function createRelationship(
  implementation: Identity,
  lifestyle: Lifestyle,
  dependency: Registration
): KnownRelationship {
  return Object.freeze({ implementation, lifestyle, dependency });
}

const sameRelationship = (a: KnownRelationship, b: KnownRelationship): boolean =>
  a.implementation === b.implementation &&
  a.lifestyle === b.lifestyle &&
  a.dependency === b.dependency;

/**
 * De-duplicating set of relationship edges owned by one registration.
 *
 * All access goes through one critical section. Reads return a frozen copy,
 * and replace() clears and repopulates inside a single section, so a reader
 * sees either the old set or the new one in full.
 */
export class RelationshipSet {
  private readonly edges: KnownRelationship[] = [];
  private readonly lock = new CriticalSection('relationships');

  get size(): number {
    return this.lock.run(() => this.edges.length);
  }

  snapshot(): readonly KnownRelationship[] {
    return this.lock.run(() => Object.freeze([...this.edges]));
  }

  add(edge: KnownRelationship): void {
    this.lock.run(() => this.addUnlocked(edge));
  }

  replace(edges: Iterable<KnownRelationship>): void {
    this.lock.run(() => {
      this.edges.length = 0;
      for (const edge of edges) this.addUnlocked(edge);
    });
  }

  private addUnlocked(edge: KnownRelationship): void {
    if (!this.edges.some((existing) => sameRelationship(existing, edge))) {
      this.edges.push(edge);
    }
  }
}
