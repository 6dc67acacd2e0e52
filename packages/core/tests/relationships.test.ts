import { describe, expect, it } from 'vitest';

import { Container } from '../src/core/container.js';
import { CriticalSection } from '../src/core/critical-section.js';
import { Lifestyle } from '../src/core/lifestyle.js';
import { createRelationship, RelationshipSet } from '../src/core/relationships.js';
import { token } from '../src/core/token.js';

class Consumer {}
class OtherConsumer {}

function registrations() {
  const container = new Container();
  const clock = container.registerFactory(token('Clock'), () => ({}));
  const config = container.registerFactory(token('Config'), () => ({}), Lifestyle.Singleton);
  return { clock, config };
}

describe('RelationshipSet', () => {
  it('drops duplicates that match on all three identities', () => {
    const { clock } = registrations();
    const set = new RelationshipSet();

    set.add(createRelationship(Consumer, Lifestyle.Transient, clock));
    set.add(createRelationship(Consumer, Lifestyle.Transient, clock));
    set.add(createRelationship(Consumer, Lifestyle.Singleton, clock));
    set.add(createRelationship(OtherConsumer, Lifestyle.Transient, clock));

    expect(set.size).toBe(3);
  });

  it('replaces the whole set', () => {
    const { clock, config } = registrations();
    const set = new RelationshipSet();
    set.add(createRelationship(Consumer, Lifestyle.Transient, clock));

    set.replace([
      createRelationship(Consumer, Lifestyle.Transient, config),
      createRelationship(Consumer, Lifestyle.Transient, config),
    ]);

    const snapshot = set.snapshot();
    expect(snapshot).toHaveLength(1);
    expect(snapshot[0]?.dependency).toBe(config);
  });

  it('returns frozen snapshots detached from later writes', () => {
    const { clock, config } = registrations();
    const set = new RelationshipSet();
    set.add(createRelationship(Consumer, Lifestyle.Transient, clock));

    const before = set.snapshot();
    set.add(createRelationship(Consumer, Lifestyle.Transient, config));

    expect(Object.isFrozen(before)).toBe(true);
    expect(before).toHaveLength(1);
    expect(set.snapshot()).toHaveLength(2);
  });

  it('never shows a reader a partially replaced set', async () => {
    const { clock, config } = registrations();
    const set = new RelationshipSet();
    const small = [createRelationship(Consumer, Lifestyle.Transient, clock)];
    const large = [
      createRelationship(Consumer, Lifestyle.Transient, clock),
      createRelationship(Consumer, Lifestyle.Transient, config),
      createRelationship(OtherConsumer, Lifestyle.Transient, config),
    ];
    set.replace(small);

    const observed = new Set<number>();
    const writer = async () => {
      for (let i = 0; i < 200; i++) {
        set.replace(i % 2 === 0 ? large : small);
        await Promise.resolve();
      }
    };
    const reader = async () => {
      for (let i = 0; i < 200; i++) {
        observed.add(set.snapshot().length);
        await Promise.resolve();
      }
    };

    await Promise.all([writer(), reader(), writer(), reader()]);

    for (const length of observed) expect([1, 3]).toContain(length);
  });
});

describe('CriticalSection', () => {
  it('returns the body result and releases afterwards', () => {
    const section = new CriticalSection('test');
    expect(section.run(() => 7)).toBe(7);
    expect(section.isHeld).toBe(false);
  });

  it('rejects re-entry from inside the section', () => {
    const section = new CriticalSection('edges');
    expect(() => section.run(() => section.run(() => 1))).toThrow(
      "Re-entrant access to 'edges' is not allowed."
    );
    expect(section.isHeld).toBe(false);
  });

  it('releases when the body throws', () => {
    const section = new CriticalSection('test');
    expect(() =>
      section.run(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(section.run(() => 'again')).toBe('again');
  });
});
