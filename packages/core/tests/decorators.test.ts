import { describe, expect, it } from 'vitest';

import { token } from '../src/core/token.js';
import { Inject, Overload } from '../src/decorators/index.js';
import { ConstructorRegistry, describeConstructor } from '../src/registry/constructor-registry.js';

const ConfigT = token('Config');
const TransportT = token('Transport');
const ClockT = token('Clock');

describe('Decorators', () => {
  it('@Inject records the token of each primary parameter', () => {
    class Mailer {
      constructor(
        @Inject(ConfigT) _config: unknown,
        @Inject(TransportT) _transport: unknown
      ) {}
    }

    const [ctor] = ConstructorRegistry.getConstructors(Mailer);
    expect(ctor?.parameters.map((p) => p.token)).toEqual([ConfigT, TransportT]);
    expect(ctor?.parameters.every((p) => p.declaringType === Mailer)).toBe(true);
  });

  it('@Overload adds signatures after the primary one, in source order', () => {
    @Overload()
    @Overload(ConfigT)
    class Mailer {
      constructor(
        @Inject(ConfigT) _config?: unknown,
        @Inject(TransportT) _transport?: unknown,
        @Inject(ClockT) _clock?: unknown
      ) {}
    }

    expect(ConstructorRegistry.getConstructors(Mailer).map(describeConstructor)).toEqual([
      'Mailer(Config, Transport, Clock)',
      'Mailer()',
      'Mailer(Config)',
    ]);
  });

  it('rejects values that are not tokens', () => {
    class Target {}

    expect(() => Inject('not-a-token' as never)(Target, undefined, 0)).toThrowError(
      '@Inject expects a Token'
    );
    expect(() => Overload(ConfigT, 'nope' as never)).toThrowError(
      '@Overload expects Tokens; argument 1 is not a Token.'
    );
  });
});
