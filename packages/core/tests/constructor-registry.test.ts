import { afterEach, describe, expect, it } from 'vitest';

import { token } from '../src/core/token.js';
import { Inject } from '../src/decorators/inject.js';
import {
  ConstructorRegistry,
  describeConstructor,
  describeParameter,
} from '../src/registry/constructor-registry.js';

const ConfigT = token('Config');
const TransportT = token('Transport');

describe('ConstructorRegistry', () => {
  afterEach(() => {
    ConstructorRegistry.useNamespace(undefined);
  });

  it('gives a class without metadata one implicit signature of ctor.length parameters', () => {
    class Plain {
      constructor(_a: unknown, _b: unknown) {}
    }

    const [ctor, ...rest] = ConstructorRegistry.getConstructors(Plain);
    expect(rest).toHaveLength(0);
    expect(ctor?.implementation).toBe(Plain);
    expect(ctor?.parameters.map((p) => p.position)).toEqual([0, 1]);
    expect(ctor?.parameters.every((p) => p.token === undefined)).toBe(true);
  });

  it('returns the same descriptors on every lookup', () => {
    class Mailer {
      constructor(@Inject(ConfigT) _config: unknown) {}
    }

    const first = ConstructorRegistry.getConstructors(Mailer);
    const second = ConstructorRegistry.getConstructors(Mailer);
    expect(second).toBe(first);
    expect(ConstructorRegistry.parameterOf(Mailer, 0)).toBe(first[0]?.parameters[0]);
  });

  it('define() replaces decorator metadata and keeps declaration order', () => {
    class Mailer {
      constructor(@Inject(ConfigT) _config?: unknown) {}
    }

    ConstructorRegistry.define(Mailer, [[], [ConfigT, TransportT], [ConfigT]]);

    expect(ConstructorRegistry.getConstructors(Mailer).map(describeConstructor)).toEqual([
      'Mailer()',
      'Mailer(Config, Transport)',
      'Mailer(Config)',
    ]);
  });

  it('define() with no signatures declares a class without public constructors', () => {
    class Hidden {}
    ConstructorRegistry.define(Hidden, []);
    expect(ConstructorRegistry.getConstructors(Hidden)).toEqual([]);
  });

  it('parameterOf() rejects positions that do not exist', () => {
    class Single {
      constructor(@Inject(ConfigT) _config: unknown) {}
    }

    expect(() => ConstructorRegistry.parameterOf(Single, 1)).toThrow(
      'Single(Config) has no parameter at position 1.'
    );
    expect(() => ConstructorRegistry.parameterOf(Single, 0, 2)).toThrow(
      'Single has no constructor at index 2.'
    );
  });

  it('renders parameters with ? for undecorated positions', () => {
    class Mixed {
      constructor(_first: unknown, @Inject(TransportT) _second: unknown) {}
    }

    const [first, second] = ConstructorRegistry.getConstructors(Mixed)[0]?.parameters ?? [];
    expect(first && describeParameter(first)).toBe('Mixed#0: ?');
    expect(second && describeParameter(second)).toBe('Mixed#1: Transport');
  });

  it('isolates metadata per namespace', () => {
    class Isolated {
      constructor(_a: unknown) {}
    }

    ConstructorRegistry.useNamespace('registry-test');
    ConstructorRegistry.define(Isolated, [[ConfigT], [ConfigT, TransportT]]);
    expect(ConstructorRegistry.getConstructors(Isolated)).toHaveLength(2);

    ConstructorRegistry.useNamespace(undefined);
    expect(ConstructorRegistry.getConstructors(Isolated).map(describeConstructor)).toEqual([
      'Isolated(?)',
    ]);

    ConstructorRegistry.reset('registry-test');
    ConstructorRegistry.useNamespace('registry-test');
    expect(ConstructorRegistry.getConstructors(Isolated).map(describeConstructor)).toEqual([
      'Isolated(?)',
    ]);
  });
});
