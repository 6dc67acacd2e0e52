import { describe, expect, it } from 'vitest';

import {
  ActivationError,
  AmbiguousConstructorError,
  CircularDependencyError,
  ContainerConfigError,
  ContainerLockedError,
  FactoryCompilationError,
  InitializerFailedError,
  InterceptionFailedError,
  InvalidRegistrationError,
  InvalidTokenError,
  MissingRegistrationError,
  NoPublicConstructorError,
  NoResolvableConstructorError,
  NullInstanceError,
  ParameterPolicyReturnedNothingError,
  RegistrationCollisionError,
  UnresolvableParameterError,
} from '../src/errors/errors.js';

describe('error classes', () => {
  it('keeps plan failures under ActivationError with contextual fields', () => {
    const activation = [
      new NoPublicConstructorError('Mailer'),
      new NoResolvableConstructorError('Mailer', ['Mailer(Config)']),
      new AmbiguousConstructorError('Mailer', ['Mailer()', 'Mailer(Config)']),
      new UnresolvableParameterError('Mailer#0: Config', 'no registration', 'Mailer'),
      new ParameterPolicyReturnedNothingError('CustomPolicy', 'Mailer#0: Config'),
      new NullInstanceError('Clock'),
      new InitializerFailedError('Mailer', new Error('boom')),
      new InterceptionFailedError('Mailer', 'listener threw'),
      new FactoryCompilationError('Mailer', 'new Mailer(<Mailer#0: Config>)', new Error('bad')),
      new MissingRegistrationError('Clock', ['Mailer']),
      new CircularDependencyError(['A', 'B', 'A']),
    ];

    for (const error of activation) {
      expect(error).toBeInstanceOf(ActivationError);
      expect(error).toBeInstanceOf(Error);
    }

    expect(activation.map((e) => e.name)).toEqual([
      'NoPublicConstructorError',
      'NoResolvableConstructorError',
      'AmbiguousConstructorError',
      'UnresolvableParameterError',
      'ParameterPolicyReturnedNothingError',
      'NullInstanceError',
      'InitializerFailedError',
      'InterceptionFailedError',
      'FactoryCompilationError',
      'MissingRegistrationError',
      'CircularDependencyError',
    ]);
  });

  it('records the implementation and cause', () => {
    const cause = new Error('boom');
    const initializer = new InitializerFailedError('Mailer', cause);
    expect(initializer.implementation).toBe('Mailer');
    expect(initializer.cause).toBe(cause);

    const plain = new ActivationError('plain');
    expect(plain.implementation).toBeUndefined();
    expect(plain.cause).toBeUndefined();
    expect(plain.name).toBe('ActivationError');
  });

  it('renders the null delegate message', () => {
    const error = new NullInstanceError('Clock');
    expect(error.message.split('\n')[0]).toBe(
      'The registered delegate for type Clock returned null.'
    );
    expect(error.implementation).toBe('Clock');
  });

  it('lists candidate constructors and registered services', () => {
    const unresolvable = new NoResolvableConstructorError('Mailer', ['Mailer(Config, Clock)']);
    expect(unresolvable.signatures).toEqual(['Mailer(Config, Clock)']);
    expect(unresolvable.message).toContain('  - Mailer(Config, Clock)');

    const missing = new MissingRegistrationError('Clock', ['Mailer', 'Config']);
    expect(missing.token).toBe('Clock');
    expect(missing.availableServices).toEqual(['Mailer', 'Config']);
    expect(missing.message).toContain('  - Config');

    const many = new MissingRegistrationError('Clock', new Array<string>(11).fill('X'));
    expect(many.message).toContain('11 services are registered.');
  });

  it('renders the plan of a failed compilation', () => {
    const error = new FactoryCompilationError('Mailer', 'new Mailer()', new TypeError('nope'));
    expect(error.node).toBe('new Mailer()');
    expect(error.message).toContain('  new Mailer()');
    expect(error.message).toContain('nope');
  });

  it('joins the cycle chain', () => {
    const circular = new CircularDependencyError(['A', 'B', 'A']);
    expect(circular.cycle).toEqual(['A', 'B', 'A']);
    expect(circular.message).toContain('A → B → A');
  });

  it('keeps container bookkeeping errors outside ActivationError', () => {
    const collision = new RegistrationCollisionError('Clock', 'App');
    expect(collision.containerName).toBe('App');
    expect(collision).not.toBeInstanceOf(ActivationError);

    const locked = new ContainerLockedError('App');
    expect(locked.message).toContain("Container 'App' is locked.");

    const config = new ContainerConfigError('bad');
    expect(config.reason).toBe('bad');

    const invalidToken = new InvalidTokenError({ bad: true });
    expect(invalidToken.token).toEqual({ bad: true });
    expect(invalidToken.message).toContain('{"bad":true}');

    const invalidRegistration = new InvalidRegistrationError('Clock', 'creator must be a function.');
    expect(invalidRegistration.message).toContain('Cannot register Clock: creator must be a function.');
  });
});
