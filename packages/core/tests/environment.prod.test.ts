import { afterEach, describe, expect, it, vi } from 'vitest';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    vi.resetModules();
  });

  it('uses one-line error messages', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const {
      NullInstanceError,
      MissingRegistrationError,
      ContainerLockedError,
      UnresolvableParameterError,
      FactoryCompilationError,
    } = await import('../src/errors/errors.js');

    expect(new NullInstanceError('Clock').message).toBe(
      'The registered delegate for type Clock returned null.'
    );
    expect(new MissingRegistrationError('Clock', ['Mailer']).message).toBe(
      'No registration for type Clock could be found.'
    );
    expect(new ContainerLockedError('App').message).toBe("Container 'App' is locked.");
    expect(new UnresolvableParameterError('Mailer#0: Clock', 'not registered').message).toBe(
      'Parameter Mailer#0: Clock cannot be resolved: not registered'
    );
    expect(new FactoryCompilationError('Mailer', 'new Mailer()', new Error('bad')).message).toBe(
      'Cannot build a factory for Mailer: bad'
    );
  });

  it('resolves through the container in production mode', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { Container } = await import('../src/core/container.js');
    const { token } = await import('../src/core/token.js');

    const ClockT = token<{ now(): number }>('Clock');
    const container = new Container({ name: 'Prod' });
    container.registerFactory(ClockT, () => null as unknown as { now(): number });

    expect(() => container.resolve(ClockT)).toThrow(
      'The registered delegate for type Clock returned null.'
    );
  });
});
