import { describe, expect, it } from 'vitest';

import * as api from '../src/index.js';

describe('public API', () => {
  it('wires a small graph through the package entry point', () => {
    const { Container, Inject, Lifestyle, Plan, ConstructorRegistry, token } = api;

    class Transport {
      readonly kind = 'smtp';
    }
    const TransportT = token<Transport>('Transport');
    const RetriesT = token<number>('Retries');

    class Mailer {
      constructor(
        @Inject(TransportT) readonly transport: Transport,
        @Inject(RetriesT) readonly retries: number
      ) {}
    }
    const MailerT = token<Mailer>('Mailer');

    const container = new Container({ name: 'Mail' });
    container.register(TransportT, Transport, Lifestyle.Singleton);
    container.register(MailerT, Mailer, Lifestyle.Transient, {
      overrides: [[ConstructorRegistry.parameterOf(Mailer, 1), Plan.constant(3)]],
    });

    const a = container.resolve(MailerT);
    const b = container.resolve(MailerT);

    expect(a).not.toBe(b);
    expect(a.transport).toBe(b.transport);
    expect(a.retries).toBe(3);
  });

  it('exports the error hierarchy', () => {
    expect(new api.NullInstanceError('X')).toBeInstanceOf(api.ActivationError);
    expect(typeof api.analyzeLifestyleMismatches).toBe('function');
    expect(typeof api.replaceSubNode).toBe('function');
  });
});
