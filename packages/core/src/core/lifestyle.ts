import type { Constructor, Identity, InstanceCreator } from '../types/types.js';
import { Plan, type ConstructionNode } from './node.js';
import type { ParameterOverride } from './overrides.js';
import { Registration, type RegistrationHost } from './registration.js';
import type { Token } from './token.js';

/**
 * What a registration builds from: a class constructor or a user delegate.
 */
export type InstanceSource =
  | { readonly kind: 'constructor'; readonly implementation: Constructor }
  | { readonly kind: 'delegate'; readonly creator: InstanceCreator };

/**
 * Caching policy wrapped around a compiled construction plan.
 *
 * A lifestyle decides when an instance is reused; the plan itself is built by
 * the Registration it creates. `length` orders lifestyles by how long their
 * instances live and is what lifestyle-mismatch diagnostics compare.
 */
export abstract class Lifestyle {
  /** A new instance for every request */
  static get Transient(): Lifestyle {
    return TRANSIENT;
  }

  /** One instance per container */
  static get Singleton(): Lifestyle {
    return SINGLETON;
  }

  constructor(
    readonly name: string,
    readonly length: number
  ) {}

  /**
   * Create the registration for a service.
   *
   * Overrides are installed before the registration is returned, so the first
   * build already sees them.
   */
  createRegistration(
    service: Token,
    source: InstanceSource,
    host: RegistrationHost,
    overrides?: Iterable<ParameterOverride>
  ): Registration {
    const registration = this.createRegistrationCore(service, source, host);
    if (overrides) registration.setParameterOverrides(overrides);
    return registration;
  }

  protected abstract createRegistrationCore(
    service: Token,
    source: InstanceSource,
    host: RegistrationHost
  ): Registration;

  toString(): string {
    return this.name;
  }
}

/**
 * Registration that follows one InstanceSource; subclasses add caching.
 */
abstract class SourceRegistration extends Registration {
  readonly implementationType: Identity;

  constructor(
    lifestyle: Lifestyle,
    host: RegistrationHost,
    readonly serviceType: Token,
    private readonly source: InstanceSource
  ) {
    super(lifestyle, host);
    this.implementationType = source.kind === 'constructor' ? source.implementation : serviceType;
  }

  protected buildTransientNode(): ConstructionNode {
    return this.source.kind === 'constructor'
      ? this.buildTransientNodeFromConstructor(this.serviceType, this.source.implementation)
      : this.buildTransientNodeFromDelegate(this.serviceType, this.source.creator);
  }
}

class TransientRegistration extends SourceRegistration {
  buildExpression(): ConstructionNode {
    return this.buildTransientNode();
  }
}

class SingletonRegistration extends SourceRegistration {
  protected override readonly instrumented = false;
  private instance?: { value: unknown };

  /**
   * Compiles the transient plan right away and returns a node that creates
   * the instance on first invocation and reuses it afterwards.
   *
   * The instance belongs to the registration, so rebuilding the plan keeps
   * handing out the instance that already exists.
   */
  buildExpression(): ConstructionNode {
    const create = this.host.compiler.compile(this.buildTransientNode(), this.implementationType);

    return Plan.invoke(() => {
      if (!this.instance) this.instance = { value: create() };
      return this.instance.value;
    }, `singleton ${this.describe()}`);
  }

  /** New overrides start a new instance on the next resolve. */
  override setParameterOverrides(overrides: Iterable<ParameterOverride>): void {
    super.setParameterOverrides(overrides);
    this.instance = undefined;
  }
}

class TransientLifestyle extends Lifestyle {
  constructor() {
    super('Transient', 1);
  }

  protected createRegistrationCore(service: Token, source: InstanceSource, host: RegistrationHost): Registration {
    return new TransientRegistration(this, host, service, source);
  }
}

class SingletonLifestyle extends Lifestyle {
  constructor() {
    super('Singleton', 1000);
  }

  protected createRegistrationCore(service: Token, source: InstanceSource, host: RegistrationHost): Registration {
    return new SingletonRegistration(this, host, service, source);
  }
}

const TRANSIENT: Lifestyle = new TransientLifestyle();
const SINGLETON: Lifestyle = new SingletonLifestyle();
