/*
 * Container: composition root around the plan builder.
 *
 * Holds the registrations, the resolution policies, the initializers and the
 * expression-building listeners, and hands them to registrations through the
 * RegistrationHost interface. The container is open for registrations until
 * the first resolve() or verify(); after that it is locked, and resolution
 * policies may switch from permissive to strict behavior.
 */
import {
  ActivationError,
  CircularDependencyError,
  ContainerConfigError,
  ContainerLockedError,
  InterceptionFailedError,
  InvalidRegistrationError,
  InvalidTokenError,
  MissingRegistrationError,
} from '../errors/errors.js';
import { RegisteredParameterPolicy } from '../policies/registered-parameter.js';
import { SingleConstructorPolicy } from '../policies/single-constructor.js';
import type {
  ConstructorResolutionPolicy,
  ConstructorResolutionPolicyFactory,
  ParameterResolutionPolicy,
  ParameterResolutionPolicyFactory,
  PolicyContext,
} from '../policies/types.js';
import {
  describeIdentity,
  type Constructor,
  type Identity,
  type Initializer,
  type InstanceCreator,
  type InstantiateHook,
} from '../types/types.js';
import { FactoryCompiler } from './compiler.js';
import { Lifestyle, type InstanceSource } from './lifestyle.js';
import { describeNode, isConstructionNode, type ConstructionNode } from './node.js';
import type { ParameterOverride } from './overrides.js';
import type { Registration, RegistrationHost } from './registration.js';
import { RegistrationStore } from './registration-store.js';
import { isToken, type Token } from './token.js';

export interface ContainerOptions {
  /** Name used in diagnostics. @default 'Container' */
  name?: string;

  /**
   * Constructor selection policy.
   * @default SingleConstructorPolicy
   */
  constructorResolution?: ConstructorResolutionPolicyFactory;

  /**
   * Parameter resolution policy.
   * @default RegisteredParameterPolicy
   */
  parameterResolution?: ParameterResolutionPolicyFactory;

  /**
   * Lifestyle used when register() and registerFactory() get none.
   * @default Lifestyle.Transient
   */
  defaultLifestyle?: Lifestyle;

  /**
   * Optional hook invoked after an instance is created.
   *
   * Receives the implementation label and the creation duration in
   * nanoseconds. Useful for profiling or custom telemetry.
   */
  onInstantiate?: InstantiateHook;
}

export interface RegisterOptions {
  /** Replacement nodes for constructor parameters */
  overrides?: Iterable<ParameterOverride>;
}

/**
 * Arguments offered to expression-building listeners.
 */
export interface ExpressionBuildingEvent {
  readonly registration: Registration;
  readonly serviceType: Identity;
  readonly implementationType: Identity;
  /** Plan built so far; overridden parameters appear as placeholders */
  readonly node: ConstructionNode;
}

/**
 * Rewrites a plan before it is finalized. Return `event.node` to keep it.
 */
export type ExpressionBuildingListener = (event: ExpressionBuildingEvent) => ConstructionNode;

interface InitializerEntry {
  readonly target: Identity;
  // Method syntax: entries hold initializers typed for their own target
  callback(instance: unknown): void;
}

type ResolvedOptions = Readonly<{
  name: string;
  constructorResolution: ConstructorResolutionPolicyFactory;
  parameterResolution: ParameterResolutionPolicyFactory;
  defaultLifestyle: Lifestyle;
  onInstantiate?: InstantiateHook;
}>;

export class Container implements RegistrationHost, PolicyContext {
  readonly compiler: FactoryCompiler;
  readonly constructorResolution: ConstructorResolutionPolicy;
  readonly parameterResolution: ParameterResolutionPolicy;

  private readonly options: ResolvedOptions;
  private readonly store = new RegistrationStore();
  private readonly initializers: InitializerEntry[] = [];
  private readonly listeners: ExpressionBuildingListener[] = [];

  // Registrations whose instances are being created, outermost first
  private readonly activationStack: Registration[] = [];
  private locked = false;

  constructor(options?: ContainerOptions) {
    this.options = this._validateAndFreezeOptions(options);
    this.compiler = new FactoryCompiler(this.options.onInstantiate);
    // Parameter policy first: the constructor policy may probe it
    this.parameterResolution = this.options.parameterResolution(this);
    this.constructorResolution = this.options.constructorResolution(this);
  }

  getName(): string {
    return this.options.name;
  }

  isLocked(): boolean {
    return this.locked;
  }

  // ----- registration -----

  /**
   * Register a class that the container creates through one of its
   * constructors.
   */
  register<T>(
    service: Token<T>,
    implementation: Constructor<T>,
    lifestyle: Lifestyle = this.options.defaultLifestyle,
    options?: RegisterOptions
  ): Registration {
    if (typeof implementation !== 'function' || typeof implementation.prototype !== 'object') {
      throw new InvalidRegistrationError(
        describeServiceArg(service),
        'implementation must be a class constructor.'
      );
    }
    return this._add(service, { kind: 'constructor', implementation }, lifestyle, options?.overrides);
  }

  /**
   * Register a delegate that creates instances of the service.
   */
  registerFactory<T>(
    service: Token<T>,
    creator: InstanceCreator<T>,
    lifestyle: Lifestyle = this.options.defaultLifestyle
  ): Registration {
    if (typeof creator !== 'function') {
      throw new InvalidRegistrationError(describeServiceArg(service), 'creator must be a function.');
    }
    return this._add(service, { kind: 'delegate', creator }, lifestyle);
  }

  /**
   * Register a ready-made instance as a singleton.
   */
  registerInstance<T>(service: Token<T>, instance: T): Registration {
    if (instance === null || instance === undefined) {
      throw new InvalidRegistrationError(describeServiceArg(service), 'instance must not be null.');
    }
    return this._add(service, { kind: 'delegate', creator: () => instance }, Lifestyle.Singleton);
  }

  /**
   * Register a callback that runs on every new instance of `target`.
   *
   * A class target also applies to its subclasses. Several initializers for
   * one instance run in registration order.
   */
  registerInitializer<T>(target: Token<T> | Constructor<T>, callback: Initializer<T>): void {
    this._assertNotLocked();
    if (!isToken(target) && typeof target !== 'function') throw new InvalidTokenError(target);
    this.initializers.push({ target, callback });
  }

  /**
   * Subscribe to expression building. Listeners run in subscription order,
   * once per plan build, each receiving the node returned by the previous one.
   *
   * @returns Function that removes the listener
   */
  addExpressionBuildingListener(listener: ExpressionBuildingListener): () => void {
    this._assertNotLocked();
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  // ----- lookup -----

  getRegistration(token: Token): Registration | undefined {
    return this.store.get(token);
  }

  getRegistrationEvenIfInvalid(token: Token): Registration | undefined {
    return this.store.get(token);
  }

  getRegistrations(): Registration[] {
    return this.store.values();
  }

  /**
   * Combined initializer for an implementation, or undefined when none
   * applies.
   */
  getInitializer(implementation: Identity): Initializer | undefined {
    const applicable = this.initializers.filter((entry) => appliesTo(entry.target, implementation));
    if (applicable.length === 0) return undefined;
    if (applicable.length === 1) return (instance) => applicable[0]?.callback(instance);
    return (instance) => {
      for (const entry of applicable) entry.callback(instance);
    };
  }

  // ----- resolution -----

  resolve<T>(service: Token<T>): T {
    if (!isToken(service)) throw new InvalidTokenError(service);
    this.locked = true;

    const registration = this.store.get(service);
    if (!registration) {
      throw new MissingRegistrationError(
        service.label,
        this.store.values().map((r) => r.serviceType.label)
      );
    }
    return registration.getInstance() as T;
  }

  /**
   * Build and compile every registration, surfacing configuration errors
   * before the first resolve. Locks the container.
   */
  verify(): void {
    this.locked = true;
    for (const registration of this.store.values()) {
      registration.getFactory();
    }
  }

  // ----- RegistrationHost -----

  onExpressionBuilding(
    registration: Registration,
    service: Identity,
    implementation: Identity,
    node: ConstructionNode
  ): ConstructionNode {
    let current = node;
    for (const listener of [...this.listeners]) {
      let next: unknown;
      try {
        next = listener({
          registration,
          serviceType: service,
          implementationType: implementation,
          node: current,
        });
      } catch (e) {
        if (e instanceof ActivationError) throw e;
        throw new InterceptionFailedError(
          describeIdentity(implementation),
          'An expression-building listener threw. See `cause` for details.',
          e
        );
      }
      if (!isConstructionNode(next)) {
        throw new InterceptionFailedError(
          describeIdentity(implementation),
          `An expression-building listener returned ${String(next)} instead of a construction node (received ${describeNode(current)}).`
        );
      }
      current = next;
    }
    return current;
  }

  activate<T>(registration: Registration, create: () => T): T {
    if (this.activationStack.includes(registration)) {
      const chain = [...this.activationStack, registration].map((r) =>
        describeIdentity(r.serviceType)
      );
      throw new CircularDependencyError(chain);
    }
    this.activationStack.push(registration);
    try {
      return create();
    } finally {
      this.activationStack.pop();
    }
  }

  // ----- internals -----

  private _add(
    service: Token,
    source: InstanceSource,
    lifestyle: Lifestyle,
    overrides?: Iterable<ParameterOverride>
  ): Registration {
    this._assertNotLocked();
    if (!isToken(service)) throw new InvalidTokenError(service);
    if (!(lifestyle instanceof Lifestyle)) {
      throw new InvalidRegistrationError(service.label, 'lifestyle must be a Lifestyle.');
    }
    const registration = lifestyle.createRegistration(service, source, this, overrides);
    this.store.add(registration, this.options.name);
    return registration;
  }

  private _assertNotLocked(): void {
    if (this.locked) throw new ContainerLockedError(this.options.name);
  }

  /**
   * Validate options and return a frozen, fully defaulted copy.
   */
  private _validateAndFreezeOptions(options?: ContainerOptions): ResolvedOptions {
    if (options !== undefined && (typeof options !== 'object' || options === null)) {
      throw new ContainerConfigError('options must be an object.');
    }
    const { name, constructorResolution, parameterResolution, defaultLifestyle, onInstantiate } =
      options ?? {};

    if (name !== undefined && (typeof name !== 'string' || name.length === 0)) {
      throw new ContainerConfigError(`'name' must be a non-empty string.`);
    }
    for (const [key, value] of Object.entries({
      constructorResolution,
      parameterResolution,
      onInstantiate,
    })) {
      if (value !== undefined && typeof value !== 'function') {
        throw new ContainerConfigError(`'${key}' must be a function, got ${typeof value}.`);
      }
    }
    if (defaultLifestyle !== undefined && !(defaultLifestyle instanceof Lifestyle)) {
      throw new ContainerConfigError(`'defaultLifestyle' must be a Lifestyle.`);
    }

    return Object.freeze({
      name: name ?? 'Container',
      constructorResolution: constructorResolution ?? (() => new SingleConstructorPolicy()),
      parameterResolution:
        parameterResolution ?? ((ctx: PolicyContext) => new RegisteredParameterPolicy(ctx)),
      defaultLifestyle: defaultLifestyle ?? Lifestyle.Transient,
      onInstantiate,
    });
  }
}

function appliesTo(target: Identity, implementation: Identity): boolean {
  if (target === implementation) return true;
  return (
    typeof target === 'function' &&
    typeof implementation === 'function' &&
    implementation.prototype instanceof target
  );
}

function describeServiceArg(service: unknown): string {
  return isToken(service) ? service.label : String(service);
}
