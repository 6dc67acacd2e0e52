import type { Token } from '../core/token.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Identity of a service or of the thing that implements it.
 *
 * Services are always identified by a token. Implementations are classes,
 * except for delegate-based registrations, which use the service token as
 * their implementation identity.
 */
export type Identity = Token | Constructor;

/** Token accepted by the container during registration and resolution. */
export type InjectionToken<T = unknown> = Token<T>;

/** Zero-argument delegate supplied by the user to create instances. */
export type InstanceCreator<T = unknown> = () => T;

/** Post-construction callback applied to freshly built instances. */
export type Initializer<T = unknown> = (instance: T) => void;

/**
 * Instrumentation hook invoked after every instance creation.
 *
 * Receives the implementation label and the creation duration in nanoseconds.
 */
export type InstantiateHook = (implementation: string, durationNs: number) => void;

/**
 * Render an identity for diagnostics: token label or class name.
 */
export function describeIdentity(identity: Identity): string {
  if (typeof identity === 'function') return identity.name || 'anonymous class';
  return identity.label;
}

/**
 * One formal parameter of a constructor signature.
 *
 * Descriptors are created once per signature and compared by identity; the
 * same parameter of a redeclared class is a different descriptor.
 */
export interface ParameterDescriptor {
  /** Class declaring the constructor */
  readonly declaringType: Constructor;
  /** Zero-based position in the signature */
  readonly position: number;
  /**
   * Token of the service the parameter asks for.
   *
   * Undefined when the parameter was never decorated with `@Inject()`.
   */
  readonly token?: Token;
}

/**
 * One public constructor signature of an implementation type.
 *
 * A class has a single runtime constructor; each TypeScript overload signature
 * declared through `@Overload()` or `ConstructorRegistry.define()` is a
 * separate descriptor, invoked with as many arguments as it has parameters.
 */
export interface ConstructorDescriptor {
  readonly implementation: Constructor;
  readonly parameters: readonly ParameterDescriptor[];
}
