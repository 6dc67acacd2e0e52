import type { Token } from '../core/token.js';
import type { Constructor, ConstructorDescriptor, ParameterDescriptor } from '../types/types.js';

/** Parameter tokens of one signature, in order; undefined marks an undecorated parameter. */
export type Signature = readonly (Token | undefined)[];

/**
 * Mutable record storing decorator metadata for a single class.
 *
 * Fields:
 * - links: Parameter index → Token mapping from @Inject()
 * - overloads: Extra signatures from @Overload(), in source order
 * - defined: Complete signature list from define(); wins over decorators
 * - cached: Descriptors built on first lookup, dropped on every change
 */
type MutableConstructorRecord = {
  links: Map<number, Token>;
  overloads: Signature[];
  defined?: readonly Signature[];
  cached?: readonly ConstructorDescriptor[];
};

/**
 * A bag of constructor metadata, optionally isolated by namespace.
 *
 * Fields:
 * - records: WeakMap so unused classes can be collected
 * - implicit: Descriptors for classes without any metadata
 */
type GlobalBag = {
  records: WeakMap<Constructor, MutableConstructorRecord>;
  implicit: WeakMap<Constructor, readonly ConstructorDescriptor[]>;
};

type RegistryStore = {
  defaultBag: GlobalBag;
  namespaces: Map<string, GlobalBag>;
  active?: string;
};

/**
 * Global symbol for storing the registry on globalThis.
 *
 * This keeps a single registry per process, even if the module is bundled
 * multiple times.
 */
const GLOBAL_SYMBOL = Symbol.for('plansmith.constructorRegistry');

function createBag(): GlobalBag {
  return { records: new WeakMap(), implicit: new WeakMap() };
}

function isRegistryStore(value: unknown): value is RegistryStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.prototype.hasOwnProperty.call(value, 'defaultBag') &&
    (value as RegistryStore).namespaces instanceof Map
  );
}

function ensureStore(): RegistryStore {
  const g = globalThis as { [key: symbol]: unknown };
  const existing = g[GLOBAL_SYMBOL];
  if (isRegistryStore(existing)) return existing;
  const fresh: RegistryStore = { defaultBag: createBag(), namespaces: new Map() };
  g[GLOBAL_SYMBOL] = fresh;
  return fresh;
}

function resolveBag(namespace?: string): GlobalBag {
  const store = ensureStore();
  const name = namespace ?? store.active;
  if (!name) return store.defaultBag;
  let bag = store.namespaces.get(name);
  if (!bag) {
    bag = createBag();
    store.namespaces.set(name, bag);
  }
  return bag;
}

/**
 * Render a parameter for diagnostics, e.g. `Mailer#1: Transport`.
 */
export function describeParameter(parameter: ParameterDescriptor): string {
  const name = parameter.declaringType.name || 'anonymous class';
  return `${name}#${parameter.position}: ${parameter.token?.label ?? '?'}`;
}

/**
 * Render a constructor signature for diagnostics, e.g. `Mailer(Config, Transport)`.
 */
export function describeConstructor(ctor: ConstructorDescriptor): string {
  const name = ctor.implementation.name || 'anonymous class';
  return `${name}(${ctor.parameters.map((p) => p.token?.label ?? '?').join(', ')})`;
}

/**
 * Global registry of public constructor signatures.
 *
 * Stores the metadata collected by the @Inject() and @Overload() decorators,
 * or supplied directly through define(), and turns it into frozen
 * ConstructorDescriptors on demand. Descriptors are cached, so repeated
 * lookups return the same ParameterDescriptor objects; parameter overrides
 * rely on that identity.
 *
 * Namespace support:
 * - Default bag: used by production code (no namespace)
 * - Namespaced bags: used for test isolation
 */
export class ConstructorRegistry {
  /**
   * Record the token of one parameter of the primary signature.
   *
   * Called by the @Inject() decorator at class definition time.
   */
  static registerParameter(target: Constructor, parameterIndex: number, token: Token): void {
    const rec = this.record(target);
    rec.links.set(parameterIndex, token);
    rec.cached = undefined;
  }

  /**
   * Record an additional public signature.
   *
   * Class decorators are evaluated bottom-up, so each overload is put in front
   * of the ones recorded before it; the stored order is the source order.
   */
  static registerOverload(target: Constructor, signature: Signature): void {
    const rec = this.record(target);
    rec.overloads.unshift(Object.freeze([...signature]));
    rec.cached = undefined;
  }

  /**
   * Declare the complete, ordered list of public signatures of a class.
   *
   * Replaces anything the decorators recorded. An empty list declares a class
   * without a public constructor.
   *
   * @example
   * ```typescript
   * ConstructorRegistry.define(Mailer, [[ConfigT], [ConfigT, TransportT, ClockT]]);
   * ```
   */
  static define(target: Constructor, signatures: readonly Signature[]): void {
    const rec = this.record(target);
    rec.defined = Object.freeze(signatures.map((s) => Object.freeze([...s])));
    rec.cached = undefined;
  }

  /**
   * Public constructors of a class, in declaration order.
   *
   * The primary signature (from @Inject()) comes first, followed by the
   * @Overload() signatures. A class without metadata has one implicit
   * signature of `ctor.length` undecorated parameters.
   */
  static getConstructors(target: Constructor): readonly ConstructorDescriptor[] {
    const bag = resolveBag();
    const rec = bag.records.get(target);
    if (!rec) {
      let implicit = bag.implicit.get(target);
      if (!implicit) {
        implicit = this.buildDescriptors(target, [new Array<undefined>(target.length).fill(undefined)]);
        bag.implicit.set(target, implicit);
      }
      return implicit;
    }
    return rec.cached ?? (rec.cached = this.buildDescriptors(target, this.signaturesOf(target, rec)));
  }

  /**
   * Look up a parameter descriptor, typically to supply a parameter override.
   *
   * @throws RangeError when the constructor or the parameter does not exist
   */
  static parameterOf(target: Constructor, position: number, constructorIndex = 0): ParameterDescriptor {
    const ctor = this.getConstructors(target)[constructorIndex];
    if (!ctor) {
      throw new RangeError(`${target.name} has no constructor at index ${constructorIndex}.`);
    }
    const parameter = ctor.parameters[position];
    if (!parameter) {
      throw new RangeError(
        `${describeConstructor(ctor)} has no parameter at position ${position}.`
      );
    }
    return parameter;
  }

  /**
   * Route all following registrations and lookups to a namespaced bag.
   *
   * ⚠️ For test isolation only. Pass undefined to return to the default bag.
   */
  static useNamespace(namespace: string | undefined): void {
    ensureStore().active = namespace;
  }

  /**
   * Reset the registry bag for a namespace.
   *
   * ⚠️ Calling reset() in production drops the decorator metadata of every
   * class already imported.
   */
  static reset(namespace?: string): void {
    const store = ensureStore();
    if (!namespace) {
      store.defaultBag = createBag();
      return;
    }
    store.namespaces.set(namespace, createBag());
  }

  // ---- internals ----

  private static record(target: Constructor): MutableConstructorRecord {
    const bag = resolveBag();
    let rec = bag.records.get(target);
    if (!rec) {
      rec = { links: new Map(), overloads: [] };
      bag.records.set(target, rec);
    }
    return rec;
  }

  private static signaturesOf(target: Constructor, rec: MutableConstructorRecord): readonly Signature[] {
    if (rec.defined) return rec.defined;
    return [this.primarySignature(target, rec), ...rec.overloads];
  }

  /**
   * Primary signature from the @Inject() links.
   *
   * Length is the larger of the highest decorated index + 1 and `ctor.length`;
   * positions without a decorator stay undefined.
   */
  private static primarySignature(target: Constructor, rec: MutableConstructorRecord): Signature {
    let max = target.length - 1;
    for (const i of rec.links.keys()) if (i > max) max = i;
    const tokens = new Array<Token | undefined>(max + 1).fill(undefined);
    for (const [i, tok] of rec.links) tokens[i] = tok;
    return tokens;
  }

  private static buildDescriptors(
    target: Constructor,
    signatures: readonly Signature[]
  ): readonly ConstructorDescriptor[] {
    return Object.freeze(
      signatures.map((signature) => {
        const parameters = signature.map((tok, position) =>
          Object.freeze<ParameterDescriptor>({ declaringType: target, position, token: tok })
        );
        return Object.freeze<ConstructorDescriptor>({
          implementation: target,
          parameters: Object.freeze(parameters),
        });
      })
    );
  }
}
