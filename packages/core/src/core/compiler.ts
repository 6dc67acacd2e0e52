/* FactoryCompiler
 *
 * Turns a finished construction node tree into a zero-argument factory.
 *
 * The tree is compiled once into nested closures: every node becomes a small
 * function that knows how to produce its value, with the shape checks done up
 * front. Invoking the factory then only runs those closures; the tree is not
 * walked again.
 *
 * Anything that cannot be compiled (a placeholder that was never substituted,
 * an argument count that does not match the constructor signature, a value
 * where a function is expected) is reported as a FactoryCompilationError
 * carrying the rendered node tree and the target type.
 */
import { FactoryCompilationError } from '../errors/errors.js';
import { describeConstructor, describeParameter } from '../registry/constructor-registry.js';
import { describeIdentity, type Identity, type InstantiateHook } from '../types/types.js';
import { describeNode, type ConstructionNode } from './node.js';

/** Zero-argument factory produced from a construction plan. */
export type Factory<T = unknown> = () => T;

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

export class FactoryCompiler {
  constructor(private readonly onInstantiate?: InstantiateHook) {}

  /**
   * Compile a node tree into a factory.
   *
   * @param node - Root of the finished plan
   * @param target - Type the factory produces, used in diagnostics and for the
   *   instrumentation hook
   * @param instrument - Report invocations to the instantiate hook
   * @throws FactoryCompilationError when the tree cannot be compiled
   */
  compile(node: ConstructionNode, target: Identity, instrument = true): Factory {
    let factory: Factory;
    try {
      factory = emit(node);
    } catch (e) {
      throw new FactoryCompilationError(describeIdentity(target), safeDescribe(node), e);
    }
    return instrument ? this.instrument(describeIdentity(target), factory) : factory;
  }

  private instrument(label: string, factory: Factory): Factory {
    const hook = this.onInstantiate;
    if (!hook) return factory;

    return () => {
      const start = nowMs();
      let instance: unknown;
      try {
        instance = factory();
      } catch (e) {
        report(hook, label, start);
        throw e;
      }
      hook(label, toNs(nowMs() - start));
      return instance;
    };
  }
}

/** Report a failed creation; a throwing hook must not replace the original error. */
function report(hook: InstantiateHook, label: string, start: number): void {
  try {
    hook(label, toNs(nowMs() - start));
  } catch {
    // the factory's own error is rethrown by the caller
  }
}

function emit(node: ConstructionNode): Factory {
  switch (node.kind) {
    case 'constant': {
      const value = node.value;
      return () => value;
    }

    case 'invoke': {
      const delegate = node.delegate;
      if (typeof delegate !== 'function') {
        throw new TypeError(`invoke(${node.label}) does not hold a function.`);
      }
      return () => delegate();
    }

    case 'construct': {
      const { ctor } = node;
      const Impl = ctor.implementation;
      if (typeof Impl !== 'function' || typeof Impl.prototype !== 'object') {
        throw new TypeError(`${describeConstructor(ctor)} is not a constructable class.`);
      }
      if (node.args.length !== ctor.parameters.length) {
        throw new TypeError(
          `${describeConstructor(ctor)} takes ${ctor.parameters.length} argument(s) but the plan supplies ${node.args.length}.`
        );
      }
      const args = node.args.map(emit);

      // Small-arity fast paths avoid allocating an argument array per call
      switch (args.length) {
        case 0:
          return () => new Impl();
        case 1: {
          const [a] = args;
          return () => new Impl(a());
        }
        case 2: {
          const [a, b] = args;
          return () => new Impl(a(), b());
        }
        default:
          return () => new Impl(...args.map((arg) => arg()));
      }
    }

    case 'wrap': {
      const { transform } = node;
      if (typeof transform !== 'function') {
        throw new TypeError(`${node.label}(...) does not hold a function.`);
      }
      const inner = emit(node.inner);
      return () => transform(inner());
    }

    case 'placeholder':
      throw new TypeError(
        `Placeholder for parameter ${describeParameter(node.parameter)} was never substituted.`
      );

    default: {
      const unknownNode: unknown = node;
      throw new TypeError(`Unknown construction node: ${String(safeKind(unknownNode))}.`);
    }
  }
}

function safeKind(value: unknown): unknown {
  return typeof value === 'object' && value !== null && 'kind' in value ? value.kind : value;
}

function safeDescribe(node: ConstructionNode): string {
  try {
    return describeNode(node);
  } catch {
    return '<unprintable plan>';
  }
}
