import { isToken } from '../core/token.js';
import { ConstructorRegistry } from '../registry/constructor-registry.js';
import type { Constructor, InjectionToken } from '../types/types.js';

/**
 * Parameter decorator for constructor dependency injection.
 *
 * Declares the service a parameter of the primary constructor signature asks
 * for. Every constructor parameter that the container should resolve must be
 * decorated; `emitDecoratorMetadata` is not used.
 *
 * @example
 * ```typescript
 * const TransportT = token<Transport>('Transport');
 * const ClockT = token<Clock>('Clock');
 *
 * class Mailer {
 *   constructor(
 *     @Inject(TransportT) private transport: Transport,
 *     @Inject(ClockT) private clock: Clock
 *   ) {}
 * }
 * ```
 */
export function Inject<T>(token: InjectionToken<T>): ParameterDecorator {
  return function (
    target: object,
    _propertyKey: string | symbol | undefined,
    parameterIndex: number
  ) {
    if (!isToken(token)) {
      throw new Error("@Inject expects a Token; create one with `const FooT = token<Foo>('Foo')`");
    }

    // Target is the constructor function for constructor parameter decorators.
    const constructor = target as unknown as Constructor;
    ConstructorRegistry.registerParameter(constructor, parameterIndex, token);
  };
}
