import { isToken } from '../core/token.js';
import { ConstructorRegistry } from '../registry/constructor-registry.js';
import type { Constructor, InjectionToken } from '../types/types.js';

/**
 * Declares an additional public constructor signature.
 *
 * Mirrors a TypeScript constructor overload: the container may call the
 * class's constructor with just these arguments. Overloads follow the primary
 * (`@Inject()`) signature in source order.
 *
 * @example
 * ```typescript
 * @Overload(ConfigT)
 * @Overload()
 * class Mailer {
 *   constructor();
 *   constructor(config: Config);
 *   constructor(config: Config, transport: Transport, clock: Clock);
 *   constructor(
 *     @Inject(ConfigT) config?: Config,
 *     @Inject(TransportT) transport?: Transport,
 *     @Inject(ClockT) clock?: Clock
 *   ) {}
 * }
 * ```
 */
export function Overload(...tokens: InjectionToken[]): ClassDecorator {
  tokens.forEach((t, i) => {
    if (!isToken(t)) {
      throw new Error(`@Overload expects Tokens; argument ${i} is not a Token.`);
    }
  });

  return (target) => {
    ConstructorRegistry.registerOverload(target as unknown as Constructor, tokens);
  };
}
