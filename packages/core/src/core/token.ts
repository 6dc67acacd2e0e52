/**
 * Branded type for canonical token identifiers.
 * Prevents accidental use of raw strings as token IDs.
 */
export type CanonicalId = string & { __brand: 'CanonicalId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates tokens with their resolved value type without runtime overhead.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Type-safe service identity.
 *
 * Tokens uniquely identify services in a container and carry the type of the
 * instance they resolve to at compile time via the phantom type parameter T.
 *
 * @template T - The type of value this token resolves to
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Unique canonical identifier (tok_1, tok_2, etc.) */
  readonly id: CanonicalId;

  /** Human-readable label for diagnostics */
  readonly label: string;

  /** Phantom type brand - associates token with its value type */
  readonly [TOKEN_BRAND]: T;
}

let _tokCounter = 0;

/**
 * Create a new service token.
 *
 * @example
 * ```typescript
 * const MailerT = token<Mailer>('Mailer');
 * const ClockT = token<Clock>('Clock');
 * ```
 */
export function token<T = unknown>(label?: string): Token<T> {
  const resolvedLabel = label ?? `Token`;
  const id = `tok_${++_tokCounter}` as CanonicalId;
  const t = Object.freeze({
    kind: 'token',
    id,
    label: resolvedLabel,
  }) as Token<T>;
  return t;
}

/**
 * Runtime type guard to check if a value is a valid Token.
 *
 * Used for input validation in public APIs.
 */
export function isToken(x: unknown): x is Token<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Token).kind === 'token' &&
    typeof (x as Token).id === 'string' &&
    typeof (x as Token).label === 'string'
  );
}
