const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Failure to build, compile or run a construction plan.
 *
 * Every failure of the plan pipeline surfaces as an ActivationError (or one of
 * its subclasses). `implementation` names the type being activated when it is
 * known; the underlying failure, if any, is kept as `cause`.
 */
export class ActivationError extends Error {
  constructor(
    message: string,
    options?: { cause?: unknown; implementation?: string }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ActivationError';
    this.implementation = options?.implementation;
  }

  readonly implementation?: string;
}

export class NoPublicConstructorError extends ActivationError {
  constructor(implementation: string) {
    const dev = [
      `For the container to be able to create ${implementation}, it should contain at least one public constructor.`,
      '',
      'To fix this:',
      `  1. Remove the empty constructor declaration of ${implementation}`,
      `  2. Or register ${implementation} through registerFactory()`,
    ];
    super(format(`${implementation} has no public constructor.`, dev), { implementation });
    this.name = 'NoPublicConstructorError';
  }
}

export class NoResolvableConstructorError extends ActivationError {
  constructor(
    implementation: string,
    public readonly signatures: string[]
  ) {
    const dev = [
      `For the container to be able to create ${implementation}, it should contain a public constructor that only contains parameters that can be resolved.`,
      '',
      'Candidate constructors:',
      ...signatures.map((s) => `  - ${s}`),
      '',
      'To fix this:',
      '  1. Register the services these parameters depend on',
      '  2. Or declare an overload whose parameters are all registered',
    ];
    super(
      format(`${implementation} has no constructor with only resolvable parameters.`, dev),
      { implementation }
    );
    this.name = 'NoResolvableConstructorError';
  }
}

export class AmbiguousConstructorError extends ActivationError {
  constructor(
    implementation: string,
    public readonly signatures: string[]
  ) {
    const dev = [
      `For the container to be able to create ${implementation}, it should contain exactly one public constructor, but it has ${signatures.length}.`,
      '',
      'Declared constructors:',
      ...signatures.map((s) => `  - ${s}`),
      '',
      'To fix this:',
      `  1. Remove the extra @Overload() declarations from ${implementation}`,
      '  2. Or install MostResolvableParametersPolicy as constructorResolution',
    ];
    super(
      format(`${implementation} has ${signatures.length} public constructors; expected one.`, dev),
      { implementation }
    );
    this.name = 'AmbiguousConstructorError';
  }
}

export class UnresolvableParameterError extends ActivationError {
  constructor(
    public readonly parameter: string,
    public readonly reason: string,
    implementation?: string
  ) {
    const dev = [
      `Parameter ${parameter} cannot be resolved.`,
      '',
      reason,
      '',
      'To fix this:',
      '  1. Decorate the parameter with @Inject(SomeToken)',
      '  2. Register SomeToken in the container',
      '  3. Or supply a parameter override for it',
    ];
    super(format(`Parameter ${parameter} cannot be resolved: ${reason}`, dev), {
      implementation,
    });
    this.name = 'UnresolvableParameterError';
  }
}

export class ParameterPolicyReturnedNothingError extends ActivationError {
  constructor(
    public readonly policy: string,
    public readonly parameter: string
  ) {
    const dev = [
      'Parameter resolution policy returned nothing',
      '',
      `${policy}.buildParameterNode() returned no construction node for parameter ${parameter}.`,
      'A parameter resolution policy must return a node or throw an ActivationError.',
    ];
    super(format(`${policy} returned no construction node for parameter ${parameter}.`, dev));
    this.name = 'ParameterPolicyReturnedNothingError';
  }
}

export class NullInstanceError extends ActivationError {
  constructor(service: string) {
    const dev = [
      `The registered delegate for type ${service} returned null.`,
      '',
      'Instance creators must return an instance. Return a value or throw.',
    ];
    super(format(`The registered delegate for type ${service} returned null.`, dev), {
      implementation: service,
    });
    this.name = 'NullInstanceError';
  }
}

export class InitializerFailedError extends ActivationError {
  constructor(implementation: string, cause: unknown) {
    const dev = [
      `The initializer(s) for type ${implementation} could not be applied.`,
      '',
      `See 'cause' for details.`,
    ];
    super(format(`The initializer(s) for type ${implementation} could not be applied.`, dev), {
      cause,
      implementation,
    });
    this.name = 'InitializerFailedError';
  }
}

export class InterceptionFailedError extends ActivationError {
  constructor(implementation: string, reason: string, cause?: unknown) {
    const dev = [
      `Interception of the construction plan for ${implementation} failed.`,
      '',
      reason,
    ];
    super(format(`Interception of ${implementation} failed: ${reason}`, dev), {
      cause,
      implementation,
    });
    this.name = 'InterceptionFailedError';
  }
}

export class FactoryCompilationError extends ActivationError {
  constructor(
    target: string,
    public readonly node: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const dev = [
      `Error occurred while trying to build a factory for type ${target} using the construction plan:`,
      '',
      `  ${node}`,
      '',
      reason,
    ];
    super(format(`Cannot build a factory for ${target}: ${reason}`, dev), {
      cause,
      implementation: target,
    });
    this.name = 'FactoryCompilationError';
  }
}

export class MissingRegistrationError extends ActivationError {
  constructor(
    public readonly token: string,
    public readonly availableServices: string[]
  ) {
    const parts: string[] = [`No registration for type ${token} could be found.`, ''];

    if (availableServices.length > 0 && availableServices.length <= 10) {
      parts.push('Registered services:');
      availableServices.forEach((s) => parts.push(`  - ${s}`));
      parts.push('');
    } else if (availableServices.length > 10) {
      parts.push(`${availableServices.length} services are registered.`, '');
    }

    parts.push('To fix this:', `  1. Register ${token} before resolving it`);
    super(format(`No registration for type ${token} could be found.`, parts), {
      implementation: token,
    });
    this.name = 'MissingRegistrationError';
  }
}

/**
 * Circular dependency detected while creating instances.
 */
export class CircularDependencyError extends ActivationError {
  constructor(public readonly cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const dev = [
      'Circular dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other services.`,
      '',
      'Solutions:',
      '  1. Extract shared logic into a separate service',
      '  2. Use events/message bus instead of direct dependencies',
    ];
    super(format(`Circular dependency detected: ${cycleStr}`, dev));
    this.name = 'CircularDependencyError';
  }
}

export class RegistrationCollisionError extends Error {
  constructor(
    public readonly token: string,
    public readonly containerName: string
  ) {
    const dev = [
      'Registration collision',
      '',
      `Type ${token} has already been registered in container '${containerName}'.`,
    ];
    super(format(`Type ${token} already registered in '${containerName}'.`, dev));
    this.name = 'RegistrationCollisionError';
  }
}

export class ContainerLockedError extends Error {
  constructor(public readonly containerName: string) {
    const dev = [
      `Container '${containerName}' is locked.`,
      '',
      'The container can no longer be changed after the first call to resolve() or verify().',
      'Make all registrations before resolving instances.',
    ];
    super(format(`Container '${containerName}' is locked.`, dev));
    this.name = 'ContainerLockedError';
  }
}

export class ContainerConfigError extends Error {
  constructor(public readonly reason: string) {
    const dev = ['Invalid container configuration', '', `Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'ContainerConfigError';
  }
}

export class InvalidTokenError extends Error {
  constructor(public readonly token: unknown) {
    let tokenString: string;
    try {
      tokenString = JSON.stringify(token) ?? String(token);
    } catch {
      tokenString = String(token);
    }

    const dev = [
      'Invalid token parameter',
      '',
      `Expected a Token created with token<T>().`,
      '',
      'Received:',
      `  ${tokenString}`,
    ];

    super(format('Invalid token parameter.', dev));
    this.name = 'InvalidTokenError';
  }
}

export class InvalidRegistrationError extends Error {
  constructor(
    public readonly service: string,
    public readonly reason: string
  ) {
    const dev = ['Invalid registration', '', `Cannot register ${service}: ${reason}`];
    super(format(`Cannot register ${service}: ${reason}`, dev));
    this.name = 'InvalidRegistrationError';
  }
}
