import { Plan, type ConstructionNode } from '../core/node.js';
import { UnresolvableParameterError } from '../errors/errors.js';
import { describeParameter } from '../registry/constructor-registry.js';
import type { ParameterDescriptor } from '../types/types.js';
import type { ParameterResolutionPolicy, PolicyContext } from './types.js';

/**
 * Default parameter policy: a parameter resolves to the instance of the
 * registration for its token.
 *
 * The produced node asks the registration for an instance when the factory
 * runs, so building it touches no state and doubles as a capability probe.
 */
export class RegisteredParameterPolicy implements ParameterResolutionPolicy {
  constructor(private readonly context: Pick<PolicyContext, 'getRegistration'>) {}

  buildParameterNode(parameter: ParameterDescriptor): ConstructionNode {
    const { token } = parameter;
    if (!token) {
      throw new UnresolvableParameterError(
        describeParameter(parameter),
        'The parameter is not decorated with @Inject().',
        parameter.declaringType.name
      );
    }

    const registration = this.context.getRegistration(token);
    if (!registration) {
      throw new UnresolvableParameterError(
        describeParameter(parameter),
        `No registration for type ${token.label} could be found.`,
        parameter.declaringType.name
      );
    }

    return Plan.invoke(() => registration.getInstance(), token.label);
  }
}
