export { MostResolvableParametersPolicy } from './most-resolvable-parameters.js';
export { RegisteredParameterPolicy } from './registered-parameter.js';
export { SingleConstructorPolicy } from './single-constructor.js';
export type {
  ConstructorResolutionPolicy,
  ConstructorResolutionPolicyFactory,
  ParameterResolutionPolicy,
  ParameterResolutionPolicyFactory,
  PolicyContext,
} from './types.js';
