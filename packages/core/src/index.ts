export { Inject, Overload } from './decorators/index.js';
export {
  ConstructorRegistry,
  describeConstructor,
  describeParameter,
} from './registry/constructor-registry.js';
export type { Signature } from './registry/constructor-registry.js';

export { describeIdentity } from './types/types.js';
export type {
  Constructor,
  ConstructorDescriptor,
  Identity,
  Initializer,
  InjectionToken,
  InstanceCreator,
  InstantiateHook,
  ParameterDescriptor,
} from './types/types.js';

export * from './core/token.js';

// Construction plans
export { Plan, describeNode, isConstructionNode } from './core/node.js';
export type {
  ConstantNode,
  ConstructionNode,
  ConstructNode,
  InvokeNode,
  NodeKind,
  PlaceholderNode,
  WrapNode,
} from './core/node.js';
export { replacePlaceholders, replaceSubNode } from './core/rewriter.js';
export { OverrideTable } from './core/overrides.js';
export type { OverrideEntry, ParameterOverride } from './core/overrides.js';
export { FactoryCompiler } from './core/compiler.js';
export type { Factory } from './core/compiler.js';

// Registrations
export { Registration } from './core/registration.js';
export type { RegistrationHost } from './core/registration.js';
export { Lifestyle } from './core/lifestyle.js';
export type { InstanceSource } from './core/lifestyle.js';
export { RelationshipSet, createRelationship } from './core/relationships.js';
export type { KnownRelationship } from './core/relationships.js';
export { CriticalSection } from './core/critical-section.js';

// Container
export { Container } from './core/container.js';
export type {
  ContainerOptions,
  ExpressionBuildingEvent,
  ExpressionBuildingListener,
  RegisterOptions,
} from './core/container.js';

// Policies
export {
  MostResolvableParametersPolicy,
  RegisteredParameterPolicy,
  SingleConstructorPolicy,
} from './policies/index.js';
export type {
  ConstructorResolutionPolicy,
  ConstructorResolutionPolicyFactory,
  ParameterResolutionPolicy,
  ParameterResolutionPolicyFactory,
  PolicyContext,
} from './policies/index.js';

// Diagnostics
export { analyzeLifestyleMismatches } from './diagnostics/lifestyle-mismatch.js';
export type { LifestyleMismatch, RegistrationSource } from './diagnostics/lifestyle-mismatch.js';

// Errors
export {
  ActivationError,
  AmbiguousConstructorError,
  CircularDependencyError,
  ContainerConfigError,
  ContainerLockedError,
  FactoryCompilationError,
  InitializerFailedError,
  InterceptionFailedError,
  InvalidRegistrationError,
  InvalidTokenError,
  MissingRegistrationError,
  NoPublicConstructorError,
  NoResolvableConstructorError,
  NullInstanceError,
  ParameterPolicyReturnedNothingError,
  RegistrationCollisionError,
  UnresolvableParameterError,
} from './errors/errors.js';
