/* Registration
 *
 * Builds the construction plan for one service under one lifestyle.
 *
 * Two plan pipelines, in this exact order:
 *
 *  delegate:     invoke(creator) → interception → null check → initializer
 *  constructor:  select ctor → record relationships → new Impl(args)
 *                → interception → initializer → substitute overrides
 *
 * Constructor arguments for overridden parameters are placeholders while the
 * plan goes through interception, so listeners never process an override's
 * node a second time; the rewriter swaps the real nodes in at the end. The
 * null check and the initializer are applied after interception so a
 * listener cannot strip them.
 */
import { NullInstanceError, InitializerFailedError, ParameterPolicyReturnedNothingError } from '../errors/errors.js';
import type { ConstructorResolutionPolicy, ParameterResolutionPolicy } from '../policies/types.js';
import { describeParameter } from '../registry/constructor-registry.js';
import {
  describeIdentity,
  type Constructor,
  type Identity,
  type Initializer,
  type InstanceCreator,
  type ParameterDescriptor,
} from '../types/types.js';
import type { Factory, FactoryCompiler } from './compiler.js';
import type { Lifestyle } from './lifestyle.js';
import { isConstructionNode, Plan, type ConstructionNode } from './node.js';
import { OverrideTable, type ParameterOverride } from './overrides.js';
import { createRelationship, RelationshipSet, type KnownRelationship } from './relationships.js';
import { replacePlaceholders } from './rewriter.js';
import type { Token } from './token.js';

/**
 * The container as seen by its registrations.
 */
export interface RegistrationHost {
  readonly constructorResolution: ConstructorResolutionPolicy;
  readonly parameterResolution: ParameterResolutionPolicy;
  readonly compiler: FactoryCompiler;

  /**
   * Registration for a token, without building or validating it. Used only to
   * decide which relationships are recorded.
   */
  getRegistrationEvenIfInvalid(token: Token): Registration | undefined;

  getInitializer(implementation: Identity): Initializer | undefined;

  /**
   * Offer a plan to the expression-building listeners, in subscription order.
   * Returns the node produced by the last listener.
   */
  onExpressionBuilding(
    registration: Registration,
    service: Identity,
    implementation: Identity,
    node: ConstructionNode
  ): ConstructionNode;

  /**
   * Run `create` for `registration`, tracking the activation chain.
   */
  activate<T>(registration: Registration, create: () => T): T;
}

/**
 * Lifestyle-bound construction plan for a single service.
 *
 * Lifestyles create one Registration per registered service;
 * `buildExpression()` returns the plan with the lifestyle's caching applied.
 */
export abstract class Registration {
  private readonly relationships = new RelationshipSet();
  private overrides?: OverrideTable;
  private factory?: Factory;

  /** Whether the factory from getFactory() reports to the instantiate hook */
  protected readonly instrumented: boolean = true;

  constructor(
    readonly lifestyle: Lifestyle,
    protected readonly host: RegistrationHost
  ) {}

  /** Service the registration answers for */
  abstract readonly serviceType: Token;

  /** Class the registration creates, or the service token for delegates */
  abstract readonly implementationType: Identity;

  /**
   * Build the plan for this registration, with lifestyle caching applied.
   */
  abstract buildExpression(): ConstructionNode;

  /**
   * Snapshot of the dependencies recorded by the most recent build.
   */
  getRelationships(): readonly KnownRelationship[] {
    return this.relationships.snapshot();
  }

  replaceRelationships(edges: Iterable<KnownRelationship>): void {
    this.relationships.replace(edges);
  }

  /**
   * Replace the parameter overrides. Takes effect on the next build; the
   * compiled factory is dropped.
   */
  setParameterOverrides(overrides: Iterable<ParameterOverride>): void {
    this.overrides = new OverrideTable(overrides);
    this.factory = undefined;
  }

  /**
   * Compiled factory for `buildExpression()`, built on first use.
   */
  getFactory(): Factory {
    return (this.factory ??= this.host.compiler.compile(
      this.buildExpression(),
      this.implementationType,
      this.instrumented
    ));
  }

  getInstance(): unknown {
    const factory = this.getFactory();
    return this.host.activate(this, factory);
  }

  describe(): string {
    return `${describeIdentity(this.serviceType)} (${this.lifestyle.name})`;
  }

  /**
   * Plan for an instance created by a user-supplied delegate.
   */
  protected buildTransientNodeFromDelegate(
    service: Token,
    creator: InstanceCreator
  ): ConstructionNode {
    let node: ConstructionNode = Plan.invoke(creator, describeIdentity(service));

    node = this.intercept(service, service, node);

    // After interception, before initializers: initializers must never see null
    node = wrapWithNullCheck(service, node);

    return this.wrapWithInitializer(service, node);
  }

  /**
   * Plan for an instance created through a constructor of `implementation`.
   */
  protected buildTransientNodeFromConstructor(
    service: Token,
    implementation: Constructor
  ): ConstructionNode {
    let node: ConstructionNode = this.buildConstructNode(service, implementation);

    node = this.intercept(service, implementation, node);

    node = this.wrapWithInitializer(implementation, node);

    return replacePlaceholders(node, this.overrides);
  }

  private buildConstructNode(service: Token, implementation: Constructor): ConstructionNode {
    const ctor = this.host.constructorResolution.selectConstructor(service, implementation);

    this.replaceRelationships(this.collectRelationships(ctor.parameters));

    const args = ctor.parameters.map(
      (parameter) => this.overrides?.placeholderFor(parameter) ?? this.buildParameterNode(parameter)
    );

    return Plan.construct(ctor, args);
  }

  private collectRelationships(parameters: readonly ParameterDescriptor[]): KnownRelationship[] {
    const edges: KnownRelationship[] = [];
    for (const parameter of parameters) {
      const producer = parameter.token && this.host.getRegistrationEvenIfInvalid(parameter.token);
      if (producer) {
        edges.push(createRelationship(parameter.declaringType, this.lifestyle, producer));
      }
    }
    return edges;
  }

  private buildParameterNode(parameter: ParameterDescriptor): ConstructionNode {
    const policy = this.host.parameterResolution;
    const node: unknown = policy.buildParameterNode(parameter);

    if (!isConstructionNode(node)) {
      throw new ParameterPolicyReturnedNothingError(
        policy.constructor.name,
        describeParameter(parameter)
      );
    }

    return node;
  }

  private intercept(service: Identity, implementation: Identity, node: ConstructionNode): ConstructionNode {
    return this.host.onExpressionBuilding(this, service, implementation, node);
  }

  private wrapWithInitializer(implementation: Identity, node: ConstructionNode): ConstructionNode {
    const initializer = this.host.getInitializer(implementation);
    if (!initializer) return node;

    const label = describeIdentity(implementation);
    return Plan.wrap(
      node,
      (instance) => {
        try {
          initializer(instance);
        } catch (e) {
          throw new InitializerFailedError(label, e);
        }
        return instance;
      },
      'initialize'
    );
  }
}

function wrapWithNullCheck(service: Token, node: ConstructionNode): ConstructionNode {
  return Plan.wrap(
    node,
    (instance) => {
      if (instance === null || instance === undefined) {
        throw new NullInstanceError(describeIdentity(service));
      }
      return instance;
    },
    'ensureNotNull'
  );
}
