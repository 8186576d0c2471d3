/**
 * Managed Proxy Generation
 * ========================
 *
 * Synthesizes, at runtime, an implementation class for a contract from the
 * contract's property extraction results:
 *
 * - managed accessors read and write the element state
 * - delegated accessors, and every method only the delegate declares, call
 *   straight through to the delegate instance
 * - unmanaged accessors and behavior methods use the contract's own
 *   implementation when it has one, the delegate's otherwise
 *
 * The method table is fixed at generation time. Instances are wrapped in a
 * `Proxy` so that reads and writes of names outside that table fail with the
 * contract's name rather than the synthesized class's.
 */

import {
  formatSignature,
  sameSignature,
  type ContractType,
  type MethodDeclaration,
  type MethodImplementation,
  type MethodSignature,
} from './contract'
import { debugLog } from './debug'
import {
  MissingMethodError,
  MissingPropertyError,
  ProxyGenerationError,
  ReadOnlyPropertyError,
} from './errors'
import {
  MANAGED_INSTANCE_MEMBERS,
  isManagedInstance,
  managedInstanceMarker,
  sameBackingNode,
  type BackingNode,
  type ManagedInstance,
  type ModelElementState,
} from './instance'
import { ModelType, type RawType } from './model-type'
import type { PropertyExtractionResult } from './schema'

// =============================================================================
// TYPES
// =============================================================================

/** How a generated method produces its result. */
export type DispatchKind = 'state-get' | 'state-set' | 'delegate' | 'implementation'

/** A method of a generated implementation, with its full generic signature. */
export interface GeneratedMethod extends MethodSignature {
  readonly name: string
  readonly declaringType: ContractType
  readonly dispatch: DispatchKind
}

/**
 * The shape of a generated instance: the contract's, plus the delegate's
 * when one is mixed in.
 */
export type ManagedShape<T, D> = [D] extends [never] ? T : T & D

/**
 * A synthesized implementation of a contract, optionally mixing in a
 * delegate. Safe to cache per (contract type, delegate type).
 */
export interface ManagedImplementation<T = unknown, D = unknown> {
  /** Name of the synthesized class; never used in diagnostics. */
  readonly name: string
  readonly contractType: ModelType<T>
  readonly delegateType: ContractType<D> | undefined
  /** Generated methods, ordered by name. */
  readonly methods: readonly GeneratedMethod[]
  readonly propertyNames: readonly string[]

  /**
   * Looks a generated method up by name and, when given, exact parameter
   * types.
   */
  getMethod(name: string, ...parameterTypes: ReadonlyArray<ModelType | RawType>): GeneratedMethod

  /**
   * Creates an instance backed by `state`. A delegate is required exactly
   * when the implementation was generated with a delegate type.
   */
  newInstance(state: ModelElementState, delegate?: D): ManagedShape<T, D> & ManagedInstance

  isInstance(value: unknown): value is ManagedShape<T, D> & ManagedInstance
}

// =============================================================================
// INSTANCE RUNTIME
// =============================================================================

type Handler = (internals: InstanceInternals, receiver: ManagedInstance, args: unknown[]) => unknown

interface PlannedMethod extends GeneratedMethod {
  readonly handler: Handler
}

interface PlannedProperty {
  readonly getter: string
  readonly setter?: string
}

/** What every instance of one generated class shares. */
interface ImplementationRuntime {
  readonly typeName: string
  readonly contractType: ModelType
  readonly methods: ReadonlyMap<string, PlannedMethod>
  readonly properties: ReadonlyMap<string, PlannedProperty>
}

interface InstanceInternals {
  readonly runtime: ImplementationRuntime
  readonly state: ModelElementState
  readonly delegate: unknown
}

const internalsKey = Symbol('internals')

function describeArgumentType(value: unknown): string {
  if (value === null) return 'null'
  if (isManagedInstance(value)) return value.managedType.displayName
  if (Array.isArray(value)) return 'Array'
  if (typeof value === 'object') return value.constructor?.name ?? 'Object'
  return typeof value
}

function describeArgumentValue(value: unknown): string {
  return typeof value === 'symbol' ? value.toString() : String(value)
}

function missingMethod(runtime: ImplementationRuntime, name: string, args: readonly unknown[]): MissingMethodError {
  return new MissingMethodError(name, runtime.typeName, args.map(describeArgumentType), args.map(describeArgumentValue))
}

function callPlanned(internals: InstanceInternals, receiver: ManagedInstance, method: PlannedMethod, args: unknown[]): unknown {
  const applicable = args.length === method.parameterTypes.length
    && method.parameterTypes.every((type, index) => type.accepts(args[index]))
  if (!applicable) {
    throw missingMethod(internals.runtime, method.name, args)
  }
  return method.handler(internals, receiver, args)
}

class ManagedInstanceBase implements ManagedInstance {
  readonly [internalsKey]: InstanceInternals

  constructor(internals: InstanceInternals) {
    this[internalsKey] = internals
    return new Proxy(this, instanceHandler)
  }

  get managedType(): ModelType {
    return this[internalsKey].runtime.contractType
  }

  get backingNode(): BackingNode {
    return this[internalsKey].state.getBackingNode()
  }

  equals(other: unknown): boolean {
    if (other === this) return true
    if (!(other instanceof ManagedInstanceBase)) return false
    if (other[internalsKey].runtime !== this[internalsKey].runtime) return false
    return sameBackingNode(this.backingNode, other.backingNode)
  }

  hashCode(): number {
    return this.backingNode.hashCode()
  }

  toString(): string {
    return this[internalsKey].state.getDisplayName()
  }

  getProperty(name: string): unknown {
    const internals = this[internalsKey]
    const property = internals.runtime.properties.get(name)
    if (!property) throw new MissingPropertyError(name, internals.runtime.typeName)
    return this.invokeMethod(property.getter)
  }

  setProperty(name: string, value: unknown): void {
    const internals = this[internalsKey]
    const property = internals.runtime.properties.get(name)
    if (!property) throw new MissingPropertyError(name, internals.runtime.typeName)
    if (!property.setter) throw new ReadOnlyPropertyError(name, internals.runtime.typeName)
    this.invokeMethod(property.setter, value)
  }

  invokeMethod(name: string, ...args: unknown[]): unknown {
    const internals = this[internalsKey]
    const method = internals.runtime.methods.get(name)
    if (!method) throw missingMethod(internals.runtime, name, args)
    return callPlanned(internals, this, method, args)
  }
}

Object.defineProperty(ManagedInstanceBase.prototype, managedInstanceMarker, { value: true })

// Names that promise resolution, JSON.stringify and test matchers look up;
// they read as absent instead of failing
const PROBED_NAMES: ReadonlySet<string> = new Set(['then', 'toJSON', 'asymmetricMatch'])

const instanceHandler: ProxyHandler<ManagedInstanceBase> = {
  get(target, property, receiver) {
    if (typeof property === 'symbol' || property in target || PROBED_NAMES.has(property)) {
      return Reflect.get(target, property, receiver)
    }
    throw new MissingPropertyError(property, target[internalsKey].runtime.typeName)
  },
  set(target, property, value, receiver) {
    if (typeof property === 'symbol' || property in target) {
      return Reflect.set(target, property, value, receiver)
    }
    throw new MissingPropertyError(property, target[internalsKey].runtime.typeName)
  },
}

// =============================================================================
// GENERATOR
// =============================================================================

/**
 * Generates implementation classes. Generation is a pure function of its
 * inputs and nothing is memoized here; see `ManagedProxyFactory` for a
 * caching front end.
 */
export class ManagedProxyClassGenerator {
  generate<T>(
    contractType: ModelType<T>,
    delegateType: undefined,
    properties: readonly PropertyExtractionResult[]
  ): ManagedImplementation<T, never>
  generate<T, D>(
    contractType: ModelType<T>,
    delegateType: ContractType<D>,
    properties: readonly PropertyExtractionResult[]
  ): ManagedImplementation<T, D>
  generate<T, D>(
    contractType: ModelType<T>,
    delegateType: ContractType<D> | undefined,
    properties: readonly PropertyExtractionResult[]
  ): ManagedImplementation<T, D>
  generate<T, D>(
    contractType: ModelType<T>,
    delegateType: ContractType<D> | undefined,
    properties: readonly PropertyExtractionResult[]
  ): ManagedImplementation<T, D> {
    const contract = contractType.asContract()
    if (!contract) {
      throw new ProxyGenerationError(contractType.displayName, 'only contract types can be implemented')
    }
    const planner = new MethodPlanner(contractType.displayName, contract, delegateType)
    planner.planProperties(properties)
    planner.planRemainingMethods()

    const runtime: ImplementationRuntime = {
      typeName: contractType.displayName,
      contractType,
      methods: planner.methods,
      properties: planner.properties,
    }
    const implementationName = delegateType
      ? `${contract.name}_Impl_${delegateType.name}`
      : `${contract.name}_Impl`
    const ImplementationClass = synthesizeClass(implementationName, runtime)

    const isInstance = (value: unknown): value is ManagedShape<T, D> & ManagedInstance =>
      value instanceof ImplementationClass
    const methods = [...planner.methods.values()]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(({ handler: _handler, ...method }): GeneratedMethod => Object.freeze(method))

    debugLog(`Generated ${implementationName} with ${methods.length} method(s)`)

    return Object.freeze({
      name: implementationName,
      contractType,
      delegateType,
      methods,
      propertyNames: [...planner.properties.keys()].sort(),

      getMethod(name: string, ...parameterTypes: ReadonlyArray<ModelType | RawType>): GeneratedMethod {
        const wanted = parameterTypes.map(type => ModelType.from(type))
        const found = methods.find(method =>
          method.name === name
          && (wanted.length === 0
            || (wanted.length === method.parameterTypes.length
              && wanted.every((type, index) => type.equals(method.parameterTypes[index]))))
        )
        if (!found) {
          throw new MissingMethodError(name, runtime.typeName, wanted.map(type => type.displayName), [])
        }
        return found
      },

      newInstance(state: ModelElementState, delegate?: D): ManagedShape<T, D> & ManagedInstance {
        const acceptable = delegateType ? delegateType.isInstance(delegate) : delegate === undefined
        if (!acceptable) {
          const args = delegate === undefined ? [state] : [state, delegate]
          throw missingMethod(runtime, 'newInstance', args)
        }
        const instance = new ImplementationClass({ runtime, state, delegate })
        if (!isInstance(instance)) {
          throw new ProxyGenerationError(runtime.typeName, `${implementationName} produced an instance of another class`)
        }
        return instance
      },

      isInstance,
    })
  }
}

function synthesizeClass(name: string, runtime: ImplementationRuntime): typeof ManagedInstanceBase {
  const ImplementationClass = class extends ManagedInstanceBase {}
  Object.defineProperty(ImplementationClass, 'name', { value: name })
  const prototype = ImplementationClass.prototype

  for (const method of runtime.methods.values()) {
    Object.defineProperty(prototype, method.name, {
      value: function (this: ManagedInstanceBase, ...args: unknown[]): unknown {
        return callPlanned(this[internalsKey], this, method, args)
      },
    })
  }

  for (const [propertyName, property] of runtime.properties) {
    if (runtime.methods.has(propertyName)) continue
    Object.defineProperty(prototype, propertyName, {
      get(this: ManagedInstanceBase): unknown {
        return this.invokeMethod(property.getter)
      },
      set(this: ManagedInstanceBase, value: unknown): void {
        this.setProperty(propertyName, value)
      },
    })
  }
  return ImplementationClass
}

// =============================================================================
// METHOD PLANNING
// =============================================================================

/**
 * Decides, for every method the generated class will carry, where its result
 * comes from. Every failure is raised before any class is synthesized.
 */
class MethodPlanner {
  readonly methods = new Map<string, PlannedMethod>()
  readonly properties = new Map<string, PlannedProperty>()

  constructor(
    private readonly typeName: string,
    private readonly contract: ContractType,
    private readonly delegateType: ContractType | undefined
  ) {
    const declared = [...contract.getMethods(), ...(delegateType?.getMethods() ?? [])]
    const reserved = declared.find(declaration => MANAGED_INSTANCE_MEMBERS.has(declaration.name))
    if (reserved) {
      this.fail(`${reserved.declaringType.name} declares ${reserved.name}(), which every managed instance provides`)
    }
    for (const provided of delegateType?.getMethods() ?? []) {
      const declaration = contract.findMethod(provided.name)
      if (declaration && !sameSignature(declaration, provided)) {
        this.fail(conflict(declaration, provided))
      }
    }
  }

  planProperties(results: readonly PropertyExtractionResult[]): void {
    for (const { property, getter, setter } of results) {
      if (this.properties.has(property.name)) {
        this.fail(`property '${property.name}' is listed more than once`)
      }
      if (MANAGED_INSTANCE_MEMBERS.has(property.name)) {
        this.fail(`property '${property.name}' would hide a member every managed instance provides`)
      }
      const getterNames = uniqueNames(getter.declaringMethods)
      const setterNames = setter ? uniqueNames(setter.declaringMethods) : []

      for (const name of getterNames) {
        const declaration = this.contractMethod(property.name, name)
        switch (property.stateManagementType) {
          case 'managed':
            this.plan(declaration, 'state-get', (internals) => internals.state.get(property.name))
            break
          case 'delegated':
            this.planDelegated(property.name, declaration)
            break
          case 'unmanaged':
            this.planUnmanaged(property.name, declaration)
            break
        }
      }
      for (const name of setterNames) {
        const declaration = this.contractMethod(property.name, name)
        switch (property.stateManagementType) {
          case 'managed':
            this.plan(declaration, 'state-set', (internals, _receiver, [value]) => {
              internals.state.set(property.name, value)
            })
            break
          case 'delegated':
            this.planDelegated(property.name, declaration)
            break
          case 'unmanaged':
            this.planUnmanaged(property.name, declaration)
            break
        }
      }

      this.properties.set(property.name, { getter: getterNames[0], setter: setterNames[0] })
    }
  }

  /**
   * Contract methods no property claimed, then methods only the delegate
   * declares.
   */
  planRemainingMethods(): void {
    for (const declaration of this.contract.getMethods()) {
      if (this.methods.has(declaration.name)) continue
      const implementation = this.contract.findImplementation(declaration.name)
      if (implementation) {
        this.planImplementation(declaration, implementation)
      } else if (this.delegateType?.findMethod(declaration.name)) {
        this.planForward(declaration)
      } else {
        this.fail(
          `${formatSignature(declaration.name, declaration)} is neither implemented by ${this.contract.name} ` +
            `nor provided by ${this.delegateType ? `delegate ${this.delegateType.name}` : 'a delegate'}`
        )
      }
    }
    for (const declaration of this.delegateType?.getMethods() ?? []) {
      if (!this.methods.has(declaration.name)) {
        this.plan(declaration, 'delegate', forwardTo(declaration.name))
      }
    }
  }

  private planDelegated(propertyName: string, declaration: MethodDeclaration): void {
    if (!this.delegateType) {
      this.fail(`property '${propertyName}' is delegated but no delegate type was given`)
    }
    this.planForward(declaration)
  }

  private planUnmanaged(propertyName: string, declaration: MethodDeclaration): void {
    const implementation = this.contract.findImplementation(declaration.name)
    if (implementation) {
      this.planImplementation(declaration, implementation)
      return
    }
    if (!this.delegateType?.findMethod(declaration.name)) {
      this.fail(
        `unmanaged property '${propertyName}' is neither implemented by ${this.contract.name} ` +
          `nor provided by ${this.delegateType ? `delegate ${this.delegateType.name}` : 'a delegate'}`
      )
    }
    this.planForward(declaration)
  }

  private planForward(declaration: MethodDeclaration): void {
    const delegateType = this.delegateType
    const provided = delegateType?.findMethod(declaration.name)
    if (!delegateType || !provided) {
      return this.fail(
        `${delegateType?.name ?? 'the delegate'} does not declare ${formatSignature(declaration.name, declaration)}`
      )
    }
    if (!sameSignature(provided, declaration)) {
      this.fail(conflict(declaration, provided))
    }
    this.plan(declaration, 'delegate', forwardTo(declaration.name))
  }

  private planImplementation(declaration: MethodDeclaration, implementation: MethodImplementation): void {
    this.plan(declaration, 'implementation', (_internals, receiver, args) =>
      Reflect.apply(implementation, receiver, args)
    )
  }

  private plan(declaration: MethodDeclaration, dispatch: DispatchKind, handler: Handler): void {
    this.methods.set(declaration.name, {
      name: declaration.name,
      declaringType: declaration.declaringType,
      parameterTypes: declaration.parameterTypes,
      returnType: declaration.returnType,
      dispatch,
      handler,
    })
  }

  /** The contract's most specific declaration of an accessor. */
  private contractMethod(propertyName: string, methodName: string): MethodDeclaration {
    const declaration = this.contract.findMethod(methodName)
    if (!declaration) {
      return this.fail(`property '${propertyName}' uses ${methodName}(), which ${this.contract.name} does not declare`)
    }
    return declaration
  }

  private fail(reason: string): never {
    throw new ProxyGenerationError(this.typeName, reason)
  }
}

function conflict(declaration: MethodDeclaration, provided: MethodDeclaration): string {
  return `${formatSignature(declaration.name, declaration)}: ${declaration.returnType.displayName} of ` +
    `${declaration.declaringType.name} conflicts with ${formatSignature(provided.name, provided)}: ` +
    `${provided.returnType.displayName} of ${provided.declaringType.name}`
}

function uniqueNames(declarations: readonly MethodDeclaration[]): string[] {
  return [...new Set(declarations.map(({ name }) => name))]
}

function forwardTo(methodName: string): Handler {
  return (internals, _receiver, args) => {
    const { delegate } = internals
    if (typeof delegate !== 'object' || delegate === null) {
      throw new MissingMethodError(methodName, internals.runtime.typeName, [], [])
    }
    return Reflect.apply(Reflect.get(delegate, methodName), delegate, args)
  }
}
