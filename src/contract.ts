/**
 * Contract Declarations
 * =====================
 *
 * A contract is the runtime description of a property-bearing interface: its
 * name, supertypes and method signatures. Schemas are extracted from contracts
 * and implementations are generated for them.
 *
 * @example
 * ```ts
 * interface Person {
 *   getName(): string | null
 *   setName(name: string | null): void
 * }
 *
 * const Person = defineContract<Person>('Person')({
 *   methods: {
 *     getName: method([], Types.String),
 *     setName: method([Types.String]),
 *   },
 * })
 * ```
 */

import { InvalidModelTypeError } from './errors'
import { ModelType, Types, nextRawTypeId, type RawType } from './model-type'

// =============================================================================
// METHODS
// =============================================================================

export interface MethodSignature {
  readonly parameterTypes: readonly ModelType[]
  readonly returnType: ModelType
}

/** A method signature as declared by a specific contract. */
export interface MethodDeclaration extends MethodSignature {
  readonly name: string
  readonly declaringType: ContractType
}

/**
 * A concrete method body carried by a contract. It is invoked with the
 * generated instance as `this`.
 */
export type MethodImplementation = (...args: never[]) => unknown

/**
 * Declares a method signature. The return type defaults to `void`.
 */
export function method(
  parameterTypes: ReadonlyArray<ModelType | RawType>,
  returnType: ModelType | RawType = Types.void
): MethodSignature {
  return Object.freeze({
    parameterTypes: Object.freeze(parameterTypes.map(type => ModelType.from(type))),
    returnType: ModelType.from(returnType),
  })
}

export function sameSignature(a: MethodSignature, b: MethodSignature): boolean {
  return a.returnType.equals(b.returnType)
    && a.parameterTypes.length === b.parameterTypes.length
    && a.parameterTypes.every((type, index) => type.equals(b.parameterTypes[index]))
}

export function formatSignature(name: string, signature: MethodSignature): string {
  return `${name}(${signature.parameterTypes.map(type => type.displayName).join(', ')})`
}

// =============================================================================
// CONTRACT TYPE
// =============================================================================

export type MethodTable = Readonly<Record<string, MethodSignature>>

export interface ContractDefinition {
  /** Supertype contracts, most significant first. */
  extends?: readonly ContractType[]
  /**
   * Whether properties declared by this contract are stored in the element
   * state. Behavioral contracts (`managed: false`) are satisfied by delegates
   * or by `implementations`.
   */
  managed?: boolean
  /**
   * Method signatures by name. Pass a function to refer to the contract being
   * declared, as in `getParent(): Node`.
   */
  methods?: MethodTable | ((self: ContractType) => MethodTable)
  implementations?: Readonly<Record<string, MethodImplementation>>
}

export class ContractType<T = unknown> {
  declare readonly __type?: T

  readonly kind = 'contract' as const
  readonly id: number
  readonly name: string
  readonly arity = 0
  readonly managed: boolean
  readonly supertypes: readonly ContractType[]
  readonly declaredMethods: readonly MethodDeclaration[]
  private readonly implementations: ReadonlyMap<string, MethodImplementation>

  constructor(name: string, definition: ContractDefinition = {}) {
    this.id = nextRawTypeId()
    this.name = name
    this.managed = definition.managed ?? true
    this.supertypes = Object.freeze([...(definition.extends ?? [])])
    const methods = typeof definition.methods === 'function' ? definition.methods(this) : definition.methods
    this.declaredMethods = Object.freeze(
      Object.entries(methods ?? {}).map(([methodName, signature]) =>
        Object.freeze({ ...signature, name: methodName, declaringType: this })
      )
    )
    this.implementations = new Map(Object.entries(definition.implementations ?? {}))

    for (const implemented of this.implementations.keys()) {
      if (!this.findMethod(implemented)) {
        throw new InvalidModelTypeError(
          `Contract ${name} provides an implementation for ${implemented}() which it does not declare.`
        )
      }
    }
    Object.freeze(this)
  }

  /**
   * Every method declaration visible on this contract, overridden ones
   * included: own declarations first, then each supertype's in order.
   * A declaration reached through more than one path appears once.
   */
  getAllMethodDeclarations(): readonly MethodDeclaration[] {
    const seen = new Set<MethodDeclaration>()
    const visit = (contract: ContractType): void => {
      contract.declaredMethods.forEach(declaration => seen.add(declaration))
      contract.supertypes.forEach(visit)
    }
    visit(this)
    return [...seen]
  }

  /** The most specific declaration of each method name. */
  getMethods(): readonly MethodDeclaration[] {
    const byName = new Map<string, MethodDeclaration>()
    for (const declaration of this.getAllMethodDeclarations()) {
      if (!byName.has(declaration.name)) {
        byName.set(declaration.name, declaration)
      }
    }
    return [...byName.values()]
  }

  findMethod(name: string): MethodDeclaration | undefined {
    return this.getMethods().find(declaration => declaration.name === name)
  }

  /** The implementation of `name` carried by this contract or the nearest supertype. */
  findImplementation(name: string): MethodImplementation | undefined {
    const own = this.implementations.get(name)
    if (own) return own
    for (const supertype of this.supertypes) {
      const inherited = supertype.findImplementation(name)
      if (inherited) return inherited
    }
    return undefined
  }

  isSubtypeOf(other: ContractType): boolean {
    return other === this || this.supertypes.some(supertype => supertype.isSubtypeOf(other))
  }

  /** Structural check: `value` exposes every method of this contract. */
  isInstance(value: unknown): boolean {
    if (typeof value !== 'object' || value === null) return false
    return this.getMethods().every(declaration => typeof Reflect.get(value, declaration.name) === 'function')
  }

  toString(): string {
    return this.name
  }
}

/**
 * Declares a contract. The type parameter is the instance shape that
 * generated implementations are typed with.
 */
export function defineContract<T>(name: string) {
  return (definition: ContractDefinition = {}): ContractType<T> => new ContractType<T>(name, definition)
}
