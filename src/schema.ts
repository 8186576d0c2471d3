/**
 * Schema Model
 * ============
 *
 * The extracted, classified property set of a model type. Schemas are built
 * once by the extractor, never mutated, and shared through the schema cache.
 */

import type { ContractType, MethodDeclaration } from './contract'
import { InvalidModelTypeError } from './errors'
import type { ModelType } from './model-type'

// =============================================================================
// PROPERTIES
// =============================================================================

/**
 * How the value of a property is held.
 *
 * - `managed`: read from and written to the element state
 * - `unmanaged`: declared by a contract the state does not own; satisfied by
 *   an implementation on the contract or by the delegate
 * - `delegated`: forwarded to the delegate's own accessors
 */
export type StateManagementType = 'managed' | 'unmanaged' | 'delegated'

interface PropertyBase<T> {
  readonly name: string
  readonly type: ModelType<T>
  readonly stateManagementType: StateManagementType
  /** Contracts declaring an accessor for this property, most specific first. */
  readonly declaringTypes: readonly ContractType[]
  readonly getter: MethodDeclaration
}

export interface ReadOnlyModelProperty<T = unknown> extends PropertyBase<T> {
  readonly writable: false
  readonly setter?: undefined
}

export interface WritableModelProperty<T = unknown> extends PropertyBase<T> {
  readonly writable: true
  readonly setter: MethodDeclaration
}

export type ModelProperty<T = unknown> = ReadOnlyModelProperty<T> | WritableModelProperty<T>

/** Every declaration of one accessor role, most specific first. */
export interface PropertyAccessorContext {
  readonly declaringMethods: readonly MethodDeclaration[]
  readonly mostSpecific: MethodDeclaration
}

/**
 * A property together with the accessor declarations it was derived from.
 * This is the input of proxy generation.
 */
export interface PropertyExtractionResult<T = unknown> {
  readonly property: ModelProperty<T>
  readonly getter: PropertyAccessorContext
  readonly setter?: PropertyAccessorContext
}

// =============================================================================
// SCHEMA
// =============================================================================

export type SchemaKind = 'struct' | 'value'

export class ModelSchema {
  readonly type: ModelType
  readonly kind: SchemaKind
  private readonly byName: ReadonlyMap<string, ModelProperty>

  /**
   * @param properties Must be unique by name; they are kept ordered by name.
   */
  constructor(type: ModelType, kind: SchemaKind, properties: readonly ModelProperty[] = []) {
    const sorted = [...properties].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    const byName = new Map<string, ModelProperty>()
    for (const property of sorted) {
      if (byName.has(property.name)) {
        throw new InvalidModelTypeError(`Schema for ${type.displayName} has more than one property named '${property.name}'.`)
      }
      byName.set(property.name, property)
    }
    this.type = type
    this.kind = kind
    this.byName = byName
    Object.freeze(this)
  }

  get properties(): readonly ModelProperty[] {
    return [...this.byName.values()]
  }

  get propertyNames(): readonly string[] {
    return [...this.byName.keys()]
  }

  getProperty(name: string): ModelProperty | undefined {
    return this.byName.get(name)
  }

  hasProperty(name: string): boolean {
    return this.byName.has(name)
  }

  toString(): string {
    return `${this.kind} schema ${this.type.displayName}`
  }
}
