/**
 * Schema Extraction
 * =================
 *
 * Turns a model type into a `ModelSchema`:
 *
 * 1. a cached schema is returned as-is
 * 2. every accessor visible on the contract is paired by property name
 * 3. each property is classified by the `StateManagementPolicy` in force
 * 4. property types that are managed contracts are extracted through the store
 * 5. the finished schema is cached
 *
 * Any failure aborts the whole call and nothing is cached.
 */

import { pairAccessors, type Accessor, type AccessorEvent } from './accessor-machine'
import type { ModelSchemaCache } from './cache'
import { formatSignature, type ContractType, type MethodDeclaration } from './contract'
import { debugLog } from './debug'
import {
  DuplicatePropertyError,
  OrphanSetterError,
  PropertyTypeMismatchError,
  UnsupportedAccessorError,
} from './errors'
import type { ModelType } from './model-type'
import {
  ModelSchema,
  type ModelProperty,
  type PropertyAccessorContext,
  type PropertyExtractionResult,
  type StateManagementType,
} from './schema'
import type { ModelSchemaStore } from './store'

// =============================================================================
// CLASSIFICATION POLICY
// =============================================================================

export interface PropertyClassificationContext {
  /** The contract whose schema is being extracted. */
  readonly contract: ContractType
  readonly propertyName: string
  readonly type: ModelType
  /** Contracts declaring the property's accessors, most specific first. */
  readonly declaringTypes: readonly ContractType[]
}

export interface StateManagementPolicy {
  classify(context: PropertyClassificationContext): StateManagementType
}

/**
 * Classifies by declaring contract and delegate registration:
 *
 * - declared (most specifically) by a managed contract: `managed`
 * - otherwise, if the delegate registered for the contract being extracted
 *   implements the declaring contract: `delegated`
 * - otherwise: `unmanaged`
 *
 * Register delegates before the first extraction of the contracts they serve;
 * schemas already cached are not reclassified.
 */
export class DefaultStateManagementPolicy implements StateManagementPolicy {
  private delegates = new Map<ContractType, ContractType>()

  constructor(delegates: Iterable<readonly [ContractType, ContractType]> = []) {
    for (const [contract, delegateType] of delegates) {
      this.registerDelegate(contract, delegateType)
    }
  }

  registerDelegate(contract: ContractType, delegateType: ContractType): this {
    this.delegates.set(contract, delegateType)
    return this
  }

  delegateTypeFor(contract: ContractType): ContractType | undefined {
    return this.delegates.get(contract)
  }

  classify({ contract, declaringTypes }: PropertyClassificationContext): StateManagementType {
    const declaringType = declaringTypes[0]
    if (declaringType.managed) return 'managed'
    const delegateType = this.delegates.get(contract)
    return delegateType?.isSubtypeOf(declaringType) ? 'delegated' : 'unmanaged'
  }
}

// =============================================================================
// ACCESSOR SHAPES
// =============================================================================

type MethodShape =
  | { kind: 'accessor'; propertyName: string; event: AccessorEvent }
  | { kind: 'invalid'; detail: string }
  | { kind: 'behavior' }

const ACCESSOR_NAME = /^(get|is|set)(.+)$/

/**
 * Bean-style decapitalization: `Name` becomes `name`, but `URL` stays `URL`.
 */
export function propertyNameFor(suffix: string): string {
  if (suffix.length > 1 && isUpperCase(suffix[0]) && isUpperCase(suffix[1])) {
    return suffix
  }
  return suffix[0].toLowerCase() + suffix.slice(1)
}

function isUpperCase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase()
}

function shapeOf(declaration: MethodDeclaration): MethodShape {
  const match = ACCESSOR_NAME.exec(declaration.name)
  if (!match || !isUpperCase(match[2][0])) {
    return { kind: 'behavior' }
  }
  const [, prefix, suffix] = match
  const { parameterTypes, returnType } = declaration
  const returnsVoid = returnType.rawType.kind === 'primitive' && returnType.rawType.primitive === 'void'

  switch (prefix) {
    case 'get':
      if (parameterTypes.length > 0) return { kind: 'invalid', detail: 'a getter takes no parameters' }
      if (returnsVoid) return { kind: 'invalid', detail: 'a getter must return a value' }
      return accessor('getter', suffix, declaration, returnType)
    case 'is': {
      const returnsBoolean = returnType.rawType.kind === 'primitive' && returnType.rawType.primitive === 'boolean'
      if (parameterTypes.length > 0 || !returnsBoolean) {
        return { kind: 'invalid', detail: "an 'is' getter takes no parameters and returns boolean" }
      }
      return accessor('getter', suffix, declaration, returnType)
    }
    default:
      if (parameterTypes.length !== 1) return { kind: 'invalid', detail: 'a setter takes exactly one parameter' }
      if (!returnsVoid) return { kind: 'invalid', detail: 'a setter must return void' }
      return accessor('setter', suffix, declaration, parameterTypes[0])
  }
}

function accessor(
  type: AccessorEvent['type'],
  suffix: string,
  method: MethodDeclaration,
  valueType: ModelType
): MethodShape {
  return { kind: 'accessor', propertyName: propertyNameFor(suffix), event: { type, accessor: { method, valueType } } }
}

function accessorContext(accessors: readonly Accessor[]): PropertyAccessorContext {
  const declaringMethods = accessors.map(({ method }) => method)
  return { declaringMethods, mostSpecific: declaringMethods[0] }
}

function uniqueDeclaringTypes(accessors: readonly Accessor[]): ContractType[] {
  return [...new Set(accessors.map(({ method }) => method.declaringType))]
}

// =============================================================================
// EXTRACTOR
// =============================================================================

export interface SchemaExtractorOptions {
  /** Defaults to a `DefaultStateManagementPolicy` with no delegates. */
  policy?: StateManagementPolicy
}

const extractionResults = new WeakMap<ModelSchema, readonly PropertyExtractionResult[]>()

/**
 * The accessor declarations behind each property of a struct schema, in
 * property order. Empty for value schemas.
 */
export function getPropertyExtractionResults(schema: ModelSchema): readonly PropertyExtractionResult[] {
  return extractionResults.get(schema) ?? []
}

export class ModelSchemaExtractor {
  readonly policy: StateManagementPolicy
  private inProgress = new Set<string>()

  constructor(options: SchemaExtractorOptions = {}) {
    this.policy = options.policy ?? new DefaultStateManagementPolicy()
  }

  extract(type: ModelType, store: ModelSchemaStore, cache: ModelSchemaCache): ModelSchema {
    const cached = cache.get(type)
    if (cached) return cached

    const contract = type.asContract()
    if (!contract) {
      const schema = new ModelSchema(type, 'value')
      cache.put(type, schema)
      debugLog(`Registered value schema for ${type.displayName}`)
      return schema
    }

    this.inProgress.add(type.key)
    try {
      const results = this.extractProperties(contract)
      const schema = new ModelSchema(type, 'struct', results.map(({ property }) => property))
      this.extractNestedSchemas(results, store, cache)
      extractionResults.set(schema, results)
      cache.put(type, schema)
      debugLog(`Extracted schema for ${type.displayName}`, schema.propertyNames)
      return schema
    } finally {
      this.inProgress.delete(type.key)
    }
  }

  /**
   * Pairs and classifies the properties of `contract` without touching any
   * cache. Results are ordered by property name.
   */
  extractProperties(contract: ContractType): PropertyExtractionResult[] {
    const accessorsByName = new Map<string, AccessorEvent[]>()

    for (const declaration of contract.getAllMethodDeclarations()) {
      const shape = shapeOf(declaration)
      if (shape.kind === 'accessor') {
        const events = accessorsByName.get(shape.propertyName) ?? []
        events.push(shape.event)
        accessorsByName.set(shape.propertyName, events)
        continue
      }
      if (!declaration.declaringType.managed) {
        continue
      }
      throw new UnsupportedAccessorError(
        contract.name,
        formatSignature(declaration.name, declaration),
        shape.kind === 'invalid' ? shape.detail : 'managed contracts may only declare getters and setters'
      )
    }

    return [...accessorsByName.keys()]
      .sort()
      .map(propertyName => {
        const events = accessorsByName.get(propertyName) ?? []
        return this.toExtractionResult(contract, propertyName, events)
      })
  }

  private toExtractionResult(
    contract: ContractType,
    propertyName: string,
    events: readonly AccessorEvent[]
  ): PropertyExtractionResult {
    const outcome = pairAccessors(events)
    switch (outcome.kind) {
      case 'orphan-setter': {
        const setter = outcome.setters[0].method
        throw new OrphanSetterError(contract.name, propertyName, formatSignature(setter.name, setter))
      }
      case 'type-mismatch': {
        const isGetter = (accessor: Accessor) => accessor.method.parameterTypes.length === 0
        const [getter, setter] = isGetter(outcome.existing)
          ? [outcome.existing, outcome.incoming]
          : [outcome.incoming, outcome.existing]
        throw new PropertyTypeMismatchError(
          contract.name,
          propertyName,
          getter.valueType.displayName,
          setter.valueType.displayName
        )
      }
      case 'conflict':
        throw new DuplicatePropertyError(
          contract.name,
          propertyName,
          outcome.existing.valueType.displayName,
          outcome.incoming.valueType.displayName
        )
    }

    const setters = outcome.kind === 'read-write' ? outcome.setters : []
    const getter = accessorContext(outcome.getters)
    const type = outcome.getters[0].valueType
    const declaringTypes = uniqueDeclaringTypes([...outcome.getters, ...setters])
    const stateManagementType = this.policy.classify({ contract, propertyName, type, declaringTypes })

    const base = { name: propertyName, type, stateManagementType, declaringTypes, getter: getter.mostSpecific }
    if (setters.length === 0) {
      const property: ModelProperty = { ...base, writable: false }
      return { property, getter }
    }
    const setter = accessorContext(setters)
    const property: ModelProperty = { ...base, writable: true, setter: setter.mostSpecific }
    return { property, getter, setter }
  }

  private extractNestedSchemas(
    results: readonly PropertyExtractionResult[],
    store: ModelSchemaStore,
    cache: ModelSchemaCache
  ): void {
    for (const { property } of results) {
      const nested = property.type.asContract()
      if (!nested?.managed || property.stateManagementType !== 'managed') continue
      if (cache.has(property.type) || this.inProgress.has(property.type.key)) continue
      store.getSchema(property.type)
    }
  }
}
