/**
 * managed-model: Schema-Driven Managed Instances
 * ==============================================
 *
 * Declare property-bearing contracts, extract their schemas once, and obtain
 * instances whose properties live in a state object you supply:
 *
 * - Model types that keep generic type arguments (`List<String>`)
 * - Contract declarations with bean-style accessors
 * - Memoized schema extraction with pluggable state-management policies
 * - Runtime implementation synthesis with delegate mix-ins
 * - Diagnostics that always name the contract, never the synthesized class
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
 *
 * const factory = new ManagedProxyFactory()
 * const person = factory.createProxy(ModelType.of(Person), state)
 * person.setName('Ada') // state.set('name', 'Ada')
 * ```
 */

// =============================================================================
// TYPES AND CONTRACTS
// =============================================================================

export {
  ModelType,
  Types,
  defineValueType,
  type PrimitiveKind,
  type PrimitiveType,
  type RawType,
  type RawTypeBase,
  type ValueType,
} from './model-type'

export {
  ContractType,
  defineContract,
  formatSignature,
  method,
  sameSignature,
  type ContractDefinition,
  type MethodDeclaration,
  type MethodImplementation,
  type MethodSignature,
  type MethodTable,
} from './contract'

// =============================================================================
// SCHEMAS
// =============================================================================

export {
  ModelSchema,
  type ModelProperty,
  type PropertyAccessorContext,
  type PropertyExtractionResult,
  type ReadOnlyModelProperty,
  type SchemaKind,
  type StateManagementType,
  type WritableModelProperty,
} from './schema'

export { ModelSchemaCache } from './cache'

export { pairAccessors, type Accessor, type AccessorEvent, type PairingOutcome } from './accessor-machine'

export {
  DefaultStateManagementPolicy,
  ModelSchemaExtractor,
  getPropertyExtractionResults,
  propertyNameFor,
  type PropertyClassificationContext,
  type SchemaExtractorOptions,
  type StateManagementPolicy,
} from './extractor'

export {
  DefaultModelSchemaStore,
  type ModelSchemaStore,
  type ModelTypeNormalizer,
  type SchemaStoreOptions,
} from './store'

export { useSchemaStore, withSchemaStore } from './context'

// =============================================================================
// INSTANCES
// =============================================================================

export {
  MANAGED_INSTANCE_MEMBERS,
  isManagedInstance,
  sameBackingNode,
  type BackingNode,
  type ManagedInstance,
  type ModelElementState,
} from './instance'

export {
  ManagedProxyClassGenerator,
  type DispatchKind,
  type GeneratedMethod,
  type ManagedImplementation,
  type ManagedShape,
} from './generator'

export {
  ManagedProxyFactory,
  type CreateProxyOptions,
  type ProxyFactoryOptions,
} from './proxy-factory'

// =============================================================================
// ERRORS AND DIAGNOSTICS
// =============================================================================

export * from './errors'

export { debugLog, enableDebugLogging, isDebugLoggingEnabled } from './debug'
