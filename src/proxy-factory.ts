/**
 * Caching front end for proxy generation: one implementation per
 * (contract type, delegate type), created from the schema the store holds
 * for the contract.
 */

import { useSchemaStore } from './context'
import type { ContractType } from './contract'
import { InvalidModelTypeError } from './errors'
import { getPropertyExtractionResults } from './extractor'
import { ManagedProxyClassGenerator, type ManagedImplementation, type ManagedShape } from './generator'
import type { ManagedInstance, ModelElementState } from './instance'
import type { ModelType } from './model-type'
import type { ModelSchemaStore } from './store'

export interface CreateProxyOptions<D> {
  delegateType?: ContractType<D>
  delegate?: D
}

export interface ProxyFactoryOptions {
  /** Defaults to `useSchemaStore()` at construction. */
  store?: ModelSchemaStore
  generator?: ManagedProxyClassGenerator
}

/**
 * Not safe for concurrent use: serialize `createProxy` when sharing a factory.
 */
export class ManagedProxyFactory {
  private readonly store: ModelSchemaStore
  private readonly generator: ManagedProxyClassGenerator
  private generated = new Map<string, ManagedImplementation>()

  constructor(options: ProxyFactoryOptions = {}) {
    this.store = options.store ?? useSchemaStore()
    this.generator = options.generator ?? new ManagedProxyClassGenerator()
  }

  /**
   * Instantiates the implementation of `type` (and `delegateType`) backed by
   * `state`, generating it on first use.
   */
  createProxy<T, D = never>(
    type: ModelType<T>,
    state: ModelElementState,
    options: CreateProxyOptions<D> = {}
  ): ManagedShape<T, D> & ManagedInstance {
    const implementation = this.implementationFor(type, options.delegateType)
    const instance = implementation.newInstance(state, options.delegate)
    if (!isInstanceOf<T, D>(instance, type)) {
      throw new InvalidModelTypeError(
        `${type.displayName} is normalized to ${implementation.contractType.displayName}; ` +
          `create a proxy of ${implementation.contractType.displayName} instead.`
      )
    }
    return instance
  }

  /** The cached implementation for the pair, generating it if needed. */
  implementationFor(type: ModelType, delegateType?: ContractType): ManagedImplementation {
    const key = delegateType ? `${type.key}|${delegateType.id}` : type.key
    const cached = this.generated.get(key)
    if (cached) return cached

    const schema = this.store.getSchema(type)
    const implementation = this.generator.generate(schema.type, delegateType, getPropertyExtractionResults(schema))
    this.generated.set(key, implementation)
    return implementation
  }

  size(): number {
    return this.generated.size
  }

  clear(): void {
    this.generated.clear()
  }
}

function isInstanceOf<T, D>(
  instance: ManagedInstance,
  type: ModelType<T>
): instance is ManagedShape<T, D> & ManagedInstance {
  return instance.managedType.equals(type)
}
