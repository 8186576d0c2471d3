/**
 * Schema Store
 * ============
 *
 * Façade over extraction and caching. Requested types pass through the
 * registered normalizers, in order, before the extractor sees them; this lets
 * a host map runtime-specific subtypes back to the contract they stand for so
 * both hit one cache entry.
 */

import { ModelSchemaCache } from './cache'
import { debugLog } from './debug'
import { UnknownInstanceTypeError } from './errors'
import { ModelSchemaExtractor } from './extractor'
import { isManagedInstance } from './instance'
import { ModelType, type RawType } from './model-type'
import type { ModelSchema } from './schema'

/**
 * Rewrites a model type before extraction. Returning the argument unchanged
 * is always valid.
 */
export type ModelTypeNormalizer = (type: ModelType) => ModelType

export interface ModelSchemaStore {
  getSchema(type: ModelType | RawType): ModelSchema
  getInstanceSchema(instance: unknown): ModelSchema
  cleanUp(): void
}

export interface SchemaStoreOptions {
  extractor?: ModelSchemaExtractor
  normalizers?: readonly ModelTypeNormalizer[]
}

let defaultStore: DefaultModelSchemaStore | undefined

/**
 * Not safe for concurrent use: serialize `getSchema` and `cleanUp` when
 * sharing a store.
 */
export class DefaultModelSchemaStore implements ModelSchemaStore {
  readonly cache = new ModelSchemaCache()
  readonly extractor: ModelSchemaExtractor
  private readonly normalizers: readonly ModelTypeNormalizer[]

  constructor(options: SchemaStoreOptions = {}) {
    this.extractor = options.extractor ?? new ModelSchemaExtractor()
    this.normalizers = Object.freeze([...(options.normalizers ?? [])])
  }

  /**
   * The process-wide store, created on first use with no normalizers. It is
   * never torn down.
   */
  static getInstance(): DefaultModelSchemaStore {
    defaultStore ??= new DefaultModelSchemaStore()
    return defaultStore
  }

  getSchema(type: ModelType | RawType): ModelSchema {
    const requested = ModelType.from(type)
    const schemaType = this.normalizers.reduce((current, normalize) => normalize(current), requested)
    if (!schemaType.equals(requested)) {
      debugLog(`Normalized ${requested.displayName} to ${schemaType.displayName}`)
    }
    return this.extractor.extract(schemaType, this, this.cache)
  }

  /** Schema of the type the instance reports for itself. */
  getInstanceSchema(instance: unknown): ModelSchema {
    if (!isManagedInstance(instance)) {
      throw new UnknownInstanceTypeError(describe(instance))
    }
    return this.getSchema(instance.managedType)
  }

  cleanUp(): void {
    this.cache.clear()
  }

  size(): number {
    return this.cache.size()
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'object') return `an instance of ${value.constructor?.name ?? 'Object'}`
  return `a ${typeof value} value`
}
