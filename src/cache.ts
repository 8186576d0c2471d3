import type { ModelType } from './model-type'
import type { ModelSchema } from './schema'

/**
 * Process-lifetime map from model type to its schema. Entries stay until
 * `clear()`; there is no eviction.
 *
 * Not safe for concurrent mutation: callers sharing one cache must
 * serialize `put` and `clear` themselves.
 */
export class ModelSchemaCache {
  private schemas = new Map<string, ModelSchema>()

  get(type: ModelType): ModelSchema | undefined {
    return this.schemas.get(type.key)
  }

  put(type: ModelType, schema: ModelSchema): void {
    this.schemas.set(type.key, schema)
  }

  has(type: ModelType): boolean {
    return this.schemas.has(type.key)
  }

  clear(): void {
    this.schemas.clear()
  }

  size(): number {
    return this.schemas.size
  }
}
