/**
 * Schema Store Context (with unctx)
 * =================================
 *
 * Lets host code scope a schema store to a synchronous call instead of
 * threading it through every helper. Outside any scope the process-wide
 * default store is used.
 *
 * As with all `unctx` contexts, the scoped store is only visible
 * synchronously: read it with `useSchemaStore()` before the first `await`.
 *
 * @dependency unctx
 */

import { getContext } from 'unctx'
import { DefaultModelSchemaStore, type ModelSchemaStore } from './store'

const storeContext = getContext<ModelSchemaStore>('managed-model-schema-store')

/**
 * The store scoped by the innermost `withSchemaStore` call, or the
 * process-wide default.
 */
export function useSchemaStore(): ModelSchemaStore {
  return storeContext.tryUse() ?? DefaultModelSchemaStore.getInstance()
}

/**
 * Runs `fn` with `store` as the store returned by `useSchemaStore()`.
 * Scopes do not nest: opening a scope for another store inside one throws.
 *
 * @example
 * ```ts
 * const store = new DefaultModelSchemaStore({ normalizers: [toPublicContract] })
 * const schema = withSchemaStore(store, () => useSchemaStore().getSchema(Person))
 * ```
 */
export function withSchemaStore<R>(store: ModelSchemaStore, fn: () => R): R {
  return storeContext.call(store, fn)
}
