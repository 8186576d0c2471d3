import { vi } from 'vitest'
import type { ContractType } from '../src/contract'
import type { BackingNode } from '../src/instance'
import type { PropertyExtractionResult, StateManagementType } from '../src/schema'

// =============================================================================
// COLLABORATOR STUBS
// =============================================================================

/** A backing node equal only to itself. */
export function createNode(hash = 0) {
  const node = {
    equals: vi.fn((other: unknown): boolean => other === node),
    hashCode: vi.fn((): number => hash),
  }
  return node
}

export interface StateOptions {
  node?: BackingNode
  displayName?: string
}

/** Element state over an in-memory map, with every call recorded. */
export function createState(options: StateOptions = {}) {
  const data = new Map<string, unknown>()
  const node = options.node ?? createNode()
  return {
    data,
    get: vi.fn((name: string): unknown => data.get(name)),
    set: vi.fn((name: string, value: unknown): void => {
      data.set(name, value)
    }),
    getBackingNode: vi.fn((): BackingNode => node),
    getDisplayName: vi.fn((): string => options.displayName ?? '<state>'),
  }
}

// =============================================================================
// ASSERTION HELPERS
// =============================================================================

/** The error `fn` throws. Fails the test if it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected the call to throw.')
}

/**
 * Builds the extraction result of `name` straight from the contract's
 * `get`/`set` declarations, bypassing the extractor.
 */
export function property(
  contract: ContractType,
  name: string,
  stateManagementType: StateManagementType
): PropertyExtractionResult {
  const suffix = name[0].toUpperCase() + name.slice(1)
  const getter = contract.findMethod(`get${suffix}`)
  if (!getter) {
    throw new Error(`${contract.name} declares no getter for '${name}'.`)
  }
  const setter = contract.findMethod(`set${suffix}`)
  const base = { name, type: getter.returnType, stateManagementType, declaringTypes: [getter.declaringType], getter }
  const getterContext = { declaringMethods: [getter], mostSpecific: getter }

  if (!setter) {
    return { property: { ...base, writable: false }, getter: getterContext }
  }
  return {
    property: { ...base, writable: true, setter },
    getter: getterContext,
    setter: { declaringMethods: [setter], mostSpecific: setter },
  }
}
