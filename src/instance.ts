/**
 * Managed Instances
 * =================
 *
 * Collaborator contracts a host supplies to generated implementations, and
 * the capability every generated instance exposes.
 */

import type { ModelType } from './model-type'

// =============================================================================
// COLLABORATORS
// =============================================================================

/**
 * Identity object behind an element, typically a node of a larger model
 * graph. Only its equality and hash are ever consulted.
 */
export interface BackingNode {
  equals(other: unknown): boolean
  hashCode(): number
}

/**
 * Per-instance storage for managed properties. It must outlive every
 * instance it backs. Nothing here is assumed atomic.
 */
export interface ModelElementState {
  get(name: string): unknown
  set(name: string, value: unknown): void
  getBackingNode(): BackingNode
  getDisplayName(): string
}

// =============================================================================
// CAPABILITY
// =============================================================================

export interface ManagedInstance {
  /** The contract this instance implements. */
  readonly managedType: ModelType
  readonly backingNode: BackingNode

  /**
   * True for the same instance, or another instance of the same generated
   * implementation whose backing node is equal.
   */
  equals(other: unknown): boolean
  hashCode(): number
  /** The element state's display name. */
  toString(): string

  getProperty(name: string): unknown
  setProperty(name: string, value: unknown): void
  invokeMethod(name: string, ...args: unknown[]): unknown
}

/** Members every generated instance owns; contracts may not declare them. */
export const MANAGED_INSTANCE_MEMBERS: ReadonlySet<string> = new Set([
  'constructor',
  'managedType',
  'backingNode',
  'equals',
  'hashCode',
  'toString',
  'getProperty',
  'setProperty',
  'invokeMethod',
])

/** Brand set on the prototype of every generated implementation. */
export const managedInstanceMarker: unique symbol = Symbol('managed-instance')

export function isManagedInstance(value: unknown): value is ManagedInstance {
  return typeof value === 'object' && value !== null && Reflect.get(value, managedInstanceMarker) === true
}

/** Equality of backing nodes: identical, or equal by the node's own rule. */
export function sameBackingNode(a: BackingNode, b: BackingNode): boolean {
  return a === b || a.equals(b)
}
