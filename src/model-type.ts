/**
 * Model Types
 * ===========
 *
 * Runtime descriptors for the types that appear in contract signatures. A
 * `ModelType` pairs a raw type with its ordered type arguments, so
 * `List<String>` and `List<Integer>` are distinct types with distinct cache
 * keys and distinct schemas.
 *
 * Raw types come in three flavours:
 * - primitives (`byte`, `short`, `int`, `long`, `float`, `double`, `boolean`,
 *   `char`, and `void` for method returns), which never accept `null`
 * - value types (`String`, `Integer`, `List<E>`, ... and anything made with
 *   `defineValueType`), which are stored as-is and never extracted recursively
 * - contracts, declared with `defineContract`
 */

import type { ContractType } from './contract'
import { InvalidModelTypeError } from './errors'

// =============================================================================
// RAW TYPES
// =============================================================================

export type PrimitiveKind =
  | 'byte'
  | 'short'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'boolean'
  | 'char'
  | 'void'

/**
 * Shared shape of every raw type. `__type` is a phantom brand carrying the
 * JavaScript value type; it is never set at runtime.
 */
export interface RawTypeBase<T> {
  readonly id: number
  readonly name: string
  /** Number of type arguments the raw type must be used with. */
  readonly arity: number
  readonly __type?: T
}

export interface PrimitiveType<T = unknown> extends RawTypeBase<T> {
  readonly kind: 'primitive'
  readonly primitive: PrimitiveKind
}

export interface ValueType<T = unknown> extends RawTypeBase<T> {
  readonly kind: 'value'
  isInstance(value: unknown, typeArguments: readonly ModelType[]): boolean
}

export type RawType<T = unknown> = PrimitiveType<T> | ValueType<T> | ContractType<T>

let lastRawTypeId = 0

/** Allocates the identity used in cache keys. */
export function nextRawTypeId(): number {
  return ++lastRawTypeId
}

// =============================================================================
// MODEL TYPE
// =============================================================================

export class ModelType<T = unknown> {
  declare readonly __type?: T

  readonly rawType: RawType
  readonly typeArguments: readonly ModelType[]
  readonly key: string
  readonly displayName: string

  private constructor(rawType: RawType, typeArguments: readonly ModelType[]) {
    this.rawType = rawType
    this.typeArguments = Object.freeze([...typeArguments])
    this.key = typeArguments.length === 0
      ? String(rawType.id)
      : `${rawType.id}<${typeArguments.map(arg => arg.key).join(',')}>`
    this.displayName = typeArguments.length === 0
      ? rawType.name
      : `${rawType.name}<${typeArguments.map(arg => arg.displayName).join(', ')}>`
    Object.freeze(this)
  }

  /**
   * Creates the descriptor for `rawType` applied to `typeArguments`.
   *
   * @example
   * ```ts
   * const names = ModelType.of(Types.List, ModelType.of(Types.String))
   * names.displayName // 'List<String>'
   * ```
   */
  static of<T>(rawType: RawType<T>, ...typeArguments: ModelType[]): ModelType<T> {
    if (typeArguments.length !== rawType.arity) {
      throw new InvalidModelTypeError(
        `Type ${rawType.name} takes ${rawType.arity} type argument(s) but was given ${typeArguments.length}.`
      )
    }
    return new ModelType<T>(rawType, typeArguments)
  }

  /** Accepts either a ready-made descriptor or a raw type without arguments. */
  static from<T>(type: ModelType<T> | RawType<T>): ModelType<T> {
    return type instanceof ModelType ? type : ModelType.of(type)
  }

  isPrimitive(): boolean {
    return this.rawType.kind === 'primitive'
  }

  isContract(): boolean {
    return this.rawType.kind === 'contract'
  }

  /** The contract this type refers to, or `undefined` for primitives and values. */
  asContract(): ContractType | undefined {
    return this.rawType.kind === 'contract' ? this.rawType : undefined
  }

  /** Whether `value` may be stored in a property of this type. */
  accepts(value: unknown): boolean {
    const raw = this.rawType
    if (raw.kind === 'primitive') {
      return primitiveChecks[raw.primitive](value)
    }
    if (value === null || value === undefined) {
      return true
    }
    return raw.isInstance(value, this.typeArguments)
  }

  equals(other: unknown): boolean {
    if (other === this) return true
    if (!(other instanceof ModelType)) return false
    if (other.rawType !== this.rawType || other.typeArguments.length !== this.typeArguments.length) {
      return false
    }
    return this.typeArguments.every((arg, index) => arg.equals(other.typeArguments[index]))
  }

  toString(): string {
    return this.displayName
  }
}

// =============================================================================
// BUILT-IN TYPES
// =============================================================================

const FLOAT_MAX = 3.4028234663852886e38
const LONG_MIN = -(2n ** 63n)
const LONG_MAX = 2n ** 63n - 1n

function isIntegerInRange(value: unknown, min: number, max: number): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max
}

function isLong(value: unknown): boolean {
  return typeof value === 'bigint' && value >= LONG_MIN && value <= LONG_MAX
}

const primitiveChecks: Record<PrimitiveKind, (value: unknown) => boolean> = {
  byte: value => isIntegerInRange(value, -128, 127),
  short: value => isIntegerInRange(value, -32768, 32767),
  int: value => isIntegerInRange(value, -2147483648, 2147483647),
  long: isLong,
  float: value => typeof value === 'number' && (!Number.isFinite(value) || Math.abs(value) <= FLOAT_MAX),
  double: value => typeof value === 'number',
  boolean: value => typeof value === 'boolean',
  char: value => typeof value === 'string' && value.length === 1,
  void: value => value === undefined,
}

function primitive<T>(kind: PrimitiveKind): PrimitiveType<T> {
  const type: PrimitiveType<T> = { kind: 'primitive', primitive: kind, id: nextRawTypeId(), name: kind, arity: 0 }
  return Object.freeze(type)
}

/**
 * Declares a value type. Values of these types are stored verbatim and are
 * never extracted into schemas of their own.
 *
 * @param isInstance Receives the value (never `null` or `undefined`) and the
 *   type arguments of the `ModelType` being checked.
 */
export function defineValueType<T>(
  name: string,
  isInstance: (value: unknown, typeArguments: readonly ModelType[]) => boolean,
  arity = 0
): ValueType<T> {
  const type: ValueType<T> = { kind: 'value', id: nextRawTypeId(), name, arity, isInstance }
  return Object.freeze(type)
}

/** Primitive and common value types, by the names they print with. */
export const Types = {
  byte: primitive<number>('byte'),
  short: primitive<number>('short'),
  int: primitive<number>('int'),
  long: primitive<bigint>('long'),
  float: primitive<number>('float'),
  double: primitive<number>('double'),
  boolean: primitive<boolean>('boolean'),
  char: primitive<string>('char'),
  void: primitive<void>('void'),

  String: defineValueType<string | null>('String', value => typeof value === 'string'),
  Integer: defineValueType<number | null>('Integer', primitiveChecks.int),
  Long: defineValueType<bigint | null>('Long', isLong),
  Double: defineValueType<number | null>('Double', value => typeof value === 'number'),
  Boolean: defineValueType<boolean | null>('Boolean', value => typeof value === 'boolean'),

  List: defineValueType<unknown[] | null>(
    'List',
    (value, [element]) => Array.isArray(value) && value.every(item => element.accepts(item)),
    1
  ),
  Set: defineValueType<Set<unknown> | null>(
    'Set',
    (value, [element]) => value instanceof Set && [...value].every(item => element.accepts(item)),
    1
  ),
  Map: defineValueType<Map<unknown, unknown> | null>(
    'Map',
    (value, [keyType, valueType]) =>
      value instanceof Map && [...value].every(([k, v]) => keyType.accepts(k) && valueType.accepts(v)),
    2
  ),
  Optional: defineValueType<unknown>('Optional', (value, [element]) => element.accepts(value), 1),
} as const
