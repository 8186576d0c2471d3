/**
 * Accessor Pairing Machine
 * ========================
 *
 * Pairs the getter and setter declarations of one property name using a
 * `robot3` finite state machine. Declarations are sent most specific first;
 * the state the machine settles in decides the property's shape:
 *
 * ```
 *   empty ──getter──▶ readable ──setter──▶ readWrite
 *     │                  │                    │
 *     └──setter──▶ writeOnly ──getter──────────┘
 *
 *   any disagreement on types ─▶ typeMismatch | conflict   (final)
 * ```
 *
 * @dependency robot3
 */

import { createMachine, guard, interpret, reduce, state, transition } from 'robot3'
import type { MethodDeclaration } from './contract'
import { InvalidModelTypeError } from './errors'
import type { ModelType } from './model-type'

// --- TYPE DEFINITIONS ---

/** One getter or setter declaration and the property type it implies. */
export interface Accessor {
  readonly method: MethodDeclaration
  readonly valueType: ModelType
}

export type AccessorEvent = {
  type: 'getter' | 'setter'
  accessor: Accessor
}

interface PairingContext {
  getters: Accessor[]
  setters: Accessor[]
  /** The declaration already seen and the incoming one that disagreed with it. */
  clash?: [Accessor, Accessor]
}

export type PairingOutcome =
  | { kind: 'read-only'; getters: readonly Accessor[] }
  | { kind: 'read-write'; getters: readonly Accessor[]; setters: readonly Accessor[] }
  | { kind: 'orphan-setter'; setters: readonly Accessor[] }
  | { kind: 'type-mismatch'; existing: Accessor; incoming: Accessor }
  | { kind: 'conflict'; existing: Accessor; incoming: Accessor }

// --- GUARDS AND REDUCERS ---

const sameTypeAs = (incoming: Accessor) => (existing: Accessor) => existing.valueType.equals(incoming.valueType)

const agreesWithGetters = guard<PairingContext, AccessorEvent>(
  (ctx, event) => ctx.getters.every(sameTypeAs(event.accessor))
)
const agreesWithSetters = guard<PairingContext, AccessorEvent>(
  (ctx, event) => ctx.setters.every(sameTypeAs(event.accessor))
)
const disagreesWithGetters = guard<PairingContext, AccessorEvent>(
  (ctx, event) => !ctx.getters.every(sameTypeAs(event.accessor))
)
const disagreesWithSetters = guard<PairingContext, AccessorEvent>(
  (ctx, event) => !ctx.setters.every(sameTypeAs(event.accessor))
)

const addGetter = reduce<PairingContext, AccessorEvent>(
  (ctx, event) => ({ ...ctx, getters: [...ctx.getters, event.accessor] })
)
const addSetter = reduce<PairingContext, AccessorEvent>(
  (ctx, event) => ({ ...ctx, setters: [...ctx.setters, event.accessor] })
)

function firstMismatch(candidates: readonly Accessor[], incoming: Accessor): Accessor {
  return candidates.find(candidate => !candidate.valueType.equals(incoming.valueType)) ?? candidates[0]
}

const clashWithGetters = reduce<PairingContext, AccessorEvent>(
  (ctx, event) => ({ ...ctx, clash: [firstMismatch(ctx.getters, event.accessor), event.accessor] })
)
const clashWithSetters = reduce<PairingContext, AccessorEvent>(
  (ctx, event) => ({ ...ctx, clash: [firstMismatch(ctx.setters, event.accessor), event.accessor] })
)

// --- MACHINE ---

const pairingMachine = createMachine(
  'empty',
  {
    empty: state(
      transition('getter', 'readable', addGetter),
      transition('setter', 'writeOnly', addSetter)
    ),
    readable: state(
      transition('getter', 'readable', agreesWithGetters, addGetter),
      transition('getter', 'conflict', clashWithGetters),
      transition('setter', 'readWrite', agreesWithGetters, addSetter),
      transition('setter', 'typeMismatch', clashWithGetters)
    ),
    writeOnly: state(
      transition('setter', 'writeOnly', agreesWithSetters, addSetter),
      transition('setter', 'conflict', clashWithSetters),
      transition('getter', 'readWrite', agreesWithSetters, addGetter),
      transition('getter', 'typeMismatch', clashWithSetters)
    ),
    readWrite: state(
      transition('getter', 'readWrite', agreesWithGetters, agreesWithSetters, addGetter),
      transition('getter', 'conflict', disagreesWithGetters, clashWithGetters),
      transition('getter', 'typeMismatch', clashWithSetters),
      transition('setter', 'readWrite', agreesWithSetters, agreesWithGetters, addSetter),
      transition('setter', 'conflict', disagreesWithSetters, clashWithSetters),
      transition('setter', 'typeMismatch', clashWithGetters)
    ),
    typeMismatch: state(),
    conflict: state(),
  },
  (initial: PairingContext) => initial
)

/**
 * Runs the accessor declarations of a single property name through the
 * pairing machine and reports where it settled.
 */
export function pairAccessors(events: readonly AccessorEvent[]): PairingOutcome {
  const service = interpret(pairingMachine, () => {}, { getters: [], setters: [] })
  for (const event of events) {
    service.send(event)
  }

  const { getters, setters, clash } = service.context
  switch (service.machine.current) {
    case 'readable':
      return { kind: 'read-only', getters }
    case 'readWrite':
      return { kind: 'read-write', getters, setters }
    case 'writeOnly':
      return { kind: 'orphan-setter', setters }
    case 'typeMismatch':
    case 'conflict':
      if (!clash) break
      return {
        kind: service.machine.current === 'conflict' ? 'conflict' : 'type-mismatch',
        existing: clash[0],
        incoming: clash[1],
      }
  }
  throw new InvalidModelTypeError(`Accessor pairing stopped in unexpected state '${String(service.machine.current)}'.`)
}
