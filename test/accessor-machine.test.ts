import { describe, it, expect } from 'vitest'
import { pairAccessors, type AccessorEvent } from '../src/accessor-machine'
import { defineContract, method } from '../src/contract'
import { ModelType, Types } from '../src/model-type'

const Sample = defineContract('Sample')({
  methods: {
    getName: method([], Types.String),
    setName: method([Types.String]),
    getCount: method([], Types.Integer),
    setCount: method([Types.Integer]),
  },
})

function event(type: AccessorEvent['type'], methodName: string): AccessorEvent {
  const declaration = Sample.findMethod(methodName)
  if (!declaration) throw new Error(`Sample declares no ${methodName}()`)
  const valueType = type === 'getter' ? declaration.returnType : declaration.parameterTypes[0]
  return { type, accessor: { method: declaration, valueType } }
}

const string = ModelType.of(Types.String)
const integer = ModelType.of(Types.Integer)

describe('pairAccessors', () => {
  it('should settle on read-only for getters alone', () => {
    const outcome = pairAccessors([event('getter', 'getName')])

    expect(outcome.kind).toBe('read-only')
  })

  it('should pair a getter with a setter of the same type in either order', () => {
    const getterFirst = pairAccessors([event('getter', 'getName'), event('setter', 'setName')])
    const setterFirst = pairAccessors([event('setter', 'setName'), event('getter', 'getName')])

    expect(getterFirst.kind).toBe('read-write')
    expect(setterFirst.kind).toBe('read-write')
    if (setterFirst.kind !== 'read-write') return
    expect(setterFirst.getters.map(({ method }) => method.name)).toEqual(['getName'])
    expect(setterFirst.setters.map(({ method }) => method.name)).toEqual(['setName'])
  })

  it('should keep every agreeing declaration, most specific first', () => {
    const outcome = pairAccessors([
      event('getter', 'getName'),
      event('setter', 'setName'),
      event('getter', 'getName'),
    ])

    expect(outcome.kind).toBe('read-write')
    if (outcome.kind !== 'read-write') return
    expect(outcome.getters).toHaveLength(2)
  })

  it('should report a setter without a getter', () => {
    const outcome = pairAccessors([event('setter', 'setName')])

    expect(outcome.kind).toBe('orphan-setter')
  })

  it('should report a setter whose type differs from the getter', () => {
    const outcome = pairAccessors([event('getter', 'getName'), event('setter', 'setCount')])

    expect(outcome.kind).toBe('type-mismatch')
    if (outcome.kind !== 'type-mismatch') return
    expect(outcome.existing.valueType.equals(string)).toBe(true)
    expect(outcome.incoming.valueType.equals(integer)).toBe(true)
  })

  it('should report getters that disagree on type', () => {
    const outcome = pairAccessors([event('getter', 'getName'), event('getter', 'getCount')])

    expect(outcome.kind).toBe('conflict')
    if (outcome.kind !== 'conflict') return
    expect(outcome.existing.method.name).toBe('getName')
    expect(outcome.incoming.method.name).toBe('getCount')
  })

  it('should stop at the first disagreement', () => {
    const outcome = pairAccessors([
      event('getter', 'getName'),
      event('getter', 'getCount'),
      event('getter', 'getName'),
    ])

    expect(outcome.kind).toBe('conflict')
  })

  it('should report a late getter that disagrees with a paired setter', () => {
    const outcome = pairAccessors([
      event('getter', 'getName'),
      event('setter', 'setName'),
      event('getter', 'getCount'),
    ])

    expect(outcome.kind).toBe('conflict')
  })
})
