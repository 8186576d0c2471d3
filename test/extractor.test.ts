import { describe, it, expect, vi } from 'vitest'
import { defineContract, method } from '../src/contract'
import {
  DuplicatePropertyError,
  OrphanSetterError,
  PropertyTypeMismatchError,
  UnsupportedAccessorError,
} from '../src/errors'
import {
  DefaultStateManagementPolicy,
  ModelSchemaExtractor,
  getPropertyExtractionResults,
  propertyNameFor,
} from '../src/extractor'
import { ModelType, Types } from '../src/model-type'
import { DefaultModelSchemaStore } from '../src/store'
import { thrown } from './support'

function storeWith(policy?: DefaultStateManagementPolicy): DefaultModelSchemaStore {
  return new DefaultModelSchemaStore({ extractor: new ModelSchemaExtractor({ policy }) })
}

const Person = defineContract('Person')({
  methods: {
    getName: method([], Types.String),
    setName: method([Types.String]),
    getAge: method([], Types.int),
    setAge: method([Types.int]),
    isActive: method([], Types.boolean),
    setActive: method([Types.boolean]),
  },
})

describe('propertyNameFor', () => {
  it('should decapitalize like a bean', () => {
    expect(propertyNameFor('Name')).toBe('name')
    expect(propertyNameFor('URL')).toBe('URL')
    expect(propertyNameFor('X')).toBe('x')
  })
})

describe('ModelSchemaExtractor', () => {
  describe('properties', () => {
    it('should order properties by name', () => {
      const schema = storeWith().getSchema(Person)

      expect(schema.kind).toBe('struct')
      expect(schema.propertyNames).toEqual(['active', 'age', 'name'])
    })

    it('should pair getters and setters', () => {
      const schema = storeWith().getSchema(Person)

      const active = schema.getProperty('active')
      expect(active?.writable).toBe(true)
      expect(active?.getter.name).toBe('isActive')
      expect(active?.setter?.name).toBe('setActive')
      expect(active?.type.displayName).toBe('boolean')
      expect(active?.stateManagementType).toBe('managed')
    })

    it('should extract read-only properties', () => {
      const Labelled = defineContract('Labelled')({ methods: { getLabel: method([], Types.String) } })

      const label = storeWith().getSchema(Labelled).getProperty('label')
      expect(label?.writable).toBe(false)
      expect(label?.setter).toBeUndefined()
    })

    it('should record every declaration of an accessor, most specific first', () => {
      const Base = defineContract('Base')({
        methods: { getId: method([], Types.Long), setId: method([Types.Long]) },
      })
      const Derived = defineContract('Derived')({
        extends: [Base],
        methods: { getId: method([], Types.Long) },
      })

      const schema = storeWith().getSchema(Derived)
      const [result] = getPropertyExtractionResults(schema)

      expect(result.getter.declaringMethods.map(({ declaringType }) => declaringType.name)).toEqual(['Derived', 'Base'])
      expect(result.getter.mostSpecific.declaringType).toBe(Derived)
      expect(result.property.declaringTypes).toEqual([Derived, Base])
      expect(result.setter?.mostSpecific.declaringType).toBe(Base)
    })

    it('should return no extraction results for value schemas', () => {
      const schema = storeWith().getSchema(Types.String)

      expect(schema.kind).toBe('value')
      expect(schema.properties).toEqual([])
      expect(getPropertyExtractionResults(schema)).toEqual([])
    })
  })

  describe('caching', () => {
    it('should extract each type once', () => {
      const store = storeWith()
      const extractProperties = vi.spyOn(store.extractor, 'extractProperties')

      const first = store.getSchema(Person)
      const second = store.getSchema(ModelType.of(Person))

      expect(second).toBe(first)
      expect(extractProperties).toHaveBeenCalledTimes(1)
      expect(store.size()).toBe(1)
    })

    it('should cache each parameterization separately', () => {
      const store = storeWith()
      const strings = store.getSchema(ModelType.of(Types.List, ModelType.of(Types.String)))
      const integers = store.getSchema(ModelType.of(Types.List, ModelType.of(Types.Integer)))

      expect(strings).not.toBe(integers)
      expect(strings.type.displayName).toBe('List<String>')
      expect(store.size()).toBe(2)
    })

    it('should cache nothing when extraction fails', () => {
      const Broken = defineContract('Broken')({ methods: { setOnly: method([Types.String]) } })
      const store = storeWith()

      expect(() => store.getSchema(Broken)).toThrow(OrphanSetterError)
      expect(() => store.getSchema(Broken)).toThrow(OrphanSetterError)
      expect(store.size()).toBe(0)
    })
  })

  describe('nested types', () => {
    it('should extract managed property types through the store', () => {
      const Address = defineContract('Address')({ methods: { getCity: method([], Types.String) } })
      const Customer = defineContract('Customer')({ methods: { getAddress: method([], Address) } })
      const store = storeWith()

      store.getSchema(Customer)

      expect(store.cache.has(ModelType.of(Address))).toBe(true)
      expect(store.size()).toBe(2)
    })

    it('should terminate on a self-referencing contract', () => {
      const TreeNode = defineContract('TreeNode')({
        methods: self => ({
          getName: method([], Types.String),
          getParent: method([], self),
          setParent: method([self]),
        }),
      })
      const Tree = defineContract('Tree')({ methods: { getRoot: method([], TreeNode) } })
      const store = storeWith()
      const extractProperties = vi.spyOn(store.extractor, 'extractProperties')

      const schema = store.getSchema(Tree)

      expect(schema.propertyNames).toEqual(['root'])
      expect(store.getSchema(TreeNode).propertyNames).toEqual(['name', 'parent'])
      expect(store.getSchema(TreeNode).getProperty('parent')?.type.asContract()).toBe(TreeNode)
      expect(extractProperties).toHaveBeenCalledTimes(2)
      expect(store.size()).toBe(2)
    })

    it('should not extract property types that are not managed contracts', () => {
      const Link = defineContract('Link')({ methods: { getTarget: method([], Types.String) } })
      const Service = defineContract('Service')({ managed: false, methods: { ping: method([]) } })
      const Chain = defineContract('Chain')({
        extends: [Link],
        methods: { getNext: method([], Link), getService: method([], Service) },
      })
      const store = storeWith()

      const schema = store.getSchema(Chain)

      expect(schema.propertyNames).toEqual(['next', 'service', 'target'])
      expect(store.cache.has(ModelType.of(Link))).toBe(true)
      expect(store.cache.has(ModelType.of(Service))).toBe(false)
      expect(store.size()).toBe(2)
    })
  })

  describe('errors', () => {
    it('should reject a setter without a getter', () => {
      const Broken = defineContract('Broken')({ methods: { setName: method([Types.String]) } })

      const error = thrown(() => storeWith().getSchema(Broken))
      expect(error).toBeInstanceOf(OrphanSetterError)
      expect(error).toHaveProperty(
        'message',
        'Invalid managed model type Broken: property \'name\' has setter setName(String) but no getter.'
      )
    })

    it('should reject a setter whose type differs from the getter', () => {
      const Broken = defineContract('Broken')({
        methods: { getName: method([], Types.String), setName: method([Types.Integer]) },
      })

      const error = thrown(() => storeWith().getSchema(Broken))
      expect(error).toBeInstanceOf(PropertyTypeMismatchError)
      expect(error).toHaveProperty(
        'message',
        'Invalid managed model type Broken: property \'name\' has getter of type String but setter of type Integer.'
      )
    })

    it('should report the getter type first when the setter is declared more specifically', () => {
      const Base = defineContract('Base')({ methods: { getName: method([], Types.String) } })
      const Broken = defineContract('Broken')({
        extends: [Base],
        methods: { setName: method([Types.Integer]) },
      })

      const error = thrown(() => storeWith().getSchema(Broken))
      expect(error).toHaveProperty(
        'message',
        'Invalid managed model type Broken: property \'name\' has getter of type String but setter of type Integer.'
      )
    })

    it('should reject getters that disagree across supertypes', () => {
      const Left = defineContract('Left')({ methods: { getValue: method([], Types.String) } })
      const Right = defineContract('Right')({ methods: { getValue: method([], Types.Integer) } })
      const Both = defineContract('Both')({ extends: [Left, Right] })

      const error = thrown(() => storeWith().getSchema(Both))
      expect(error).toBeInstanceOf(DuplicatePropertyError)
      expect(error).toHaveProperty(
        'message',
        'Invalid managed model type Both: property \'value\' is declared more than once ' +
          'with conflicting types String and Integer.'
      )
    })

    it('should distinguish generic getter types', () => {
      const Left = defineContract('Left')({
        methods: { getItems: method([], ModelType.of(Types.List, ModelType.of(Types.String))) },
      })
      const Right = defineContract('Right')({
        methods: { getItems: method([], ModelType.of(Types.List, ModelType.of(Types.Integer))) },
      })

      const error = thrown(() => storeWith().getSchema(defineContract('Both')({ extends: [Left, Right] })))
      expect(error).toHaveProperty(
        'message',
        'Invalid managed model type Both: property \'items\' is declared more than once ' +
          'with conflicting types List<String> and List<Integer>.'
      )
    })

    it.each([
      ['a getter with parameters', 'getName', method([Types.String], Types.String), 'getName(String)', 'a getter takes no parameters'],
      ['a void getter', 'getName', method([]), 'getName()', 'a getter must return a value'],
      ['an is getter of a boxed type', 'isActive', method([], Types.Boolean), 'isActive()', "an 'is' getter takes no parameters and returns boolean"],
      ['a setter with two parameters', 'setName', method([Types.String, Types.String]), 'setName(String, String)', 'a setter takes exactly one parameter'],
      ['a setter returning a value', 'setName', method([Types.String], Types.String), 'setName(String)', 'a setter must return void'],
      ['a behavior method', 'compute', method([], Types.int), 'compute()', 'managed contracts may only declare getters and setters'],
    ])('should reject %s on a managed contract', (_label, name, signature, formatted, detail) => {
      const Broken = defineContract('Broken')({ methods: { [name]: signature } })

      const error = thrown(() => storeWith().getSchema(Broken))
      expect(error).toBeInstanceOf(UnsupportedAccessorError)
      expect(error).toHaveProperty(
        'message',
        `Invalid managed model type Broken: method ${formatted} is not a valid property accessor (${detail}).`
      )
    })

    it('should allow behavior methods on unmanaged contracts', () => {
      const Greeter = defineContract('Greeter')({
        managed: false,
        methods: { sayHello: method([], Types.String), getGreeting: method([], Types.String) },
      })

      const schema = storeWith().getSchema(Greeter)
      expect(schema.propertyNames).toEqual(['greeting'])
      expect(schema.getProperty('greeting')?.stateManagementType).toBe('unmanaged')
    })
  })

  describe('classification', () => {
    const Public = defineContract('Public')({
      managed: false,
      methods: { getSecret: method([], Types.String), setSecret: method([Types.String]) },
    })
    const Internal = defineContract('Internal')({ extends: [Public], managed: false })
    const Managed = defineContract('Managed')({
      extends: [Public],
      methods: { getTitle: method([], Types.String), setTitle: method([Types.String]) },
    })

    it('should classify properties of unmanaged contracts as unmanaged without a delegate', () => {
      const schema = storeWith().getSchema(Managed)

      expect(schema.getProperty('title')?.stateManagementType).toBe('managed')
      expect(schema.getProperty('secret')?.stateManagementType).toBe('unmanaged')
    })

    it('should classify them as delegated when the delegate implements the declaring contract', () => {
      const policy = new DefaultStateManagementPolicy([[Managed, Internal]])
      const schema = storeWith(policy).getSchema(Managed)

      expect(policy.delegateTypeFor(Managed)).toBe(Internal)
      expect(schema.getProperty('title')?.stateManagementType).toBe('managed')
      expect(schema.getProperty('secret')?.stateManagementType).toBe('delegated')
    })

    it('should ignore a delegate that does not implement the declaring contract', () => {
      const Unrelated = defineContract('Unrelated')({ managed: false })
      const policy = new DefaultStateManagementPolicy().registerDelegate(Managed, Unrelated)

      const schema = storeWith(policy).getSchema(Managed)
      expect(schema.getProperty('secret')?.stateManagementType).toBe('unmanaged')
    })

    it('should let a managed subtype take over a property by redeclaring it', () => {
      const Owned = defineContract('Owned')({
        extends: [Public],
        methods: { getSecret: method([], Types.String) },
      })

      const schema = storeWith().getSchema(Owned)
      expect(schema.getProperty('secret')?.stateManagementType).toBe('managed')
    })
  })
})
