/**
 * Managed Model Errors
 * ====================
 *
 * Every failure raised by schema extraction, proxy generation and generated
 * instances is a `ManagedModelError` carrying a stable `code`. Messages name
 * the contract type, never a synthesized implementation.
 */

/** Stable error codes, grouped by the phase that raises them. */
export enum ErrorCode {
  // Type descriptors
  INVALID_MODEL_TYPE = 'invalid-model-type',
  UNKNOWN_INSTANCE_TYPE = 'unknown-instance-type',

  // Schema extraction
  ORPHAN_SETTER = 'orphan-setter',
  PROPERTY_TYPE_MISMATCH = 'property-type-mismatch',
  DUPLICATE_PROPERTY = 'duplicate-property',
  UNSUPPORTED_ACCESSOR = 'unsupported-accessor',

  // Proxy generation
  PROXY_GENERATION = 'proxy-generation',

  // Generated instances
  MISSING_PROPERTY = 'missing-property',
  READ_ONLY_PROPERTY = 'read-only-property',
  MISSING_METHOD = 'missing-method',
}

export class ManagedModelError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** Raised for malformed type descriptors and contract definitions. */
export class InvalidModelTypeError extends ManagedModelError {
  constructor(message: string) {
    super(ErrorCode.INVALID_MODEL_TYPE, message)
  }
}

export class UnknownInstanceTypeError extends ManagedModelError {
  constructor(description: string) {
    super(ErrorCode.UNKNOWN_INSTANCE_TYPE, `Cannot determine the managed type of ${description}.`)
  }
}

// =============================================================================
// EXTRACTION
// =============================================================================

/**
 * Base for all failures of a single extraction call. Nothing is cached when
 * one of these is thrown.
 */
export abstract class SchemaExtractionError extends ManagedModelError {
  readonly typeName: string
  /** The offending property, or method for unsupported accessors. */
  readonly memberName: string

  protected constructor(code: ErrorCode, typeName: string, memberName: string, detail: string) {
    super(code, `Invalid managed model type ${typeName}: ${detail}.`)
    this.typeName = typeName
    this.memberName = memberName
  }
}

export class OrphanSetterError extends SchemaExtractionError {
  constructor(typeName: string, propertyName: string, setter: string) {
    super(ErrorCode.ORPHAN_SETTER, typeName, propertyName, `property '${propertyName}' has setter ${setter} but no getter`)
  }
}

export class PropertyTypeMismatchError extends SchemaExtractionError {
  constructor(typeName: string, propertyName: string, getterType: string, setterType: string) {
    super(
      ErrorCode.PROPERTY_TYPE_MISMATCH,
      typeName,
      propertyName,
      `property '${propertyName}' has getter of type ${getterType} but setter of type ${setterType}`
    )
  }
}

export class DuplicatePropertyError extends SchemaExtractionError {
  constructor(typeName: string, propertyName: string, firstType: string, secondType: string) {
    super(
      ErrorCode.DUPLICATE_PROPERTY,
      typeName,
      propertyName,
      `property '${propertyName}' is declared more than once with conflicting types ${firstType} and ${secondType}`
    )
  }
}

export class UnsupportedAccessorError extends SchemaExtractionError {
  constructor(typeName: string, method: string, detail: string) {
    super(ErrorCode.UNSUPPORTED_ACCESSOR, typeName, method, `method ${method} is not a valid property accessor (${detail})`)
  }
}

// =============================================================================
// GENERATION
// =============================================================================

export class ProxyGenerationError extends ManagedModelError {
  readonly typeName: string

  constructor(typeName: string, reason: string) {
    super(ErrorCode.PROXY_GENERATION, `Cannot generate implementation for ${typeName}: ${reason}.`)
    this.typeName = typeName
  }
}

// =============================================================================
// RUNTIME ACCESS
// =============================================================================

export class MissingPropertyError extends ManagedModelError {
  readonly propertyName: string

  constructor(propertyName: string, typeName: string) {
    super(ErrorCode.MISSING_PROPERTY, `No such property: ${propertyName} for class: ${typeName}`)
    this.propertyName = propertyName
  }
}

export class ReadOnlyPropertyError extends ManagedModelError {
  readonly propertyName: string

  constructor(propertyName: string, typeName: string) {
    super(ErrorCode.READ_ONLY_PROPERTY, `Cannot set readonly property: ${propertyName} for class: ${typeName}`)
    this.propertyName = propertyName
  }
}

export class MissingMethodError extends ManagedModelError {
  readonly methodName: string

  constructor(methodName: string, typeName: string, argumentTypes: readonly string[], values: readonly string[]) {
    super(
      ErrorCode.MISSING_METHOD,
      `No signature of method: ${typeName}.${methodName}() is applicable for argument types: ` +
        `(${argumentTypes.join(', ')}) values: [${values.join(', ')}]`
    )
    this.methodName = methodName
  }
}
