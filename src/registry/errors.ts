/**
 * Error types for mapper registration, resolution and conversion.
 */

import type { TypeDescriptor } from '../types/type-descriptor.js';

/**
 * Base error class for mapping errors.
 */
export class MappingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MappingError';
  }
}

/**
 * Error thrown when a required argument is missing or of the wrong kind.
 */
export class InvalidArgumentError extends MappingError {
  readonly argumentName: string;

  constructor(argumentName: string, problem = 'must not be null or undefined') {
    super(`Argument '${argumentName}' ${problem}`);
    this.name = 'InvalidArgumentError';
    this.argumentName = argumentName;
  }
}

/**
 * Error thrown when no registered mapper can handle a type.
 */
export class MapperNotFoundError extends MappingError {
  readonly typeKey: string;
  readonly typeName: string;

  constructor(type: TypeDescriptor) {
    super(`No mapper registered for type '${type.name}' (key '${type.key}')`);
    this.name = 'MapperNotFoundError';
    this.typeKey = type.key;
    this.typeName = type.name;
  }
}

/**
 * Error thrown under the `error` overlap policy when several mappers can
 * handle the same type.
 */
export class AmbiguousMapperError extends MappingError {
  readonly typeKey: string;
  readonly mapperNames: string[];

  constructor(type: TypeDescriptor, mapperNames: string[]) {
    super(`Type '${type.name}' is handled by more than one mapper: ${mapperNames.join(', ')}`);
    this.name = 'AmbiguousMapperError';
    this.typeKey = type.key;
    this.mapperNames = mapperNames;
  }
}

/**
 * Error thrown by the typed facades when a mapper produced a value that is
 * not of the requested type.
 */
export class UnexpectedResultTypeError extends MappingError {
  readonly typeKey: string;
  readonly actualType: string;

  constructor(type: TypeDescriptor, actual: unknown) {
    const actualType = describeValue(actual);
    super(`Mapper for type '${type.name}' returned a value of type '${actualType}'`);
    this.name = 'UnexpectedResultTypeError';
    this.typeKey = type.key;
    this.actualType = actualType;
  }
}

/**
 * Error for mappers to raise when a conversion fails.
 *
 * The resolver never raises this itself; it passes it through from `map`
 * and `mapToEntity`, and captures it in `tryMap`.
 */
export class ConversionError extends MappingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || typeof proto !== 'object') {
      return 'object';
    }
    const ctor: unknown = Reflect.get(proto, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}
