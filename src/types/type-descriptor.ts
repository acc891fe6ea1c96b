/**
 * Runtime type identity for mapper resolution.
 *
 * A `TypeDescriptor` is a first-class value standing for "a type". Its `key`
 * is the resolution cache key: two descriptors for the same logical type
 * always carry the same key within one process. Keys are not meant to be
 * persisted or compared across processes.
 *
 * @example
 * ```typescript
 * class Campaign {}
 * const campaign = typeOf(Campaign);
 * sameType(campaign, typeOf(Campaign)); // true
 *
 * interface ChannelRecord { channelId: string }
 * const channel = defineType<ChannelRecord>('ChannelRecord', (v): v is ChannelRecord =>
 *   typeof v === 'object' && v !== null && 'channelId' in v
 * );
 * ```
 */

/**
 * A class whose instances are of type `T`.
 */
export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * Stable descriptor of a target type.
 */
export interface TypeDescriptor<T = unknown> {
  /** Stable identity, used as the cache key */
  readonly key: string;
  /** Display name for logs and errors */
  readonly name: string;
  /** Runtime membership check */
  is(value: unknown): value is T;
}

/**
 * Anything accepted where a target type is expected.
 */
export type TypeRef<T = unknown> = Constructor<T> | TypeDescriptor<T>;

/**
 * Symbol under which a value may carry its own descriptor.
 *
 * Takes precedence over the value's constructor in `runtimeTypeOf`.
 */
export const TYPE_TAG: unique symbol = Symbol.for('taxon-mapper.type');

// Keys are handed out once per constructor for the life of the process.
// biome-ignore lint/complexity/noBannedTypes: keys are tracked for any callable prototype owner
const constructorKeys = new WeakMap<Function, string>();
let nextConstructorId = 0;

// biome-ignore lint/complexity/noBannedTypes: see constructorKeys
function keyForConstructor(ctor: Function): string {
  const existing = constructorKeys.get(ctor);
  if (existing !== undefined) {
    return existing;
  }

  nextConstructorId += 1;
  const key = `${ctor.name || 'anonymous'}#${nextConstructorId}`;
  constructorKeys.set(ctor, key);
  return key;
}

/**
 * Descriptor for a class.
 *
 * Distinct classes sharing a name get distinct keys.
 */
export function typeOf<T>(ctor: Constructor<T>): TypeDescriptor<T> {
  return {
    key: keyForConstructor(ctor),
    name: ctor.name || 'anonymous',
    is: (value: unknown): value is T => value instanceof ctor,
  };
}

/**
 * Nominal descriptor for shapes that have no class of their own.
 */
export function defineType<T>(name: string, guard: (value: unknown) => value is T): TypeDescriptor<T> {
  if (!name) {
    throw new Error('Type name must be a non-empty string');
  }

  return {
    key: `type:${name}`,
    name,
    is: guard,
  };
}

/**
 * Check whether a value is a type descriptor.
 */
export function isTypeDescriptor(value: unknown): value is TypeDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'is' in value &&
    typeof value.is === 'function'
  );
}

/**
 * Normalize a constructor or descriptor to a descriptor.
 */
export function toDescriptor<T>(ref: TypeRef<T>): TypeDescriptor<T> {
  if (typeof ref === 'function') {
    return typeOf(ref);
  }
  return ref;
}

/**
 * Type equality by identity key.
 */
export function sameType(a: TypeRef, b: TypeRef): boolean {
  return toDescriptor(a).key === toDescriptor(b).key;
}

/**
 * Attach a descriptor to a value so that `runtimeTypeOf` reports it.
 *
 * The tag is non-enumerable and does not show up in JSON output.
 */
export function tagType<T extends object>(value: T, type: TypeDescriptor<T>): T {
  Object.defineProperty(value, TYPE_TAG, {
    value: type,
    enumerable: false,
    configurable: true,
  });
  return value;
}

/**
 * Runtime type of a value.
 *
 * A descriptor carried under `TYPE_TAG` wins; otherwise the descriptor of
 * the value's constructor. Values without a prototype report `null-prototype`.
 * Primitives are not accepted; `Reflect.get` throws a `TypeError` on them.
 */
export function runtimeTypeOf(value: object): TypeDescriptor {
  const tagged: unknown = Reflect.get(value, TYPE_TAG);
  if (isTypeDescriptor(tagged)) {
    return tagged;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || typeof proto !== 'object') {
    return nullPrototype;
  }

  const ctor: unknown = Reflect.get(proto, 'constructor');
  if (typeof ctor !== 'function') {
    return nullPrototype;
  }

  return {
    key: keyForConstructor(ctor),
    name: ctor.name || 'anonymous',
    is: (candidate: unknown): candidate is object => candidate instanceof ctor,
  };
}

const nullPrototype = defineType(
  'null-prototype',
  (value: unknown): value is object =>
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === null
);
