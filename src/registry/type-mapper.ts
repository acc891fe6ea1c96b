/**
 * Type-directed mapper resolution and dispatch.
 *
 * Finds the one registered mapper able to convert between `TaxonEntity`
 * and a target type, remembers the answer per type key, and invokes it.
 *
 * Resolution process:
 * 1. Look the type key up in the resolution cache
 * 2. Otherwise scan the registry in registration order; the first mapper
 *    whose `canHandle` returns true wins
 * 3. Cache the match; a miss throws `MapperNotFoundError` and is not cached,
 *    so a mapper registered later is found on the next call
 *
 * @example
 * ```typescript
 * const typeMapper = new TaxonomyTypeMapper([new CampaignMapper()]);
 *
 * const campaign = typeMapper.mapTyped(entity, Campaign);
 * const entityAgain = typeMapper.mapToEntity(campaign);
 *
 * const probe = typeMapper.tryMap(entity, Channel);
 * if (!probe.success) {
 *   // no mapper for Channel, or the conversion failed
 * }
 * ```
 */

import { type MapperConfig, resolveConfig } from '../config/index.js';
import type { MapperEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { type Mapper, mapperName } from '../mapper/base.js';
import type { TaxonEntity } from '../types/canonical-entity.js';
import { type MapResult, mapFailure, mapSuccess } from '../types/map-result.js';
import {
  runtimeTypeOf,
  type TypeDescriptor,
  type TypeRef,
  toDescriptor,
} from '../types/type-descriptor.js';
import {
  AmbiguousMapperError,
  InvalidArgumentError,
  MapperNotFoundError,
  UnexpectedResultTypeError,
} from './errors.js';
import { MapperRegistry } from './mapper-registry.js';
import { ResolutionCache } from './resolution-cache.js';

const log = createLogger({ component: 'type-mapper' });

/**
 * Options for constructing a type mapper.
 */
export interface TypeMapperOptions {
  /**
   * Overlap policy override. Logging settings belong to the process-wide
   * root logger (see `configureLogging`), so only the policy is taken here.
   */
  config?: Pick<Partial<MapperConfig>, 'overlapPolicy'>;

  /** Emitter notified of registrations and resolutions */
  events?: MapperEventEmitter;
}

function requireArgument<T>(value: T | null | undefined, name: string): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(name);
  }
}

/**
 * Resolver and dispatcher over an owned mapper registry and resolution cache.
 */
export class TaxonomyTypeMapper {
  private readonly registry: MapperRegistry;
  private readonly cache: ResolutionCache = new ResolutionCache();
  private readonly config: MapperConfig;
  private readonly events: MapperEventEmitter | undefined;

  /**
   * @param mappers - Mappers to register up front, in order
   * @param options - Configuration overrides and event emitter
   * @throws InvalidArgumentError if mappers or any entry is null or undefined
   */
  constructor(mappers: Iterable<Mapper> = [], options: TypeMapperOptions = {}) {
    requireArgument(mappers, 'mappers');
    this.config = resolveConfig({ overlapPolicy: options.config?.overlapPolicy });
    this.events = options.events;
    this.registry = new MapperRegistry();
    for (const mapper of mappers) {
      this.register(mapper);
    }
  }

  /**
   * Register an additional mapper.
   *
   * Types that previously failed to resolve are looked up again on their
   * next request. Types already resolved keep their cached mapper.
   *
   * @throws InvalidArgumentError if mapper is null or undefined
   */
  register(mapper: Mapper): void {
    this.registry.register(mapper);

    const name = mapperName(mapper);
    log.debug('Mapper registered', {
      operation: 'register',
      mapper_name: name,
      mapper_count: this.registry.count(),
    });
    this.events?.emitRegistered(name);
  }

  /**
   * Find the mapper for a type.
   *
   * @throws InvalidArgumentError if type is null or undefined
   * @throws MapperNotFoundError if no registered mapper handles the type
   * @throws AmbiguousMapperError under the `error` overlap policy
   */
  resolve(type: TypeRef): Mapper {
    requireArgument(type, 'type');
    return this.resolveDescriptor(toDescriptor(type));
  }

  /**
   * Convert a canonical entity to the given type.
   *
   * The mapper's result is returned as is.
   *
   * @throws InvalidArgumentError if data or type is null or undefined
   * @throws MapperNotFoundError if no registered mapper handles the type
   */
  map(data: TaxonEntity, type: TypeRef): unknown {
    requireArgument(type, 'type');
    requireArgument(data, 'data');

    return this.resolveDescriptor(toDescriptor(type)).convertFrom(data);
  }

  /**
   * Typed form of `map`.
   *
   * @throws UnexpectedResultTypeError if the mapper returned a value that is not a `T`
   */
  mapTyped<T>(data: TaxonEntity, type: TypeRef<T>): T {
    requireArgument(type, 'type');
    const descriptor = toDescriptor(type);

    const value = this.map(data, descriptor);
    if (!descriptor.is(value)) {
      throw new UnexpectedResultTypeError(descriptor, value);
    }
    return value;
  }

  /**
   * Convert a canonical entity without throwing.
   *
   * Only a missing type throws. A missing mapper, an ambiguous match, a
   * failed conversion or a throwing mapper all come back as a failure result.
   *
   * @throws InvalidArgumentError if type is null or undefined
   */
  tryMap(data: TaxonEntity, type: TypeRef): MapResult<unknown> {
    requireArgument(type, 'type');
    const descriptor = toDescriptor(type);

    return this.captureFailure(descriptor, () =>
      this.resolveDescriptor(descriptor).tryConvertFrom(data)
    );
  }

  /**
   * Typed form of `tryMap`.
   *
   * A value that is not a `T` comes back as a failure carrying
   * `UnexpectedResultTypeError`.
   *
   * @throws InvalidArgumentError if type is null or undefined
   */
  tryMapTyped<T>(data: TaxonEntity, type: TypeRef<T>): MapResult<T> {
    requireArgument(type, 'type');
    const descriptor = toDescriptor(type);

    const result = this.tryMap(data, descriptor);
    if (!result.success) {
      return result;
    }
    const value = result.value;
    if (!descriptor.is(value)) {
      return mapFailure(new UnexpectedResultTypeError(descriptor, value));
    }
    return mapSuccess(value);
  }

  /**
   * Convert an instance back to a canonical entity.
   *
   * The mapper is resolved from the instance's runtime type, through the
   * same cache and scan as the forward direction.
   *
   * @throws InvalidArgumentError if instance is null, undefined or not an object
   * @throws MapperNotFoundError if no registered mapper handles the runtime type
   */
  mapToEntity(instance: object): TaxonEntity {
    requireArgument(instance, 'instance');
    if (typeof instance !== 'object' && typeof instance !== 'function') {
      throw new InvalidArgumentError('instance', 'must be an object');
    }

    return this.resolveDescriptor(runtimeTypeOf(instance)).convertTo(instance);
  }

  /**
   * Whether some registered mapper handles the type.
   *
   * Errors thrown by a mapper's `canHandle` still propagate.
   *
   * @throws InvalidArgumentError if type is null or undefined
   */
  canMap(type: TypeRef): boolean {
    requireArgument(type, 'type');

    try {
      this.resolveDescriptor(toDescriptor(type));
      return true;
    } catch (error) {
      if (error instanceof MapperNotFoundError || error instanceof AmbiguousMapperError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Whether the type already has a cached mapper.
   */
  isResolved(type: TypeRef): boolean {
    requireArgument(type, 'type');
    return this.cache.has(toDescriptor(type).key);
  }

  mapperCount(): number {
    return this.registry.count();
  }

  /**
   * Names of the registered mappers in registration order.
   */
  listMappers(): string[] {
    return this.registry.list();
  }

  /**
   * Get debug information about the mapper state.
   */
  debugInfo(): Record<string, unknown> {
    return {
      mapperCount: this.registry.count(),
      mappers: this.registry.list(),
      cachedTypes: this.cache.keys(),
      overlapPolicy: this.config.overlapPolicy,
    };
  }

  private resolveDescriptor(type: TypeDescriptor): Mapper {
    const cached = this.cache.get(type.key);
    if (cached) {
      return cached;
    }

    const candidates = this.registry.snapshot();
    const mapper =
      this.config.overlapPolicy === 'first_match'
        ? candidates.find((candidate) => candidate.canHandle(type))
        : this.findWithOverlapCheck(type, candidates);

    if (!mapper) {
      log.debug('No mapper found for type', {
        operation: 'resolve',
        type_key: type.key,
        type_name: type.name,
        scanned: candidates.length,
      });
      this.events?.emitNotFound(type.key, type.name, candidates.length);
      throw new MapperNotFoundError(type);
    }

    // A re-entrant call may have filled the key during the scan; keep its mapper.
    const resolved = this.cache.store(type.key, mapper);
    const name = mapperName(resolved);
    log.debug('Mapper resolved', {
      operation: 'resolve',
      type_key: type.key,
      type_name: type.name,
      mapper_name: name,
    });
    this.events?.emitResolved(type.key, type.name, name);
    return resolved;
  }

  /**
   * Scan every candidate and apply the overlap policy to multiple matches.
   */
  private findWithOverlapCheck(
    type: TypeDescriptor,
    candidates: readonly Mapper[]
  ): Mapper | undefined {
    const matches = candidates.filter((candidate) => candidate.canHandle(type));
    if (matches.length === 0) {
      return undefined;
    }

    if (matches.length > 1) {
      const names = matches.map(mapperName);
      this.events?.emitAmbiguous(type.key, type.name, names);

      if (this.config.overlapPolicy === 'error') {
        throw new AmbiguousMapperError(type, names);
      }
      log.warn('Multiple mappers handle type, using the first registered', {
        operation: 'resolve',
        type_key: type.key,
        type_name: type.name,
        mapper_names: names.join(', '),
      });
    }

    return matches[0];
  }

  /**
   * Turn anything thrown by an attempt into a failure result.
   */
  private captureFailure<T>(type: TypeDescriptor, attempt: () => MapResult<T>): MapResult<T> {
    try {
      return attempt();
    } catch (error) {
      const failure = mapFailure(error);
      log.debug('Mapping attempt failed', {
        operation: 'try_map',
        type_key: type.key,
        type_name: type.name,
        error_message: failure.error.message,
      });
      return failure;
    }
  }
}
