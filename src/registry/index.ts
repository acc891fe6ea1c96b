/**
 * Mapper registry, resolution cache and type-directed dispatch.
 *
 * - `TaxonomyTypeMapper`: resolves and invokes the mapper for a type
 * - `MapperRegistry`: ordered, append-only mapper collection
 * - `ResolutionCache`: write-once type key to mapper cache
 *
 * @example
 * ```typescript
 * import { TaxonomyTypeMapper } from './registry';
 *
 * const typeMapper = new TaxonomyTypeMapper([new CampaignMapper()]);
 * typeMapper.register(new ChannelMapper());
 *
 * const campaign = typeMapper.mapTyped(entity, Campaign);
 * ```
 */

export {
  AmbiguousMapperError,
  ConversionError,
  InvalidArgumentError,
  MapperNotFoundError,
  MappingError,
  UnexpectedResultTypeError,
} from './errors.js';
export { MapperRegistry } from './mapper-registry.js';
export { ResolutionCache } from './resolution-cache.js';
export { TaxonomyTypeMapper, type TypeMapperOptions } from './type-mapper.js';
