/**
 * Core data types: canonical entity, type identity and map results.
 *
 * @module types
 */

export type { TaxonEntity, TaxonPropertyValue } from './canonical-entity.js';
export {
  isMapSuccess,
  type MapFailure,
  type MapResult,
  type MapSuccess,
  mapFailure,
  mapSuccess,
  toError,
} from './map-result.js';
export {
  type Constructor,
  defineType,
  isTypeDescriptor,
  runtimeTypeOf,
  sameType,
  TYPE_TAG,
  tagType,
  type TypeDescriptor,
  type TypeRef,
  toDescriptor,
  typeOf,
} from './type-descriptor.js';
