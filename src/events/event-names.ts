/**
 * Event names emitted by the type mapper.
 */

/**
 * Event names for mapper registration and resolution
 */
export const MapperEventNames = {
  /** Emitted after a mapper is appended to the registry, including constructor mappers */
  MAPPER_REGISTERED: 'mapper.registered',

  /** Emitted when a type is resolved by a registry scan and cached */
  MAPPER_RESOLVED: 'mapper.resolved',

  /** Emitted when a registry scan finds no mapper for a type */
  MAPPER_NOT_FOUND: 'mapper.not_found',

  /** Emitted when more than one mapper can handle a type */
  MAPPER_AMBIGUOUS: 'mapper.ambiguous',
} as const;

export type MapperEventName = (typeof MapperEventNames)[keyof typeof MapperEventNames];
