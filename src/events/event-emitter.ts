/**
 * Typed event emitter for mapper registration and resolution.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import { MapperEventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface MapperRegisteredPayload {
  mapperName: string;
  registeredAt: Date;
}

export interface MapperResolvedPayload {
  typeKey: string;
  typeName: string;
  mapperName: string;
  resolvedAt: Date;
}

export interface MapperNotFoundPayload {
  typeKey: string;
  typeName: string;
  /** Number of mappers checked */
  scanned: number;
}

export interface MapperAmbiguousPayload {
  typeKey: string;
  typeName: string;
  /** Matching mappers in registration order; the first one is the one chosen */
  mapperNames: string[];
}

/**
 * Event map for type-safe event handling
 */
export interface MapperEventMap {
  'mapper.registered': (payload: MapperRegisteredPayload) => void;
  'mapper.resolved': (payload: MapperResolvedPayload) => void;
  'mapper.not_found': (payload: MapperNotFoundPayload) => void;
  'mapper.ambiguous': (payload: MapperAmbiguousPayload) => void;
}

/**
 * Type-safe event emitter for mapper events
 */
export class MapperEventEmitter extends EventEmitter<MapperEventMap> {
  private readonly instanceId: string;

  constructor() {
    super();
    this.instanceId = randomUUID();
  }

  /**
   * Get the unique instance ID for this emitter
   */
  getInstanceId(): string {
    return this.instanceId;
  }

  emitRegistered(mapperName: string): void {
    this.emit(MapperEventNames.MAPPER_REGISTERED, {
      mapperName,
      registeredAt: new Date(),
    });
  }

  emitResolved(typeKey: string, typeName: string, mapperName: string): void {
    this.emit(MapperEventNames.MAPPER_RESOLVED, {
      typeKey,
      typeName,
      mapperName,
      resolvedAt: new Date(),
    });
  }

  emitNotFound(typeKey: string, typeName: string, scanned: number): void {
    this.emit(MapperEventNames.MAPPER_NOT_FOUND, { typeKey, typeName, scanned });
  }

  emitAmbiguous(typeKey: string, typeName: string, mapperNames: string[]): void {
    this.emit(MapperEventNames.MAPPER_AMBIGUOUS, { typeKey, typeName, mapperNames });
  }
}
