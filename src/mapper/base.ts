/**
 * Mapper contract and a stateless base class.
 *
 * A mapper converts between the canonical `TaxonEntity` and one (or more)
 * external types, and says which types it handles through `canHandle`.
 * The resolver only ever talks to mappers through this interface.
 *
 * @example
 * ```typescript
 * class CampaignMapper extends BaseMapper<Campaign> {
 *   readonly name = 'campaign_mapper';
 *
 *   constructor() {
 *     super(typeOf(Campaign));
 *   }
 *
 *   protected fromEntity(entity: TaxonEntity): Campaign {
 *     return new Campaign(entity.id, entity.name);
 *   }
 *
 *   protected toEntity(campaign: Campaign): TaxonEntity {
 *     return { id: campaign.id, taxonomyId: 'campaigns', name: campaign.name };
 *   }
 * }
 * ```
 */

import { ConversionError } from '../registry/errors.js';
import type { TaxonEntity } from '../types/canonical-entity.js';
import { type MapResult, mapFailure, mapSuccess } from '../types/map-result.js';
import { sameType, type TypeDescriptor } from '../types/type-descriptor.js';

/**
 * Capability contract every mapper implements.
 */
export interface Mapper {
  /** Name used in logs, events and errors */
  readonly name?: string;

  /**
   * Whether this mapper converts to and from the given type.
   *
   * Must be pure: it is called repeatedly during registry scans.
   */
  canHandle(type: TypeDescriptor): boolean;

  /**
   * Convert a canonical entity to an instance of the handled type.
   *
   * May throw a conversion-specific error.
   */
  convertFrom(entity: TaxonEntity): unknown;

  /**
   * Non-throwing variant of `convertFrom`.
   */
  tryConvertFrom(entity: TaxonEntity): MapResult<unknown>;

  /**
   * Convert an instance of the handled type back to a canonical entity.
   *
   * May throw a conversion-specific error.
   */
  convertTo(instance: unknown): TaxonEntity;
}

/**
 * Display name of a mapper: its `name`, or its class name.
 */
export function mapperName(mapper: Mapper): string {
  return mapper.name || mapper.constructor.name || 'anonymous_mapper';
}

/**
 * Base class for mappers handling exactly one type.
 *
 * Holds nothing but its readonly target descriptor.
 */
export abstract class BaseMapper<T> implements Mapper {
  readonly targetType: TypeDescriptor<T>;

  protected constructor(targetType: TypeDescriptor<T>) {
    this.targetType = targetType;
  }

  canHandle(type: TypeDescriptor): boolean {
    return sameType(type, this.targetType);
  }

  convertFrom(entity: TaxonEntity): T {
    return this.fromEntity(entity);
  }

  tryConvertFrom(entity: TaxonEntity): MapResult<T> {
    try {
      return mapSuccess(this.fromEntity(entity));
    } catch (error) {
      return mapFailure(error);
    }
  }

  convertTo(instance: unknown): TaxonEntity {
    if (!this.targetType.is(instance)) {
      throw new ConversionError(
        `${mapperName(this)} cannot convert a value that is not a '${this.targetType.name}'`
      );
    }
    return this.toEntity(instance);
  }

  protected abstract fromEntity(entity: TaxonEntity): T;

  protected abstract toEntity(instance: T): TaxonEntity;
}
