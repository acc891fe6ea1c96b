/**
 * Canonical taxonomy record.
 *
 * Every mapper reads from and writes to this shape. The resolver passes it
 * through untouched and never inspects its fields.
 */

/**
 * Scalar values allowed in taxon properties.
 */
export type TaxonPropertyValue = string | number | boolean | null;

/**
 * Generic representation of a taxon (a node of a taxonomy tree).
 */
export interface TaxonEntity {
  /** Unique taxon identifier */
  readonly id: string;
  /** Identifier of the taxonomy this taxon belongs to */
  readonly taxonomyId: string;
  /** Parent taxon, absent for roots */
  readonly parentId?: string | null;
  /** Invariant (culture-neutral) name */
  readonly name: string;
  /** Display names keyed by culture code, e.g. `en`, `da-DK` */
  readonly displayNames?: Readonly<Record<string, string>>;
  /** Free-form properties */
  readonly properties?: Readonly<Record<string, TaxonPropertyValue>>;
}
