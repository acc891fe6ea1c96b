/**
 * Ordered, append-only collection of mappers.
 *
 * Registration replaces the backing array instead of mutating it, so a
 * scan walking a `snapshot()` never sees a partially applied append, even
 * when a mapper registers another mapper from inside `canHandle`.
 */

import { type Mapper, mapperName } from '../mapper/base.js';
import { InvalidArgumentError } from './errors.js';

export class MapperRegistry {
  private mappers: readonly Mapper[] = [];

  /**
   * Create a registry, optionally seeded with a fixed list.
   *
   * @throws InvalidArgumentError if any entry is null or undefined
   */
  constructor(initial: Iterable<Mapper> = []) {
    for (const mapper of initial) {
      this.register(mapper);
    }
  }

  /**
   * Append a mapper. Later registrations lose ties against earlier ones.
   *
   * @throws InvalidArgumentError if mapper is null or undefined
   */
  register(mapper: Mapper): void {
    if (mapper === null || mapper === undefined) {
      throw new InvalidArgumentError('mapper');
    }
    this.mappers = [...this.mappers, mapper];
  }

  /**
   * Current mappers in registration order.
   */
  snapshot(): readonly Mapper[] {
    return this.mappers;
  }

  count(): number {
    return this.mappers.length;
  }

  /**
   * Names of the registered mappers in registration order.
   */
  list(): string[] {
    return this.mappers.map(mapperName);
  }
}
