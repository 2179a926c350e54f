/**
 * Type Cast Utilities
 *
 * IMPORTANT: These are intentional escape hatches for scenarios where
 * TypeScript's type system cannot express the actual runtime relationship
 * between types. Each function documents why the cast is safe.
 */

import type { Entity } from '../entity/Entity'

/**
 * View an entity through the typed accessors of its model definition.
 *
 * @remarks Safe because the typed accessor interfaces only narrow the
 * signatures of methods every Entity already has; callers check that the
 * entity belongs to the model the types were inferred from.
 */
export function asTypedEntity<E extends Entity>(entity: Entity): E {
  return entity as E
}
