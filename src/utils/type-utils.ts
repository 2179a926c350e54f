/**
 * Naming conventions shared by model definitions and relationship descriptors
 *
 * @module utils/type-utils
 */

import pluralize from 'pluralize'

/**
 * Convert a camelCase / PascalCase identifier to snake_case
 *
 * @example
 * toSnakeCase('MovieRole') // 'movie_role'
 * toSnakeCase('placeOfBirth') // 'place_of_birth'
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase()
}

/**
 * Convert a model name to its collection name (snake_case, pluralized)
 *
 * Uses the 'pluralize' library for proper English pluralization:
 * - Regular plurals: Movie -> movies, Actor -> actors
 * - Irregular plurals: Person -> people
 * - Compound names: MovieRole -> movie_roles
 *
 * @example
 * modelToCollection('Movie') // 'movies'
 * modelToCollection('Person') // 'people'
 * modelToCollection('DirectorRef') // 'director_refs'
 */
export function modelToCollection(model: string): string {
  const snake = toSnakeCase(model)
  const parts = snake.split('_')
  const last = parts.pop() ?? snake
  return [...parts, pluralize.plural(last)].join('_')
}

/**
 * Default foreign key for a single-valued reference
 *
 * @example
 * foreignKeyFor('residence') // 'residence_id'
 * foreignKeyFor('sequelTo') // 'sequel_to_id'
 */
export function foreignKeyFor(relation: string): string {
  return `${toSnakeCase(relation)}_id`
}

/**
 * Default id-array key for a many-valued reference
 *
 * @example
 * idsKeyFor('writers') // 'writer_ids'
 * idsKeyFor('movies') // 'movie_ids'
 */
export function idsKeyFor(relation: string): string {
  return `${pluralize.singular(toSnakeCase(relation))}_ids`
}
