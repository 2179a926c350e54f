/**
 * Model definition types
 *
 * A model is declared with a field map and a relation map. Field specs carry
 * their value type and alias as type parameters so entity accessors can be
 * typed from the declaration alone:
 *
 * ```typescript
 * const fields = {
 *   name: field('string', { required: true }),
 *   birthName: field('string', { as: 'birth_name' }),
 *   height: field('measurement'),
 * }
 * // AttributeValue<typeof fields, 'birth_name'> is string
 * ```
 *
 * @module schema/types
 */

import type { AnyCodec, Codec } from '../codecs/types'
import type { Measurement } from '../codecs/measurement'
import type { Point } from '../codecs/point'
import type { DocumentValue, RawDocument } from '../types/document'
import type { Filter } from '../types/filter'

// =============================================================================
// Fields
// =============================================================================

/** Value types of the codecs every registry holds */
export interface BuiltinCodecTypes {
  string: string
  integer: number
  number: number
  boolean: boolean
  date: Date
  array: DocumentValue[]
  list: DocumentValue[]
  object: RawDocument
  measurement: Measurement
  point: Point
}

/** Static value or a factory evaluated per entity */
export type FieldDefault<T> = T | (() => T)

/**
 * Options accepted by `field()`
 */
export interface FieldOptions<T, A extends string> {
  /** Alternate name that reads and writes the same stored key */
  as?: A
  /** Applied at construction when the field is not supplied */
  default?: FieldDefault<T>
  /** Presence is checked by validation */
  required?: boolean
  /** Extra constraint; return a message to fail */
  validate?(value: T): string | undefined
}

/**
 * Declared field. `T` is the decoded value type, `A` the alias (never when
 * the field has none).
 */
export interface FieldSpec<T = unknown, A extends string = string> {
  readonly codec: string | Codec<T>
  readonly alias: A | undefined
  readonly default: FieldDefault<T> | undefined
  readonly required: boolean
  validate?(value: T): string | undefined
}

export type FieldMap = Record<string, FieldSpec>

type FieldValue<S> = S extends FieldSpec<infer T, string> ? T : never

type AliasOf<S> = S extends FieldSpec<infer _T, infer A> ? A : never

/** Every name an attribute can be addressed by: raw keys, aliases and `_id` */
export type AttributeName<F extends FieldMap> =
  | (keyof F & string)
  | { [K in keyof F]: AliasOf<F[K]> }[keyof F]
  | '_id'

type AliasedValue<F extends FieldMap, N extends string> = {
  [K in keyof F]: [AliasOf<F[K]>] extends [never]
    ? never
    : N extends AliasOf<F[K]> ? FieldValue<F[K]> : never
}[keyof F]

/** Decoded value type of an attribute, by raw key or alias */
export type AttributeValue<F extends FieldMap, N extends string> =
  N extends '_id' ? string
  : N extends keyof F ? FieldValue<F[N]>
  : AliasedValue<F, N>

/** Attribute input for `build`, `create` and `assign` */
export type AttributeInput<F extends FieldMap> = {
  [N in AttributeName<F>]?: AttributeValue<F, N> | DocumentValue | undefined
}

// =============================================================================
// Relations
// =============================================================================

/** Cleanup policy applied to related documents when the owner is destroyed */
export type CascadePolicy = 'orphan' | 'nullify' | 'destroy' | 'delete' | 'restrict'

export const CASCADE_POLICIES: readonly CascadePolicy[] = ['orphan', 'nullify', 'destroy', 'delete', 'restrict']

/** Single embedded value stored under the owner's document */
export interface EmbedOneSpec {
  readonly kind: 'embed-one'
  readonly target: string
  /** Document key (default: relation name) */
  readonly field?: string
  /** Capability the target is embedded as, e.g. 'locatable' */
  readonly as?: string
}

/** Ordered embedded values, each with an `_id` unique within the owner */
export interface EmbedManySpec {
  readonly kind: 'embed-many'
  readonly target: string
  readonly field?: string
}

/** The holder stores the target's id */
export interface RefOneSpec {
  readonly kind: 'ref-one'
  readonly target: string
  /** Default `<relation>_id`; may be `_id` for an embedded holder */
  readonly foreignKey?: string
  /** Bump the target's `updated_at` when the holder is saved */
  readonly touch?: boolean
}

/** The targets store the owner's id (has-many, or has-one with `single`) */
export interface RefManySpec {
  readonly kind: 'ref-many'
  readonly target: string
  readonly foreignKey: string
  readonly single?: boolean
  readonly dependent?: CascadePolicy
}

/** Both sides store an ordered set of the other side's ids */
export interface ManyToManySpec {
  readonly kind: 'many-to-many'
  readonly target: string
  /** Owner-side id array key (default `<singular relation>_ids`) */
  readonly foreignKey?: string
  /** Relation name on the target that mirrors this one */
  readonly inverseOf?: string
  /** Target-side id array key when the target declares no inverse relation */
  readonly inverseForeignKey?: string
  readonly dependent?: CascadePolicy
}

/** Embedded elements of another model that refer back to the owner */
export interface EmbeddedRefSpec {
  readonly kind: 'embedded-ref'
  /** Model whose documents embed the elements */
  readonly target: string
  /** Embed-many relation (document key) on the target, e.g. 'roles' */
  readonly path: string
  /** Element key holding the owner's id (default `_id`) */
  readonly key?: string
}

export type RelationSpec =
  | EmbedOneSpec
  | EmbedManySpec
  | RefOneSpec
  | RefManySpec
  | ManyToManySpec
  | EmbeddedRefSpec

export type RelationKind = RelationSpec['kind']

export type RelationMap = Record<string, RelationSpec>

/** Relation names of one kind */
export type RelationNamesOf<R extends RelationMap, K extends RelationKind> = {
  [N in keyof R]: R[N]['kind'] extends K ? N : never
}[keyof R] & string

// =============================================================================
// Indexes and Scopes
// =============================================================================

export type IndexDirection = 1 | -1 | '2dsphere'

export interface IndexSpec {
  fields: Record<string, IndexDirection>
  unique?: boolean
  name?: string
}

/** Named filter factory, evaluated each time the scope is used */
export type ScopeFactory = () => Filter

// =============================================================================
// Model Definition
// =============================================================================

export interface ModelDefinition<F extends FieldMap = FieldMap, R extends RelationMap = RelationMap> {
  name: string
  /** Default: snake_case plural of the name */
  collection?: string
  fields: F
  relations?: R
  /** Only ever stored inside another model's documents */
  embedded?: boolean
  /** Capability names this model can be embedded as */
  embeddable?: string[]
  /** Maintain `created_at` / `updated_at` */
  timestamps?: boolean
  /** Derive `_id` from this field the first time it has a value */
  idFrom?: string
  indexes?: IndexSpec[]
  scopes?: Record<string, ScopeFactory>
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Declare a field
 *
 * @example
 * field('string', { as: 'simple_plot' })
 * field(measurementCodec)
 * field('list', { default: () => [] })
 */
export function field<K extends keyof BuiltinCodecTypes, A extends string = never>(
  codec: K,
  options?: FieldOptions<BuiltinCodecTypes[K], A>
): FieldSpec<BuiltinCodecTypes[K], A>
export function field<T, A extends string = never>(
  codec: Codec<T>,
  options?: FieldOptions<T, A>
): FieldSpec<T, A>
export function field<A extends string = never>(
  codec: string,
  options?: FieldOptions<unknown, A>
): FieldSpec<unknown, A>
export function field(
  codec: string | AnyCodec,
  options: FieldOptions<unknown, string> = {}
): FieldSpec<unknown, string> {
  return {
    codec,
    alias: options.as,
    default: options.default,
    required: options.required ?? false,
    validate: options.validate,
  }
}

export function embedsOne(target: string, options: { field?: string; as?: string } = {}): EmbedOneSpec {
  return { kind: 'embed-one', target, ...options }
}

export function embedsMany(target: string, options: { field?: string } = {}): EmbedManySpec {
  return { kind: 'embed-many', target, ...options }
}

export function belongsTo(target: string, options: { foreignKey?: string; touch?: boolean } = {}): RefOneSpec {
  return { kind: 'ref-one', target, ...options }
}

export function hasMany(
  target: string,
  options: { foreignKey: string; dependent?: CascadePolicy }
): RefManySpec {
  return { kind: 'ref-many', target, ...options }
}

export function hasOne(
  target: string,
  options: { foreignKey: string; dependent?: CascadePolicy }
): RefManySpec {
  return { kind: 'ref-many', target, single: true, ...options }
}

export function manyToMany(
  target: string,
  options: { foreignKey?: string; inverseOf?: string; inverseForeignKey?: string; dependent?: CascadePolicy } = {}
): ManyToManySpec {
  return { kind: 'many-to-many', target, ...options }
}

export function embeddedRefs(target: string, options: { path: string; key?: string }): EmbeddedRefSpec {
  return { kind: 'embedded-ref', target, ...options }
}
