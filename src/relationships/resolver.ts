/**
 * Relation resolution
 *
 * Turns the relation specs of a model definition into ResolvedRelation
 * descriptors. Runs lazily, on first use of a relation, so models may refer
 * to each other regardless of definition order.
 *
 * @module relationships/resolver
 */

import type { ModelSchema } from '../schema/model'
import type { CascadePolicy, ManyToManySpec, RelationSpec } from '../schema/types'
import type { ResolvedManyToMany, ResolvedRelation } from './types'
import { ID_FIELD } from '../types/document'
import { foreignKeyFor, idsKeyFor, modelToCollection } from '../utils/type-utils'
import { RelationshipError } from '../errors'

export interface ResolveOptions {
  /** Schema lookup by model name; throws for unknown models */
  schemaOf(model: string): ModelSchema
  /** Policy for relations that declare none */
  defaultCascade: CascadePolicy
}

/**
 * Resolve relation `name` of `owner`
 *
 * @throws RelationshipError when the relation is undeclared or its target
 * cannot play the declared role
 */
export function resolveRelation(owner: ModelSchema, name: string, options: ResolveOptions): ResolvedRelation {
  const spec = owner.relation(name)
  if (!spec) {
    throw new RelationshipError(owner.name, name, 'is not a declared relation')
  }
  const target = options.schemaOf(spec.target)
  const base = { name, owner: owner.name, target: target.name }

  switch (spec.kind) {
    case 'embed-one':
    case 'embed-many': {
      if (!target.embedded) {
        throw new RelationshipError(owner.name, name, `${target.name} is not an embedded model`)
      }
      if (spec.kind === 'embed-many') {
        return { ...base, kind: spec.kind, bidirectional: true, documentKey: owner.documentKeyOf(name) }
      }
      if (spec.as !== undefined && !target.canEmbedAs(spec.as)) {
        throw new RelationshipError(owner.name, name, `${target.name} cannot be embedded as "${spec.as}"`)
      }
      return { ...base, kind: spec.kind, bidirectional: true, documentKey: owner.documentKeyOf(name), as: spec.as }
    }

    case 'ref-one': {
      const foreignKey = spec.foreignKey ?? foreignKeyFor(name)
      const bidirectional = target.relations().some(
        ([, other]) => other.kind === 'ref-many' && other.target === owner.name && other.foreignKey === foreignKey
      )
      return { ...base, kind: spec.kind, foreignKey, touch: spec.touch ?? false, bidirectional }
    }

    case 'ref-many': {
      assertTopLevel(owner, name, target)
      const bidirectional = target.relations().some(
        ([otherName, other]) =>
          other.kind === 'ref-one' &&
          other.target === owner.name &&
          (other.foreignKey ?? foreignKeyFor(otherName)) === spec.foreignKey
      )
      return {
        ...base,
        kind: spec.kind,
        foreignKey: spec.foreignKey,
        single: spec.single ?? false,
        dependent: spec.dependent ?? options.defaultCascade,
        bidirectional,
      }
    }

    case 'many-to-many':
      assertTopLevel(owner, name, target)
      return resolveManyToMany(owner, name, spec, target, options.defaultCascade)

    case 'embedded-ref': {
      const holder = target.relation(spec.path)
      if (!holder || holder.kind !== 'embed-many') {
        throw new RelationshipError(owner.name, name, `${target.name}.${spec.path} is not an embed-many relation`)
      }
      return {
        ...base,
        kind: spec.kind,
        relation: spec.path,
        documentKey: target.documentKeyOf(spec.path),
        key: spec.key ?? ID_FIELD,
        bidirectional: false,
      }
    }
  }
}

function resolveManyToMany(
  owner: ModelSchema,
  name: string,
  spec: ManyToManySpec,
  target: ModelSchema,
  defaultCascade: CascadePolicy
): ResolvedManyToMany {
  const inverse = findInverse(owner, name, spec, target)
  const foreignKey = spec.foreignKey ?? idsKeyFor(name)
  const inverseForeignKey = inverse
    ? inverse.foreignKey ?? idsKeyFor(inverse.name)
    : spec.inverseForeignKey ?? idsKeyFor(modelToCollection(owner.name))

  return {
    kind: 'many-to-many',
    name,
    owner: owner.name,
    target: target.name,
    foreignKey,
    inverseForeignKey,
    inverseName: inverse?.name,
    dependent: spec.dependent ?? defaultCascade,
    bidirectional: inverse !== undefined,
  }
}

function findInverse(
  owner: ModelSchema,
  name: string,
  spec: ManyToManySpec,
  target: ModelSchema
): (ManyToManySpec & { name: string }) | undefined {
  if (spec.inverseOf !== undefined) {
    const inverse = target.relation(spec.inverseOf)
    if (!inverse || inverse.kind !== 'many-to-many' || inverse.target !== owner.name) {
      throw new RelationshipError(
        owner.name,
        name,
        `inverse "${spec.inverseOf}" is not a many-to-many relation of ${target.name} targeting ${owner.name}`
      )
    }
    return { ...inverse, name: spec.inverseOf }
  }
  // A self-referential set without an explicit inverse mirrors itself
  if (target.name === owner.name) {
    return { ...spec, name }
  }
  for (const [otherName, other] of target.relations()) {
    if (isManyToManyTo(other, owner.name)) {
      return { ...other, name: otherName }
    }
  }
  return undefined
}

function isManyToManyTo(spec: RelationSpec, model: string): spec is ManyToManySpec {
  return spec.kind === 'many-to-many' && spec.target === model
}

function assertTopLevel(owner: ModelSchema, name: string, target: ModelSchema): void {
  if (target.embedded) {
    throw new RelationshipError(owner.name, name, `${target.name} is embedded and has no collection to reference`)
  }
}
