/**
 * Schema module: model definitions, field tables and validation
 */

export {
  field,
  embedsOne,
  embedsMany,
  belongsTo,
  hasMany,
  hasOne,
  manyToMany,
  embeddedRefs,
  CASCADE_POLICIES,
} from './types'

export type {
  BuiltinCodecTypes,
  FieldDefault,
  FieldOptions,
  FieldSpec,
  FieldMap,
  AttributeName,
  AttributeValue,
  AttributeInput,
  CascadePolicy,
  EmbedOneSpec,
  EmbedManySpec,
  RefOneSpec,
  RefManySpec,
  ManyToManySpec,
  EmbeddedRefSpec,
  RelationSpec,
  RelationKind,
  RelationMap,
  RelationNamesOf,
  IndexDirection,
  IndexSpec,
  ScopeFactory,
  ModelDefinition,
} from './types'

export { FieldTable, type FieldDescriptor } from './field-table'
export { ModelSchema, CREATED_AT, UPDATED_AT, type SchemaOptions } from './model'
export { SchemaValidator, isBlank, type ValidationMode, type SchemaValidatorOptions } from './validator'
