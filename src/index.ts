/**
 * docmap - map typed entities onto a document store
 *
 * @packageDocumentation
 */

// =============================================================================
// Entry Point
// =============================================================================

export { Docmap, type DocmapOptions } from './Docmap'

// =============================================================================
// Model Definitions
// =============================================================================

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
  ModelSchema,
  FieldTable,
  SchemaValidator,
  CREATED_AT,
  UPDATED_AT,
  type FieldSpec,
  type FieldOptions,
  type FieldMap,
  type AttributeName,
  type AttributeValue,
  type AttributeInput,
  type CascadePolicy,
  type RelationSpec,
  type RelationKind,
  type RelationMap,
  type IndexSpec,
  type IndexDirection,
  type ScopeFactory,
  type ModelDefinition,
  type ValidationMode,
} from './schema'

// =============================================================================
// Codecs
// =============================================================================

export {
  CodecRegistry,
  createDefaultCodecRegistry,
  Measurement,
  measurementCodec,
  Point,
  pointCodec,
  METERS_PER_FOOT,
  type Codec,
  type AnyCodec,
} from './codecs'

export { DocumentMapper } from './mapper/document-mapper'

// =============================================================================
// Entities, Relations and Queries
// =============================================================================

export {
  Entity,
  Model,
  TypedModel,
  HookRegistry,
  type TypedEntity,
  type ModelContext,
  type EntityState,
  type LifecycleEvent,
  type LifecycleObserver,
  type SaveOptions,
} from './entity'

export {
  EmbedOneSlot,
  EmbedManySlot,
  RefOneSlot,
  RefManySlot,
  ManyToManySlot,
  EmbeddedRefSlot,
  type ResolvedRelation,
  type SlotState,
} from './relationships'

export { destroyEntity } from './cascade'

export { Criteria, matchesFilter, type NearOptions } from './query'

// =============================================================================
// Storage
// =============================================================================

export { MemoryDocumentStore, MongoDocumentStore, type DocumentStore, type FindOptions } from './storage'

export type {
  RawDocument,
  DocumentValue,
  DocumentPrimitive,
  Filter,
  FieldOperators,
  SortSpec,
  GeoJSONPoint,
  UpdateSpec,
  UpdateResult,
  DeleteResult,
} from './types'
export { ID_FIELD } from './types'

// =============================================================================
// Repair
// =============================================================================

export { Reconciler, type OneSidedLink, type DanglingReference, type RepairResult } from './repair'

// =============================================================================
// Configuration and Logging
// =============================================================================

export {
  defineConfig,
  resolveConfig,
  getConfig,
  setConfig,
  clearConfig,
  type DocmapConfig,
  type ResolvedConfig,
} from './config'

export { logger, setLogger, consoleLogger, noopLogger, createLevelLogger, type Logger, type LogLevel } from './utils/logger'

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  DocmapError,
  MalformedDocumentError,
  MissingIdentityError,
  ValidationError,
  RelationshipError,
  UnsavedParentError,
  CascadeRestrictedError,
  EntityNotFoundError,
  QueryError,
  StorageError,
  ConfigurationError,
  isDocmapError,
  isValidationError,
  isRelationshipError,
  isCascadeRestrictedError,
  isEntityNotFoundError,
  isStorageError,
  type ValidationIssue,
} from './errors'
