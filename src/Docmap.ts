/**
 * Docmap - document mapping over a DocumentStore
 *
 * A Docmap is the registry every model is defined in. Models refer to each
 * other by name, so relations are resolved lazily on first use and may
 * point at models defined later.
 *
 * @example
 * ```typescript
 * const dm = new Docmap({ store: new MemoryDocumentStore() })
 *
 * const Movies = dm.define({
 *   name: 'Movie',
 *   fields: { title: field('string'), year: field('integer') },
 *   relations: { actors: manyToMany('Actor') },
 * })
 *
 * const movie = await Movies.create({ title: 'Rocky', year: 1976 })
 * ```
 */

import type { ModelDefinition, FieldMap, RelationMap } from './schema/types'
import type { DocumentStore } from './types/store'
import type { EnvSource } from './config/env'
import { Model, type ModelContext } from './entity/Model'
import { TypedModel } from './entity/typed'
import { createDefaultCodecRegistry, type CodecRegistry } from './codecs/registry'
import { resolveConfig, type DocmapConfig, type ResolvedConfig } from './config/loader'
import { MongoDocumentStore } from './storage/MongoDocumentStore'
import { createLevelLogger, logger as globalLogger, type Logger } from './utils/logger'
import { ConfigurationError, ErrorCode } from './errors'

// =============================================================================
// Configuration Types
// =============================================================================

export interface DocmapOptions {
  store: DocumentStore
  /** Default: a registry holding the built-in codecs */
  codecs?: CodecRegistry | undefined
  /**
   * Default: a console logger at `config.logLevel`, or the global logger
   * when the level is 'silent'
   */
  logger?: Logger | undefined
  config?: DocmapConfig | undefined
  /** Environment read for DOCMAP_* variables (default `process.env`) */
  env?: EnvSource | undefined
}

// =============================================================================
// Docmap
// =============================================================================

export class Docmap implements ModelContext {
  readonly store: DocumentStore
  readonly codecs: CodecRegistry
  readonly config: ResolvedConfig
  readonly logger: Logger

  private registry = new Map<string, Model>()

  constructor(options: DocmapOptions) {
    this.store = options.store
    this.codecs = options.codecs ?? createDefaultCodecRegistry()
    this.config = resolveConfig(options.config, options.env)
    this.logger = options.logger ?? (this.config.logLevel === 'silent' ? globalLogger : createLevelLogger(this.config.logLevel))
  }

  /**
   * Connect a MongoDocumentStore from `mongoUrl` and `database`, given
   * directly or through DOCMAP_MONGO_URL and DOCMAP_DATABASE
   *
   * @throws ConfigurationError when either is missing
   */
  static async connect(options: Omit<DocmapOptions, 'store'> = {}): Promise<Docmap> {
    const config = resolveConfig(options.config, options.env)
    if (!config.mongoUrl || !config.database) {
      throw new ConfigurationError(
        'Docmap.connect needs mongoUrl and database (or DOCMAP_MONGO_URL and DOCMAP_DATABASE)',
        ErrorCode.INVALID_CONFIG,
        { configKey: config.mongoUrl ? 'database' : 'mongoUrl' }
      )
    }
    const store = await MongoDocumentStore.connect(config.mongoUrl, config.database)
    return new Docmap({ ...options, store })
  }

  // ===========================================================================
  // Models
  // ===========================================================================

  /**
   * Define a model
   *
   * @throws ConfigurationError when the name is taken or a field codec is
   * unknown
   */
  define<F extends FieldMap, R extends RelationMap = Record<never, never>>(
    definition: ModelDefinition<F, R>
  ): TypedModel<F, R> {
    if (this.registry.has(definition.name)) {
      throw new ConfigurationError(`Model "${definition.name}" is already defined`, ErrorCode.INVALID_CONFIG, {
        model: definition.name,
      })
    }
    const model = new Model(this, definition, this.codecs)
    this.registry.set(model.name, model)
    this.logger.debug(`Defined ${model.name}${model.schema.embedded ? ' (embedded)' : ` in ${model.collection}`}`)
    return new TypedModel<F, R>(model)
  }

  /**
   * @throws ConfigurationError for unknown models
   */
  model(name: string): Model {
    const model = this.registry.get(name)
    if (!model) {
      throw new ConfigurationError(
        `Unknown model "${name}". Defined: ${this.modelNames().join(', ') || '(none)'}`,
        ErrorCode.UNKNOWN_MODEL,
        { model: name }
      )
    }
    return model
  }

  has(name: string): boolean {
    return this.registry.has(name)
  }

  modelNames(): string[] {
    return Array.from(this.registry.keys())
  }

  /**
   * Resolve every declared relation now instead of on first use
   *
   * @throws RelationshipError or ConfigurationError for the first bad
   * relation
   */
  checkRelations(): void {
    for (const model of this.registry.values()) {
      model.relations()
    }
  }

  /**
   * Create declared indexes for every top-level model
   * @returns Index names by collection
   */
  async syncIndexes(): Promise<Record<string, string[]>> {
    const synced: Record<string, string[]> = {}
    for (const model of this.registry.values()) {
      if (model.schema.embedded) continue
      synced[model.collection] = await model.syncIndexes()
    }
    return synced
  }
}
