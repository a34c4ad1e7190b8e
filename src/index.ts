/**
 * Quarry mapper core exports.
 * Provides the session-level query executor, its local result cache and the
 * property metadata used to read and write value objects.
 */
export * from './core/errors.js';
export * from './core/mapping/mapped-statement.js';
export * from './core/mapping/row-bounds.js';
export * from './core/mapping/parameter-values.js';
export * from './core/mapping/row-mapper.js';
export * from './core/execution/statement-runner.js';
export * from './core/execution/cursor.js';
export * from './core/execution/runners/sqlite-runner.js';
export * from './cache/cache-key.js';
export * from './cache/local-result-cache.js';
export * from './reflection/types.js';
export * from './reflection/signatures.js';
export * from './reflection/property-namer.js';
export * from './reflection/invokers.js';
export * from './reflection/property-metadata.js';
export * from './reflection/metadata-registry.js';
export * from './reflection/object-accessor.js';
export * from './reflection/object-factory.js';
export * from './decorators/index.js';
export * from './orm/result-extractor.js';
export * from './orm/deferred-load.js';
export * from './orm/query-logger.js';
export * from './orm/configuration.js';
export * from './orm/query-executor.js';
export * from './orm/session-factory.js';
