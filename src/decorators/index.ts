/**
 * Decorators declaring the runtime types of accessors and fields.
 */
export * from './accessors.js';
export { readMetadataBag } from './decorator-metadata.js';
export type { DecoratorMetadataBag } from './decorator-metadata.js';
