// Public API - Core functionality used by the CLI
export * from './config/index.js';
export * from './errors.js';
export * from './entry.js';
export * from './catalog.js';
export * from './catalog-store.js';
export * from './plurals.js';
export * from './key-family.js';
export * from './key-materializer.js';
export * from './catalog-builder.js';
export * from './merge-engine.js';
export * from './reconciler.js';
export * from './extractor.js';
export * from './diff-utils.js';
export * from './type-generator.js';

// Parsers
export * from './parsers/index.js';

// Internal API - Implementation details (not recommended for external use)
export * from './project-factory.js';
