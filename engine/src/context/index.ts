/**
 * Standard context
 *
 * @module context
 */

export * from './PipelineContext.js';
export * from './StandardCatalog.js';
export * from './StandardContextResolver.js';
export * from './ContextFetcher.js';
export * from './DispatchDetector.js';
