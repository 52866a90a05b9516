/**
 * dgml-builder - rule-driven assembly of directed graph documents
 *
 * Register builder rules that turn domain objects into nodes, links, categories
 * and styles, add analyses that decorate the finished graph, and encode the
 * result as DGML.
 */

export * from './model';
export * from './builders';
export * from './graph';
export * from './analyses';
export * from './serialization';
export * from './visualizers';
export type { TypeDescriptor, TypeReference, MemberDescriptor, TypeKind } from './parsers/type-descriptors';
export { TypeScriptTypeExtractor } from './parsers/typescript-type-extractor';

export { logger, config } from './utils';
