export { Extractor, createExtractor, DEFAULT_TECHNIQUES, DEFAULT_URL_CATEGORIES } from './extractor';
export type { ExtractorOptions, ExtractorSettings, ResultFactory } from './extractor';
export { Extracted, DEFAULT_TEXT_TYPES } from './extracted';
export type { ExtractedInit } from './extracted';
export {
  ExtractionError,
  ConfigurationError,
  MalformedInputError,
  TechniqueFailure,
  isExtractionError,
} from './errors';
export type { ExtractionErrorCode } from './errors';
export { TechniqueRegistry, createTechniqueRegistry, BUILTIN_TECHNIQUES } from './technique-registry';
export { BaseTechnique, MetaTagTechnique } from './techniques/base-technique';
export { OpenGraphTechnique, OPENGRAPH_KEYS } from './techniques/opengraph';
export { TwitterCardTechnique, TWITTER_CARD_KEYS } from './techniques/twitter-card';
export { HeadTagsTechnique } from './techniques/head-tags';
export { JsonLdTechnique } from './techniques/json-ld';
export { SemanticTagsTechnique, Html5SemanticTagsTechnique } from './techniques/semantic-tags';
export { parseHtml } from './html-parser';
export { isAbsoluteUrl, resolveUrl, parseSourceUrl } from './url-resolver';
export type {
  Category,
  CategoryMap,
  TextTypes,
  Technique,
  TechniqueContext,
  TechniqueFactory,
} from '../types';
