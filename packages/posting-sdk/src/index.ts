export type {
  RawPosting,
  SourceManifest,
  FetchResult,
  JobSource,
  RelevanceLabel,
  RelevanceClassifier,
} from './types.js';
export { rawPostingSchema, validateRawPostings } from './schema.js';
export type { ValidateRawPostingsOptions } from './schema.js';
export { defineSource } from './factory.js';
