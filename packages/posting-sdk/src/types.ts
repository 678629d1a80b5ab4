/**
 * A job posting as delivered by a job source. Only `title` and `company` are expected to be
 * populated; everything else may be missing depending on the listing site.
 */
export interface RawPosting {
  title: string;
  company: string;
  location?: string;
  url?: string;
  description?: string;
  site?: string;
  postedAt?: string;
  raw?: Record<string, unknown>;
}

export interface SourceManifest {
  id: string;
  name: string;
  version: string;
}

export interface FetchResult {
  postings: RawPosting[];
  validationDropped: number;
}

export interface JobSource {
  manifest: SourceManifest;
  fetch(): Promise<FetchResult>;
}

export type RelevanceLabel = 'relevant' | 'not-relevant' | 'uncertain';

export interface RelevanceClassifier {
  classify(posting: RawPosting): Promise<RelevanceLabel>;
}
