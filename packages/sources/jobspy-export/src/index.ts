import { readFile } from 'node:fs/promises';
import { defineSource, type FetchResult, type JobSource, type RawPosting } from '@jobwatch/posting-sdk';
import { z } from 'zod';

export const SOURCE_ID = 'jobspy-export';

export class SourceReadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SourceReadError';
    this.path = path;
  }
}

// Exported tables carry NaN cells as null and numeric ids as numbers.
const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

export const jobspyRecordSchema = z
  .object({
    title: optionalText,
    company: optionalText,
    location: optionalText,
    job_url: optionalText,
    job_url_direct: optionalText,
    description: optionalText,
    site: optionalText,
    date_posted: optionalText,
  })
  .passthrough();

export type JobspyRecord = z.infer<typeof jobspyRecordSchema>;

function toRawPosting(record: JobspyRecord): RawPosting {
  const { title, company, location, job_url, job_url_direct, description, site, date_posted, ...rest } = record;

  const posting: RawPosting = {
    title: title ?? '',
    company: company ?? '',
  };

  const url = job_url || job_url_direct;
  if (location) posting.location = location;
  if (url) posting.url = url;
  if (description) posting.description = description;
  if (site) posting.site = site;
  if (date_posted) posting.postedAt = date_posted;
  if (Object.keys(rest).length > 0) posting.raw = rest;

  return posting;
}

/**
 * Map an already-parsed export document. Entries that are not objects are counted as dropped;
 * missing titles or companies come through as '' for the differ to reject.
 */
export function parseExport(document: unknown, path: string): FetchResult {
  if (!Array.isArray(document)) {
    throw new SourceReadError(path, `Expected a JSON array of job records in ${path}`);
  }

  const postings: RawPosting[] = [];
  let validationDropped = 0;

  for (const entry of document) {
    const result = jobspyRecordSchema.safeParse(entry);
    if (result.success) {
      postings.push(toRawPosting(result.data));
    } else {
      validationDropped += 1;
    }
  }

  return { postings, validationDropped };
}

export interface JobspyExportSourceOptions {
  path: string;
}

/**
 * Reads the JSON export written by the scraper run (one array of job records, in scrape order).
 */
export function createJobspyExportSource(options: JobspyExportSourceOptions): JobSource {
  const { path } = options;

  return defineSource({
    manifest: {
      id: SOURCE_ID,
      name: 'Scraper JSON export',
      version: '0.1.0',
    },
    async fetch(): Promise<FetchResult> {
      let content: string;
      try {
        content = await readFile(path, 'utf-8');
      } catch (error) {
        throw new SourceReadError(path, `Cannot read job export ${path}`, { cause: error });
      }

      let document: unknown;
      try {
        document = JSON.parse(content);
      } catch (error) {
        throw new SourceReadError(path, `Job export ${path} is not valid JSON`, { cause: error });
      }

      return parseExport(document, path);
    },
  });
}
