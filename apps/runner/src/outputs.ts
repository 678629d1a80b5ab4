import { appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type TrackOutcome, writeFileAtomic } from '@jobwatch/tracking';

export interface ArtifactPaths {
  newJobsFile: string;
  allJobsFile: string;
  summaryFile: string;
}

export interface SummaryDocument {
  timestamp: string;
  run_date: string;
  new_jobs_count: number;
  total_jobs_count: number;
  seen_jobs_count: number;
  skipped_jobs_count: number;
  has_new_jobs: boolean;
  relevant_jobs_count: number;
}

export function artifactPaths(outputDir: string): ArtifactPaths {
  return {
    newJobsFile: join(outputDir, 'new_jobs.json'),
    allJobsFile: join(outputDir, 'all_jobs.json'),
    summaryFile: join(outputDir, 'summary.json'),
  };
}

export function buildSummaryDocument(outcome: TrackOutcome, timestamp: Date): SummaryDocument {
  const { summary } = outcome;

  return {
    timestamp: timestamp.toISOString(),
    run_date: outcome.runDate,
    new_jobs_count: summary.newCount,
    total_jobs_count: summary.totalCount,
    seen_jobs_count: summary.seenCount,
    skipped_jobs_count: summary.skippedCount,
    has_new_jobs: summary.hasNew,
    relevant_jobs_count: outcome.postings.filter((posting) => posting.relevance === 'relevant').length,
  };
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/**
 * Writes new_jobs.json, all_jobs.json and summary.json. Each file is replaced atomically.
 */
export async function writeRunArtifacts(outcome: TrackOutcome, paths: ArtifactPaths, timestamp: Date): Promise<void> {
  const newPostings = outcome.postings.filter((posting) => posting.status === 'new');

  await writeFileAtomic(paths.newJobsFile, toJson(newPostings));
  await writeFileAtomic(paths.allJobsFile, toJson(outcome.postings));
  await writeFileAtomic(paths.summaryFile, toJson(buildSummaryDocument(outcome, timestamp)));
}

export function formatGithubOutputs(outcome: TrackOutcome, paths: ArtifactPaths): string {
  const { summary } = outcome;
  const lines = [
    `new_jobs_count=${summary.newCount}`,
    `total_jobs_count=${summary.totalCount}`,
    `has_new_jobs=${String(summary.hasNew)}`,
    `new_jobs_file=${paths.newJobsFile}`,
    `all_jobs_file=${paths.allJobsFile}`,
  ];

  return `${lines.join('\n')}\n`;
}

export async function appendGithubOutputs(outputFile: string, outcome: TrackOutcome, paths: ArtifactPaths): Promise<void> {
  await appendFile(outputFile, formatGithubOutputs(outcome, paths), 'utf-8');
}
