import { createRelevanceClassifier } from '@jobwatch/classifier';
import type { JobSource, RelevanceClassifier } from '@jobwatch/posting-sdk';
import { createJobspyExportSource } from '@jobwatch/source-jobspy-export';
import { track, type TrackOutcome } from '@jobwatch/tracking';
import type { Logger } from 'pino';
import type { RunnerConfig } from './config.js';
import { createTrackingLogger } from './observability/tracking-logger.js';
import { withRunLogger } from './observability/with-run-logger.js';
import { appendGithubOutputs, artifactPaths, type ArtifactPaths, writeRunArtifacts } from './outputs.js';

export interface RunDependencies {
  logger: Logger;
  /** Defaults to the scraper export at `config.inputFile`. */
  source?: JobSource;
  /** Overrides the classifier built from `config.classifier`. */
  classifier?: RelevanceClassifier;
  now?: () => Date;
}

export interface RunReport {
  outcome: TrackOutcome;
  artifacts: ArtifactPaths;
}

function resolveClassifier(config: RunnerConfig, deps: RunDependencies): RelevanceClassifier | undefined {
  if (deps.classifier) {
    return deps.classifier;
  }

  return config.classifier ? createRelevanceClassifier(config.classifier) : undefined;
}

export async function runOnce(config: RunnerConfig, deps: RunDependencies): Promise<RunReport> {
  const { logger } = deps;
  const now = deps.now ?? (() => new Date());
  const artifacts = artifactPaths(config.outputDir);

  return withRunLogger({
    logger,
    context: {
      runDate: config.runDate,
      inputFile: config.inputFile,
      historyFile: config.historyFile,
      classifier: config.classifier?.provider ?? 'disabled',
    },
    summary: ({ outcome }) => ({
      sourceId: outcome.sourceId,
      received: outcome.result.counts.received,
      newCount: outcome.summary.newCount,
      seenCount: outcome.summary.seenCount,
      skippedCount: outcome.summary.skippedCount,
      duplicatesInBatch: outcome.result.counts.duplicatesInBatch,
      validationDropped: outcome.validationDropped,
      historyBefore: outcome.history.before,
      historyAfter: outcome.history.after,
    }),
    run: async () => {
      const source = deps.source ?? createJobspyExportSource({ path: config.inputFile });
      const classifier = resolveClassifier(config, deps);

      const outcome = await track(source, {
        historyPath: config.historyFile,
        lockPath: config.lockFile,
        lockTtlMs: config.lockTtlMs,
        runDate: config.runDate,
        classifier,
        classifyAll: config.forceProcess,
        logger: createTrackingLogger(logger),
        publish: async (result) => {
          await writeRunArtifacts(result, artifacts, now());
          if (config.githubOutput) {
            await appendGithubOutputs(config.githubOutput, result, artifacts);
          }
        },
      });

      return { outcome, artifacts };
    },
  });
}
