/**
 * Runner Factory
 *
 * Wires configuration, the PDF collaborators and a progress sink into the
 * context the runners take.
 */

import type { AppConfig } from "../../config";
import { pdfDocumentCompactor } from "../../pdf/compact";
import { pdfSnapshotExtractor } from "../../pdf/snapshots";
import type { BatchOptions, Collaborators, Progress, RunContext, TaskTracker } from "./types";
import { nullProgress } from "./types";

export const pdfCollaborators: Collaborators = {
  extractor: pdfSnapshotExtractor,
  compactor: pdfDocumentCompactor,
};

export interface CreateRunnerOptions {
  config: AppConfig;
  progress?: Progress;
  collaborators?: Collaborators;
  tracker?: TaskTracker;
  dryRun?: boolean;
}

export function createRunner(options: CreateRunnerOptions): {
  ctx: RunContext;
  batch: BatchOptions;
} {
  const { config, progress = nullProgress, collaborators = pdfCollaborators } = options;

  return {
    ctx: {
      collaborators,
      progress,
      output: {
        suffix: config.suffix,
        outDir: config.out_dir,
        dryRun: options.dryRun ?? false,
      },
    },
    batch: {
      concurrency: config.concurrency,
      grouping: config.grouping,
      tracker: options.tracker,
    },
  };
}
