/**
 * Compactor CLI commands. `runCli` takes the arguments after the script name
 * and resolves to the process exit code.
 */

import { filter, tap } from "rxjs";
import { loadConfig, type AppConfig } from "../config";
import { collectDocuments, resolveInput } from "../documents";
import { describeSnapshot, pdfSnapshotExtractor } from "../pdf/snapshots";
import { compact, type CompactProgress } from "../pipeline/compact";
import { indexSnapshots } from "../pipeline/core/group-index";
import { buildRetentionSet, restrictToDocument } from "../pipeline/core/retention";
import type { DocumentOutcome } from "../pipeline/core/types";
import {
  createConsoleProgress,
  createRunner,
  nullProgress,
  runBatch,
  type BatchSummary,
} from "../pipeline/runner";
import { parseFlags } from "./flags";
import { ParallelProgress, runWithProgress } from "./progress";
import { reportSummary } from "./report";

export const USAGE = `Usage: npm run compact -- <input_path> [options]
       npm run compact -- inspect <pdf_path>

Arguments:
  input_path            A PDF file or a directory of PDFs

Options:
  --out-dir <dir>       Write outputs here instead of beside each source
  --suffix <text>       Output name suffix (default: _filtered)
  --concurrency <n>     Max documents processed in parallel (default: CPU count)
  --global              Group slide titles across all documents in the batch
  --dry-run             Report what would be removed without writing files
  --config <path>       YAML config file (default: ./compactor.yaml if present)`;

export async function runCli(args: string[]): Promise<number> {
  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    return 0;
  }

  const flags = parseFlags(args);

  // inspect needs no settings; the config file is read only for compaction
  if (flags.positional[0] === "inspect") {
    const [, pdfPath] = flags.positional;
    if (!pdfPath) {
      console.error("Usage: npm run compact -- inspect <pdf_path>");
      return 1;
    }
    await inspect(pdfPath);
    return 0;
  }

  const [inputPath] = flags.positional;
  if (!inputPath) {
    console.error(USAGE);
    return 1;
  }

  const config = loadConfig(flags.configPath, flags.overrides);
  const target = resolveInput(inputPath);

  if (target.kind === "file") {
    const outcome = await compactFile(target.path, config, flags.dryRun);
    return outcome?.status === "completed" ? 0 : 1;
  }

  const documents = collectDocuments(target, config);
  if (documents.length === 0) {
    console.log(`No documents matching ${config.extensions.join(", ")} in ${target.path}`);
    return 0;
  }

  const summary = await compactDirectory(documents, config, flags.dryRun);
  return summary.failed > 0 ? 1 : 0;
}

// ============================================================================
// Commands
// ============================================================================

async function compactFile(
  pdfPath: string,
  config: AppConfig,
  dryRun: boolean
): Promise<DocumentOutcome | undefined> {
  const { ctx } = createRunner({ config, progress: createConsoleProgress(), dryRun });
  let outcome: DocumentOutcome | undefined;

  await runWithProgress(
    compact(pdfPath, ctx).pipe(
      tap((p) => {
        if (p.phase === "done") outcome = p.outcome;
      }),
      filter(
        (p): p is Extract<CompactProgress, { phase: "extract" }> => p.phase === "extract"
      )
    ),
    (p) => ({ current: p.page, total: p.totalPages }),
    { label: "extract" }
  );

  return outcome;
}

async function compactDirectory(
  documents: string[],
  config: AppConfig,
  dryRun: boolean
): Promise<BatchSummary> {
  const display = new ParallelProgress();
  const { ctx, batch } = createRunner({
    config,
    progress: nullProgress,
    tracker: display,
    dryRun,
  });

  console.log(
    `\nCompacting ${documents.length} document(s) with ${config.grouping} grouping...\n`
  );
  const summary = await display.track(documents.length, () => runBatch(documents, ctx, batch));

  reportSummary(summary, createConsoleProgress());
  return summary;
}

async function inspect(pdfPath: string): Promise<void> {
  const extracted = await pdfSnapshotExtractor.extract(pdfPath);
  if (!extracted.ok) throw extracted.error;

  const { snapshots, pageCount } = extracted.value;
  for (const snapshot of snapshots) {
    console.log(describeSnapshot(snapshot));
  }

  const keep = restrictToDocument(buildRetentionSet(indexSnapshots(snapshots)), pageCount);
  console.log(`Pages kept: ${keep.join(", ") || "none"}`);
  console.log(`Pages removed: ${pageCount - keep.length} of ${pageCount}`);
}
