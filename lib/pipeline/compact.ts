import { Observable } from "rxjs";
import type { DocumentOutcome } from "./core/types";
import { runDocument } from "./runner/document-runner";
import type { Progress, RunContext } from "./runner/types";

export type CompactProgress =
  | { phase: "extract"; page: number; totalPages: number }
  | { phase: "done"; outcome: DocumentOutcome };

/**
 * Compact a single document, streaming per-page extraction progress and
 * finishing with the document's outcome. Events still reach `ctx.progress`.
 */
export function compact(pdfPath: string, ctx: RunContext): Observable<CompactProgress> {
  return new Observable<CompactProgress>((subscriber) => {
    const progress: Progress = {
      emit(event) {
        ctx.progress.emit(event);
        if (event.type === "document-progress") {
          subscriber.next({
            phase: "extract",
            page: event.page,
            totalPages: event.totalPages,
          });
        }
      },
    };

    runDocument(pdfPath, { ...ctx, progress })
      .then((outcome) => {
        subscriber.next({ phase: "done", outcome });
        subscriber.complete();
      })
      .catch((err: unknown) => subscriber.error(err));
  });
}
