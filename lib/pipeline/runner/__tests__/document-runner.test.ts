import { describe, it, expect } from "vitest";
import { runCompaction, runDocument } from "../document-runner";
import { createFakes, deck, makeCtx, recordingProgress } from "./fakes";

describe("runDocument", () => {
  it("keeps the final build step of each title", async () => {
    const { collaborators, requests } = createFakes({
      "/talks/intro.pdf": {
        snapshots: deck(["Intro", 10], ["Intro", 20], ["Intro", 15], ["Intro", 12], ["Agenda", 4], ["Agenda", 9]),
      },
    });

    const outcome = await runDocument("/talks/intro.pdf", makeCtx(collaborators));

    expect(outcome).toMatchObject({
      status: "completed",
      result: { retained: [2, 3, 4, 6], keptCount: 4, removedCount: 2, written: true },
    });
    expect(requests[0].outputPath).toBe("/talks/intro_filtered.pdf");
  });

  it("reports a single-page document as unchanged", async () => {
    const { collaborators } = createFakes({ "/one.pdf": { snapshots: deck(["Only", 3]) } });

    const outcome = await runDocument("/one.pdf", makeCtx(collaborators));

    expect(outcome).toMatchObject({
      status: "completed",
      result: { retained: [1], keptCount: 1, removedCount: 0 },
    });
  });

  it("returns an extraction failure without compacting", async () => {
    const { collaborators, requests } = createFakes({});
    const progress = recordingProgress();

    const outcome = await runDocument("/missing.pdf", makeCtx(collaborators, { progress }));

    expect(outcome).toEqual({
      status: "failed",
      documentId: "/missing.pdf",
      stage: "extract",
      error: "Failed to extract slides from /missing.pdf: no such document",
    });
    expect(requests).toEqual([]);
    expect(progress.events.at(-1)).toEqual({
      type: "document-error",
      documentId: "/missing.pdf",
      stage: "extract",
      error: "Failed to extract slides from /missing.pdf: no such document",
    });
  });

  it("propagates errors thrown by a collaborator", async () => {
    const { collaborators } = createFakes({ "/x.pdf": { throws: true } });

    await expect(runDocument("/x.pdf", makeCtx(collaborators))).rejects.toThrow("boom in /x.pdf");
  });
});

describe("runCompaction", () => {
  it("ignores retained positions beyond the document", async () => {
    const { collaborators, requests } = createFakes({ "/short.pdf": { snapshots: deck(["A", 1], ["B", 1]) } });
    const doc = { documentId: "/short.pdf", pageCount: 2, snapshots: deck(["A", 1], ["B", 1]) };

    const outcome = await runCompaction(doc, new Set([2, 5, 9]), makeCtx(collaborators));

    expect([...requests[0].keep]).toEqual([2]);
    expect(outcome).toMatchObject({
      status: "completed",
      result: { retained: [2], keptCount: 1, removedCount: 1 },
    });
  });
});
