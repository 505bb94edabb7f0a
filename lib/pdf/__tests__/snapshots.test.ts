import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  describeSnapshot,
  extractSnapshots,
  parseSnapshot,
  pdfSnapshotExtractor,
} from "../snapshots";
import { ExtractionError } from "../../errors";
import { indexSnapshots } from "../../pipeline/core/group-index";
import { buildRetentionSet } from "../../pipeline/core/retention";
import { BUILD_DECK, createDeckPdf } from "./create-test-pdf";

describe("parseSnapshot", () => {
  it("splits the first line from the rest", () => {
    const snapshot = parseSnapshot(3, "Intro\nPoint one\nPoint two\n");

    expect(snapshot).toEqual({
      position: 3,
      title: "Intro",
      content: "Point one\nPoint two",
      contentLength: 19,
    });
  });

  it("uses the first non-empty line as the title", () => {
    const snapshot = parseSnapshot(1, "\n   \n  Intro  \nBody");

    expect(snapshot.title).toBe("Intro");
    expect(snapshot.content).toBe("Body");
  });

  it("falls back to sentinels for a page without text", () => {
    expect(parseSnapshot(2, "")).toEqual({
      position: 2,
      title: "No Title",
      content: "No Content",
      contentLength: 10,
    });
    expect(parseSnapshot(2, " \n\n").title).toBe("No Title");
  });

  it("gives a title-only page empty content", () => {
    expect(parseSnapshot(1, "Only title\n  \n")).toEqual({
      position: 1,
      title: "Only title",
      content: "",
      contentLength: 0,
    });
  });

  it("accepts CRLF line endings", () => {
    expect(parseSnapshot(1, "Title\r\nBody\r\n").content).toBe("Body");
  });

  it("keeps titles case-sensitive", () => {
    expect(parseSnapshot(1, "INTRO\nx").title).toBe("INTRO");
  });
});

describe("describeSnapshot", () => {
  it("lists page number, title, length and content", () => {
    const text = describeSnapshot(parseSnapshot(4, "Agenda\nFirst item"));

    expect(text).toBe(
      "Page Number: 4\nTitle: Agenda\nContent Length: 10 characters\nContent: First item\n"
    );
  });
});

describe("extractSnapshots", () => {
  it("extracts one snapshot per page in order", async () => {
    const pdfBuffer = createDeckPdf(BUILD_DECK);
    const { pageCount, snapshots } = await extractSnapshots({ pdfBuffer });

    expect(pageCount).toBe(5);
    expect(snapshots.map((s) => s.position)).toEqual([1, 2, 3, 4, 5]);
    expect(snapshots.map((s) => s.title)).toEqual([
      "Intro",
      "Intro",
      "Intro",
      "Agenda",
      "Intro",
    ]);
    expect(snapshots[2].content).toContain("Point three");
    expect(snapshots[3].content).toContain("First item");
  });

  it("grows content length across a build", async () => {
    const pdfBuffer = createDeckPdf(BUILD_DECK);
    const { snapshots } = await extractSnapshots({ pdfBuffer });
    const lengths = snapshots.map((s) => s.contentLength);

    expect(lengths[1]).toBeGreaterThan(lengths[0]);
    expect(lengths[2]).toBeGreaterThan(lengths[1]);
    expect(lengths[4]).toBeLessThan(lengths[2]);
    for (const s of snapshots) expect(s.contentLength).toBe(s.content.length);
  });

  it("uses sentinels for a blank page", async () => {
    const pdfBuffer = createDeckPdf([[]]);
    const { snapshots } = await extractSnapshots({ pdfBuffer });

    expect(snapshots).toEqual([
      { position: 1, title: "No Title", content: "No Content", contentLength: 10 },
    ]);
  });

  it("drops a title-only opening page when the first bullet is short", async () => {
    const pdfBuffer = createDeckPdf([["Agenda"], ["Agenda", "Goals"], ["Agenda", "Goals", "Scope"]]);
    const { snapshots } = await extractSnapshots({ pdfBuffer });

    expect(snapshots[0]).toEqual({ position: 1, title: "Agenda", content: "", contentLength: 0 });
    expect([...buildRetentionSet(indexSnapshots(snapshots))]).toEqual([3]);
  });

  it("calls progress callback for each page", async () => {
    const pdfBuffer = createDeckPdf([["A", "x"], ["B", "y"]]);
    const progressCalls: { page: number; totalPages: number }[] = [];

    await extractSnapshots({ pdfBuffer }, (progress) => {
      progressCalls.push({ ...progress });
    });

    expect(progressCalls).toEqual([
      { page: 1, totalPages: 2 },
      { page: 2, totalPages: 2 },
    ]);
  });

  it("throws on invalid PDF data", async () => {
    const pdfBuffer = Buffer.from("not a pdf");

    await expect(extractSnapshots({ pdfBuffer })).rejects.toThrow();
  });
});

describe("pdfSnapshotExtractor", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshots-test-"));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns the document's snapshots keyed by its path", async () => {
    const pdfPath = path.join(tmpDir, "deck.pdf");
    fs.writeFileSync(pdfPath, createDeckPdf(BUILD_DECK));

    const result = await pdfSnapshotExtractor.extract(pdfPath);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.documentId).toBe(pdfPath);
    expect(result.value.pageCount).toBe(5);
    expect(result.value.snapshots).toHaveLength(5);
  });

  it("reports a corrupt file as an extraction failure", async () => {
    const pdfPath = path.join(tmpDir, "broken.pdf");
    fs.writeFileSync(pdfPath, "not a pdf");

    const result = await pdfSnapshotExtractor.extract(pdfPath);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ExtractionError);
    expect(result.error.documentId).toBe(pdfPath);
    expect(result.error.message).toContain(`Failed to extract slides from ${pdfPath}`);
  });

  it("reports a missing file as an extraction failure", async () => {
    const result = await pdfSnapshotExtractor.extract(path.join(tmpDir, "missing.pdf"));

    expect(result.ok).toBe(false);
  });
});
