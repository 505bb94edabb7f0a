import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  collectDocuments,
  discoverDocuments,
  outputPathFor,
  resolveInput,
} from "@/lib/documents";
import { InvalidInputError } from "@/lib/errors";

const DISCOVER = { extensions: [".pdf"], suffix: "_filtered" };

describe("documents", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "documents-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("resolveInput", () => {
    it("recognises a file", () => {
      const file = path.join(tmpDir, "deck.pdf");
      fs.writeFileSync(file, "");

      expect(resolveInput(file)).toEqual({ kind: "file", path: file });
    });

    it("recognises a directory", () => {
      expect(resolveInput(tmpDir)).toEqual({ kind: "directory", path: tmpDir });
    });

    it("rejects a path that does not exist", () => {
      const missing = path.join(tmpDir, "nope");

      expect(() => resolveInput(missing)).toThrow(InvalidInputError);
      expect(() => resolveInput(missing)).toThrow(
        `The input path ${missing} is neither a file nor a directory.`
      );
    });
  });

  describe("discoverDocuments", () => {
    it("lists matching files sorted, skipping earlier outputs", () => {
      for (const name of ["b.pdf", "a.PDF", "notes.txt", "a_filtered.pdf", "c.pdf"]) {
        fs.writeFileSync(path.join(tmpDir, name), "");
      }
      fs.mkdirSync(path.join(tmpDir, "nested.pdf"));

      expect(discoverDocuments(tmpDir, DISCOVER)).toEqual([
        path.join(tmpDir, "a.PDF"),
        path.join(tmpDir, "b.pdf"),
        path.join(tmpDir, "c.pdf"),
      ]);
    });

    it("returns nothing for an empty directory", () => {
      expect(discoverDocuments(tmpDir, DISCOVER)).toEqual([]);
    });
  });

  describe("collectDocuments", () => {
    it("returns a single file as-is", () => {
      const file = path.join(tmpDir, "deck.pdf");
      expect(collectDocuments({ kind: "file", path: file }, DISCOVER)).toEqual([file]);
    });
  });

  describe("outputPathFor", () => {
    it("writes beside the source by default", () => {
      expect(outputPathFor("/decks/week1.pdf", { suffix: "_filtered" })).toBe(
        "/decks/week1_filtered.pdf"
      );
    });

    it("writes under outDir when given", () => {
      expect(
        outputPathFor("/decks/week1.pdf", { suffix: "-compact", outDir: "/out" })
      ).toBe("/out/week1-compact.pdf");
    });
  });
});
