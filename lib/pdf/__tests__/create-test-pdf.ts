/**
 * Helper to generate slide-deck PDFs for tests.
 * Uses mupdf to create PDFs programmatically so tests don't depend on external files.
 */
import mupdf from "mupdf";

type PDFDoc = InstanceType<typeof mupdf.PDFDocument>;

/**
 * Create a PDF with one page per entry of `pages`. Each string becomes its
 * own line of text, top to bottom, in Helvetica. The first line is set larger
 * like a slide title. An empty array gives a page with no text.
 */
export function createDeckPdf(pages: string[][]): Buffer {
  const doc = new mupdf.PDFDocument();
  const resources = addFontResources(doc);

  for (const lines of pages) {
    const stream = lines
      .map((line, i) => {
        const size = i === 0 ? 28 : 16;
        return `BT /F1 ${size} Tf 72 ${720 - i * 48} Td (${line}) Tj ET`;
      })
      .join("\n");
    const buf = new mupdf.Buffer();
    buf.writeLine(stream);
    doc.insertPage(-1, doc.addPage([0, 0, 612, 792], 0, resources, buf));
  }

  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}

function addFontResources(doc: PDFDoc) {
  const font = doc.newDictionary();
  font.put("Type", doc.newName("Font"));
  font.put("Subtype", doc.newName("Type1"));
  font.put("BaseFont", doc.newName("Helvetica"));

  const fonts = doc.newDictionary();
  fonts.put("F1", doc.addObject(font));

  const resourcesDict = doc.newDictionary();
  resourcesDict.put("Font", fonts);
  return doc.addObject(resourcesDict);
}

/**
 * A five-page deck with a three-step build of "Intro", an "Agenda" slide, and
 * a shorter closing "Intro" slide. Pages 3, 4 and 5 survive compaction.
 */
export const BUILD_DECK: string[][] = [
  ["Intro", "Point one"],
  ["Intro", "Point one", "Point two"],
  ["Intro", "Point one", "Point two", "Point three"],
  ["Agenda", "First item"],
  ["Intro", "Recap"],
];
