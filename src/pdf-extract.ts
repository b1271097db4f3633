import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractedDocument, ExtractedFragment, ExtractedPage } from "./pdf-types.ts";

/** The parts of a pdfjs text item that line grouping needs. */
interface PositionedText {
  str: string;
  transform: number[];
}

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`Cannot read input PDF: ${filePath}`);
  }
}

export async function extractDocument(inputPdfPath: string): Promise<ExtractedDocument> {
  const data = new Uint8Array(await readFile(inputPdfPath));
  return extractDocumentFromBuffer(data);
}

export async function extractDocumentFromBuffer(data: Uint8Array): Promise<ExtractedDocument> {
  try {
    return await readPages(data);
  } catch (error: unknown) {
    throw createExtractionError(error);
  }
}

async function readPages(data: Uint8Array): Promise<ExtractedDocument> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const pages: ExtractedPage[] = [];

  try {
    for (let pageIndex = 0; pageIndex < pdf.numPages; pageIndex++) {
      const page = await pdf.getPage(pageIndex + 1);
      const { height } = page.getViewport({ scale: 1 });
      const { items } = await page.getTextContent();
      pages.push({ pageIndex, height, fragments: toFragments(items) });
    }
    return { pages };
  } finally {
    await pdf.destroy();
  }
}

/** Marked-content markers and whitespace-only items carry no text and are skipped. */
export function toFragments(items: unknown[]): ExtractedFragment[] {
  return items.filter(isPositionedText).flatMap((item) => {
    const text = item.str.replace(/\s+/g, " ").trim();
    return text.length > 0 ? [{ text, x: item.transform[4], y: item.transform[5] }] : [];
  });
}

function isPositionedText(item: unknown): item is PositionedText {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    item.transform.length >= 6
  );
}

function createExtractionError(error: unknown): Error {
  const detail = error instanceof Error ? error.message : String(error);
  return new Error(`Failed to extract text from PDF: ${detail}`);
}
