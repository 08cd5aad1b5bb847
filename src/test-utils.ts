/**
 * Test utilities for pdf-quicktext
 */

import { inflateSync } from "node:zlib";

import { PDFArray, PDFDict, PDFDocument, PDFName, PDFRawStream, StandardFonts } from "pdf-lib";

import type { EngineDocument, PdfEngine, TextRun } from "#src/engine/types";
import { PageIndexError } from "#src/errors";
import { FALLBACK_PAGE_BOX, type PageBox } from "#src/helpers/page-size";

export interface TemplateOptions {
  /** Number of pages (default: 2) */
  pages?: number;
  /** Page size in points (default: letter) */
  size?: [number, number];
  /** Text drawn on every page with Helvetica, so pages carry content */
  header?: string;
  /** Drop /MediaBox from every page */
  withoutMediaBox?: boolean;
  /** Register an unrelated font under the /Courier resource name */
  courierResourceTaken?: boolean;
}

/**
 * Build a template PDF in memory.
 *
 * @example
 * ```ts
 * const bytes = await createTemplate({ pages: 2, header: "Certificate" });
 * ```
 */
export async function createTemplate(options: TemplateOptions = {}): Promise<Uint8Array> {
  const doc = await PDFDocument.create({ updateMetadata: false });
  const pageCount = options.pages ?? 2;
  const helvetica = doc.embedStandardFont(StandardFonts.Helvetica);

  for (let i = 0; i < pageCount; i++) {
    const page = doc.addPage(options.size ?? [612, 792]);

    if (options.header !== undefined) {
      page.drawText(options.header, { x: 72, y: 720, size: 14, font: helvetica });
    }

    if (options.courierResourceTaken) {
      page.node.setFontDictionary(PDFName.of("Courier"), helvetica.ref);
    }

    if (options.withoutMediaBox) {
      page.node.delete(PDFName.of("MediaBox"));
    }
  }

  return doc.save({ addDefaultPage: false });
}

/**
 * Decoded content streams of a page, joined with newlines.
 */
export async function readPageContent(bytes: Uint8Array, pageIndex: number): Promise<string> {
  const doc = await PDFDocument.load(bytes, { updateMetadata: false });
  const node = doc.getPage(pageIndex).node;
  const contents = node.Contents();
  const streams: PDFRawStream[] = [];

  if (contents instanceof PDFArray) {
    for (let i = 0; i < contents.size(); i++) {
      const entry = contents.lookup(i);

      if (entry instanceof PDFRawStream) {
        streams.push(entry);
      }
    }
  } else if (contents instanceof PDFRawStream) {
    streams.push(contents);
  }

  return streams.map(decodeStream).join("\n");
}

function decodeStream(stream: PDFRawStream): string {
  const filter = stream.dict.get(PDFName.of("Filter"));
  const data = filter === PDFName.of("FlateDecode") ? inflateSync(stream.contents) : stream.contents;

  return Buffer.from(data).toString("latin1");
}

/**
 * Names in a page's /Font resource dictionary.
 */
export async function readFontResourceNames(bytes: Uint8Array, pageIndex: number): Promise<string[]> {
  const doc = await PDFDocument.load(bytes, { updateMetadata: false });
  const fonts = doc.getPage(pageIndex).node.Resources()?.lookupMaybe(PDFName.of("Font"), PDFDict);

  return fonts ? fonts.keys().map(key => key.decodeText()) : [];
}

export async function countPages(bytes: Uint8Array): Promise<number> {
  const doc = await PDFDocument.load(bytes, { updateMetadata: false });

  return doc.getPageCount();
}

/**
 * Convert a string to the uppercase hex form pdf-lib writes for standard
 * fonts (ASCII input only).
 */
export function asciiHex(text: string): string {
  return Array.from(text)
    .map(c => c.charCodeAt(0).toString(16).padStart(2, "0").toUpperCase())
    .join("");
}

/**
 * Run `fn` and return what it throws. Fails when nothing is thrown.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error("Expected function to throw");
}

/**
 * Await `promise` and return its rejection reason. Fails when it resolves.
 */
export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }

  throw new Error("Expected promise to reject");
}

// ─────────────────────────────────────────────────────────────────────────────
// Recording engine
// ─────────────────────────────────────────────────────────────────────────────

/**
 * In-memory engine document that records drawn runs. Serializes to the JSON
 * of its draw log, so saved bytes reflect exactly what was committed.
 */
export class RecordingDocument implements EngineDocument {
  readonly drawn: { pageIndex: number; run: TextRun }[] = [];
  readonly warnings: string[] = [];

  constructor(
    private readonly pageCount: number,
    private readonly box: PageBox = FALLBACK_PAGE_BOX,
  ) {}

  getPageCount(): number {
    return this.pageCount;
  }

  getPageBox(pageIndex: number): PageBox {
    this.checkIndex(pageIndex);

    return { ...this.box };
  }

  drawText(pageIndex: number, run: TextRun): void {
    this.checkIndex(pageIndex);
    this.drawn.push({ pageIndex, run });
  }

  async serialize(): Promise<Uint8Array> {
    return new TextEncoder().encode(JSON.stringify(this.drawn));
  }

  private checkIndex(pageIndex: number): void {
    if (pageIndex < 0 || pageIndex >= this.pageCount) {
      throw new PageIndexError(pageIndex, this.pageCount);
    }
  }
}

/**
 * Engine whose documents are RecordingDocuments. Every load is kept in
 * `documents`, most recent last.
 */
export class RecordingEngine implements PdfEngine {
  readonly documents: RecordingDocument[] = [];

  constructor(
    private readonly pageCount: number,
    private readonly box?: PageBox,
  ) {}

  async load(): Promise<EngineDocument> {
    const doc = new RecordingDocument(this.pageCount, this.box);
    this.documents.push(doc);

    return doc;
  }

  /** The document most recently loaded */
  get latest(): RecordingDocument {
    const doc = this.documents.at(-1);

    if (!doc) {
      throw new Error("Nothing loaded yet");
    }

    return doc;
  }
}
