/**
 * PDF engine backed by pdf-lib.
 *
 * Text runs are written as raw content-stream operators into a content
 * stream appended to the page, with the standard font registered once per
 * document and once per page under a deterministic resource name. Documents
 * are loaded with metadata updates off, so serializing the same state always
 * yields the same bytes.
 */

import {
  beginText,
  endText,
  nextLine,
  PDFArray,
  PDFDict,
  PDFDocument,
  type PDFFont,
  PDFName,
  PDFNumber,
  type PDFOperator,
  type PDFPage,
  popGraphicsState,
  pushGraphicsState,
  setFillingRgbColor,
  setFontAndSize,
  setLineHeight,
  setTextMatrix,
  showText,
} from "pdf-lib";

import {
  InvalidDocumentError,
  InvalidSizeError,
  PageIndexError,
  UnencodableTextError,
  UnsupportedFontError,
} from "#src/errors";
import {
  BASE_FONTS,
  FONT_KEYS,
  type FontKey,
  FontKeySchema,
  findUnencodable,
} from "#src/fonts/standard-fonts";
import { FALLBACK_PAGE_BOX, type PageBox } from "#src/helpers/page-size";
import type { EngineDocument, EngineLoadOptions, PdfEngine, TextRun } from "./types";

/** Line leading as a multiple of the font size */
export const LINE_HEIGHT_FACTOR = 1.2;

const FONT = PDFName.of("Font");
const MEDIA_BOX = PDFName.of("MediaBox");

/**
 * A loaded pdf-lib document.
 */
export class PdfLibDocument implements EngineDocument {
  private readonly doc: PDFDocument;
  private readonly useObjectStreams: boolean;

  /** Fonts embedded so far, one per key */
  private readonly fonts = new Map<FontKey, PDFFont>();

  /** Pages already reported for a missing media box */
  private readonly reportedBoxes = new Set<number>();

  private readonly _warnings: string[] = [];

  constructor(doc: PDFDocument, options: { useObjectStreams: boolean }) {
    this.doc = doc;
    this.useObjectStreams = options.useObjectStreams;
  }

  get warnings(): readonly string[] {
    return this._warnings;
  }

  getPageCount(): number {
    return this.doc.getPageCount();
  }

  getPageBox(pageIndex: number): PageBox {
    const page = this.page(pageIndex);
    const box = readMediaBox(page);

    if (box) {
      return box;
    }

    if (!this.reportedBoxes.has(pageIndex)) {
      this.reportedBoxes.add(pageIndex);
      this._warnings.push(
        `Page ${pageIndex} has no usable /MediaBox, using US Letter ` +
          `(${FALLBACK_PAGE_BOX.width}x${FALLBACK_PAGE_BOX.height})`,
      );
    }

    return { ...FALLBACK_PAGE_BOX };
  }

  drawText(pageIndex: number, run: TextRun): void {
    const page = this.page(pageIndex);

    if (!Number.isFinite(run.size) || run.size <= 0) {
      throw new InvalidSizeError(run.size);
    }

    const parsedFont = FontKeySchema.safeParse(run.font);

    if (!parsedFont.success) {
      throw new UnsupportedFontError(String(run.font), FONT_KEYS);
    }

    const fontKey = parsedFont.data;
    const unencodable = findUnencodable(run.text, fontKey);

    if (unencodable.length > 0) {
      throw new UnencodableTextError(fontKey, unencodable);
    }

    const font = this.font(fontKey);
    const resourceName = addFontResource(page, font);
    const lines = run.text.split(/\r\n|\r|\n/);

    const ops: PDFOperator[] = [
      pushGraphicsState(),
      setFillingRgbColor(0, 0, 0),
      beginText(),
      setFontAndSize(resourceName, run.size),
    ];

    if (lines.length > 1) {
      ops.push(setLineHeight(run.size * LINE_HEIGHT_FACTOR));
    }

    ops.push(setTextMatrix(1, 0, 0, 1, run.x, run.y));

    lines.forEach((line, i) => {
      if (i > 0) {
        ops.push(nextLine());
      }

      ops.push(showText(font.encodeText(line)));
    });

    ops.push(endText(), popGraphicsState());

    page.pushOperators(...ops);
  }

  serialize(): Promise<Uint8Array> {
    return this.doc.save({
      useObjectStreams: this.useObjectStreams,
      addDefaultPage: false,
      updateFieldAppearances: false,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private page(pageIndex: number): PDFPage {
    const count = this.doc.getPageCount();

    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= count) {
      throw new PageIndexError(pageIndex, count);
    }

    return this.doc.getPage(pageIndex);
  }

  private font(key: FontKey): PDFFont {
    let font = this.fonts.get(key);

    if (!font) {
      font = this.doc.embedStandardFont(BASE_FONTS[key]);
      this.fonts.set(key, font);
    }

    return font;
  }
}

/**
 * Register `font` in the page's /Font resources and return its name.
 *
 * The base font name is tried first, then `-1`, `-2`, ... suffixes, so an
 * existing template font under the same name is never replaced.
 */
function addFontResource(page: PDFPage, font: PDFFont): PDFName {
  const fonts = page.node.Resources()?.lookupMaybe(FONT, PDFDict);

  for (let n = 0; ; n++) {
    const name = PDFName.of(n === 0 ? font.name : `${font.name}-${n}`);
    const existing = fonts?.get(name);

    if (existing === undefined) {
      page.node.setFontDictionary(name, font.ref);
      return name;
    }

    if (existing === font.ref) {
      return name;
    }
  }
}

/**
 * Read the (possibly inherited) media box of a page, or null when it is
 * missing, malformed or empty.
 */
function readMediaBox(page: PDFPage): PageBox | null {
  const raw = page.node.context.lookup(page.node.getInheritableAttribute(MEDIA_BOX));

  if (!(raw instanceof PDFArray) || raw.size() !== 4) {
    return null;
  }

  const values: number[] = [];

  for (let i = 0; i < 4; i++) {
    const entry = raw.lookup(i);

    if (!(entry instanceof PDFNumber)) {
      return null;
    }

    values.push(entry.asNumber());
  }

  const [llx, lly, urx, ury] = values;
  const width = Math.abs(urx - llx);
  const height = Math.abs(ury - lly);

  if (width === 0 || height === 0) {
    return null;
  }

  return { x: Math.min(llx, urx), y: Math.min(lly, ury), width, height };
}

/**
 * Engine that loads templates with pdf-lib.
 */
export class PdfLibEngine implements PdfEngine {
  async load(bytes: Uint8Array, options: EngineLoadOptions = {}): Promise<EngineDocument> {
    let doc: PDFDocument;

    try {
      doc = await PDFDocument.load(bytes, {
        ignoreEncryption: options.ignoreEncryption ?? false,
        updateMetadata: false,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);

      throw new InvalidDocumentError(`Template is not a readable PDF: ${reason}`, {
        cause: error,
      });
    }

    return new PdfLibDocument(doc, { useObjectStreams: options.useObjectStreams ?? true });
  }
}

/** Shared default engine instance */
export const pdfLibEngine: PdfEngine = new PdfLibEngine();
