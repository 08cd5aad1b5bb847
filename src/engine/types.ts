/**
 * PDF engine contract.
 *
 * The session never touches PDF objects directly. Everything it needs from
 * a PDF library goes through these two interfaces.
 */

import type { FontKey } from "#src/fonts/standard-fonts";
import type { PageBox } from "#src/helpers/page-size";

/**
 * One text-draw instruction bound to a page.
 */
export interface TextRun {
  /** Text to draw; line breaks start new lines below the first */
  text: string;
  /** Baseline start in points from the left edge of user space */
  x: number;
  /** Baseline start in points from the bottom edge of user space */
  y: number;
  /** Font size in points */
  size: number;
  font: FontKey;
}

/**
 * Options passed to the engine when loading a template.
 */
export interface EngineLoadOptions {
  /** Load encrypted documents without decrypting them. Default: false */
  ignoreEncryption?: boolean;
  /** Pack objects into object streams on save (PDF 1.5+). Default: true */
  useObjectStreams?: boolean;
}

/**
 * A mutable, page-addressable document owned by one session.
 */
export interface EngineDocument {
  /** Non-fatal conditions met while working on the document */
  readonly warnings: readonly string[];

  getPageCount(): number;

  /**
   * Media box of a page.
   *
   * @throws {PageIndexError} if the index is out of range
   */
  getPageBox(pageIndex: number): PageBox;

  /**
   * Draw a text run onto a page.
   *
   * @throws {PageIndexError} if the index is out of range
   * @throws {InvalidSizeError} if the size is not positive
   * @throws {UnsupportedFontError} if the font is unknown
   * @throws {UnencodableTextError} if the font cannot encode the text
   */
  drawText(pageIndex: number, run: TextRun): void;

  /** Serialize the current state. Does not modify the document. */
  serialize(): Promise<Uint8Array>;
}

export interface PdfEngine {
  /**
   * Load template bytes into a fresh document.
   *
   * @throws {InvalidDocumentError} if the bytes are not a readable PDF
   */
  load(bytes: Uint8Array, options?: EngineLoadOptions): Promise<EngineDocument>;
}
