/**
 * Page-scoped text stamping over a PDF template.
 *
 * A session owns an immutable copy of the template and one working document
 * made from it. Text is added to the open page only, and reaches the working
 * document when the page is closed. `reset()` throws every committed edit
 * away by loading the template again.
 */

import { writeFile } from "node:fs/promises";

import { pdfLibEngine } from "#src/engine/pdf-lib-engine";
import type { EngineDocument, PdfEngine, TextRun } from "#src/engine/types";
import { InvalidCoordinateError, InvalidSizeError, UnencodableTextError } from "#src/errors";
import { findUnencodable, resolveFont } from "#src/fonts/standard-fonts";
import type { PageBox } from "#src/helpers/page-size";
import { cmToPoints, fromTopLeft, inchesToPoints } from "#src/helpers/units";
import {
  CoordinateSchema,
  FontSizeSchema,
  parseSessionConfig,
  type SessionConfig,
} from "./schemas";
import {
  appendRun,
  closePage,
  discardPage,
  IDLE,
  openPage,
  requireEditing,
  requireIdle,
  type SessionState,
} from "./session-state";

/**
 * Options for loading a session.
 */
export interface SessionOptions {
  /** PDF engine to load the template with (default: pdf-lib) */
  engine?: PdfEngine;
  /** Font used when addText() is given none (default: "timesroman") */
  defaultFont?: string;
  /** Size in points used when addText() is given none (default: 11) */
  defaultSize?: number;
  /** Load encrypted templates without decrypting them (default: false) */
  ignoreEncryption?: boolean;
  /** Use object streams when saving (default: true) */
  useObjectStreams?: boolean;
}

/**
 * Options shared by every addText variant.
 */
export interface TextStyle {
  /** Font size in points */
  size?: number;
  /** Font key ("courier") or base name ("Courier"); see FONT_KEYS */
  font?: string;
}

/**
 * Position in points from the bottom-left corner of user space.
 */
export interface TextOptions extends TextStyle {
  x: number;
  y: number;
}

/**
 * Position measured from the top-left corner of the page's media box.
 */
export interface OffsetTextOptions extends TextStyle {
  fromLeft: number;
  fromTop: number;
}

/**
 * A stamping session over one template.
 *
 * @example
 * ```typescript
 * const session = await StampSession.load(templateBytes);
 *
 * for (let i = 0; i < session.getPageCount(); i++) {
 *   session.openPage(i);
 *   session.addText("Alice", { x: 72, y: 720, size: 10, font: "courier" });
 *   session.closePage();
 * }
 *
 * await session.saveTo("alice.pdf");
 * await session.reset();
 * ```
 */
export class StampSession {
  private readonly engine: PdfEngine;
  private readonly config: SessionConfig;
  private readonly templateBytes: Uint8Array;

  private document: EngineDocument;
  private state: SessionState = IDLE;

  private constructor(
    engine: PdfEngine,
    config: SessionConfig,
    templateBytes: Uint8Array,
    document: EngineDocument,
  ) {
    this.engine = engine;
    this.config = config;
    this.templateBytes = templateBytes;
    this.document = document;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Load a template.
   *
   * The bytes are copied; changing the caller's buffer later has no effect.
   *
   * @throws {InvalidOptionsError} if an option is invalid
   * @throws {InvalidDocumentError} if the engine cannot read the bytes
   */
  static async load(bytes: Uint8Array, options: SessionOptions = {}): Promise<StampSession> {
    const { engine = pdfLibEngine, ...settings } = options;
    const config = parseSessionConfig(settings);
    const templateBytes = bytes.slice();
    const document = await engine.load(templateBytes.slice(), {
      ignoreEncryption: config.ignoreEncryption,
      useObjectStreams: config.useObjectStreams,
    });

    return new StampSession(engine, config, templateBytes, document);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Document info
  // ─────────────────────────────────────────────────────────────────────────────

  getPageCount(): number {
    return this.document.getPageCount();
  }

  /** Index of the open page, or null when none is open */
  get currentPage(): number | null {
    return this.state.kind === "editing" ? this.state.pageIndex : null;
  }

  get isEditing(): boolean {
    return this.state.kind === "editing";
  }

  /** Warnings collected since the last load or reset */
  get warnings(): string[] {
    return [...this.document.warnings];
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Page editing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Open a page (0-based) for editing.
   *
   * @throws {PageAlreadyOpenError} if another page is open
   * @throws {PageIndexError} if the index is out of range
   */
  openPage(index: number): void {
    this.state = openPage(this.state, index, this.getPageCount());
  }

  /**
   * Queue text on the open page at (x, y) points from the bottom-left corner.
   *
   * Empty text is accepted and produces an empty text object. Line breaks
   * start new lines 1.2 × size below the previous one. Tabs and other
   * control characters are not in any standard font encoding and are
   * rejected; replace them before stamping.
   *
   * @throws {NoPageOpenError} if no page is open
   * @throws {InvalidCoordinateError} if x or y is not finite
   * @throws {InvalidSizeError} if size is not a positive number
   * @throws {UnsupportedFontError} if the font is not a standard font
   * @throws {UnencodableTextError} if the font cannot encode the text
   */
  addText(text: string, options: TextOptions): void {
    requireEditing(this.state, "addText");

    const run = this.buildRun(text, options);

    this.state = appendRun(this.state, run);
  }

  /**
   * Queue text positioned in inches from the left and top edges of the
   * open page.
   */
  addTextInches(text: string, options: OffsetTextOptions): void {
    this.addOffsetText(text, options, inchesToPoints, "addTextInches");
  }

  /**
   * Queue text positioned in centimetres from the left and top edges of the
   * open page.
   */
  addTextCm(text: string, options: OffsetTextOptions): void {
    this.addOffsetText(text, options, cmToPoints, "addTextCm");
  }

  /**
   * Media box of the open page in points.
   *
   * Pages without a usable /MediaBox report US Letter and add a warning.
   *
   * @throws {NoPageOpenError} if no page is open
   */
  getPageBox(): PageBox {
    const editing = requireEditing(this.state, "getPageBox");

    return this.document.getPageBox(editing.pageIndex);
  }

  /**
   * Commit the open page's queued text to the document and close it.
   *
   * @throws {NoPageOpenError} if no page is open
   */
  closePage(): void {
    const { next, pageIndex, runs } = closePage(this.state);

    for (const run of runs) {
      this.document.drawText(pageIndex, run);
    }

    this.state = next;
  }

  /**
   * Close the open page without committing its queued text.
   *
   * @throws {NoPageOpenError} if no page is open
   */
  discardPage(): void {
    this.state = discardPage(this.state);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Saving
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Serialize the working document.
   *
   * Saving does not change the session; saving twice gives the same bytes.
   *
   * @throws {PageStillOpenError} if a page is open
   */
  async save(): Promise<Uint8Array> {
    requireIdle(this.state, "save");

    return this.document.serialize();
  }

  /**
   * Serialize the working document to a file.
   *
   * Nothing is written when a page is still open.
   *
   * @throws {PageStillOpenError} if a page is open
   */
  async saveTo(path: string): Promise<void> {
    const bytes = await this.save();

    await writeFile(path, bytes);
  }

  /**
   * Discard every committed edit and start again from the template.
   *
   * @throws {PageStillOpenError} if a page is open
   */
  async reset(): Promise<void> {
    requireIdle(this.state, "reset");

    this.document = await this.engine.load(this.templateBytes.slice(), {
      ignoreEncryption: this.config.ignoreEncryption,
      useObjectStreams: this.config.useObjectStreams,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private addOffsetText(
    text: string,
    options: OffsetTextOptions,
    toPoints: (value: number) => number,
    operation: string,
  ): void {
    requireEditing(this.state, operation);

    checkCoordinate("fromLeft", options.fromLeft);
    checkCoordinate("fromTop", options.fromTop);

    const { x, y } = fromTopLeft(
      this.getPageBox(),
      toPoints(options.fromLeft),
      toPoints(options.fromTop),
    );

    this.addText(text, { x, y, size: options.size, font: options.font });
  }

  private buildRun(text: string, options: TextOptions): TextRun {
    checkCoordinate("x", options.x);
    checkCoordinate("y", options.y);

    const size = options.size ?? this.config.defaultSize;

    if (!FontSizeSchema.safeParse(size).success) {
      throw new InvalidSizeError(size);
    }

    const font = options.font === undefined ? this.config.defaultFont : resolveFont(options.font);
    const unencodable = findUnencodable(text, font);

    if (unencodable.length > 0) {
      throw new UnencodableTextError(font, unencodable);
    }

    return { text, x: options.x, y: options.y, size, font };
  }
}

function checkCoordinate(axis: string, value: number): void {
  if (!CoordinateSchema.safeParse(value).success) {
    throw new InvalidCoordinateError(axis, value);
  }
}
