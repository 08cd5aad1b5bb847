/**
 * Error classes for stamping sessions.
 *
 * Every error thrown by this package extends StampError and carries a
 * machine-readable `code`. State-machine errors (page already open, no page
 * open, page still open) are raised before anything is mutated, so the
 * session is unchanged after a failed call.
 */

/**
 * Error codes for stamping failures.
 */
export type StampErrorCode =
  | "INVALID_DOCUMENT"
  | "INVALID_OPTIONS"
  | "PAGE_INDEX"
  | "PAGE_ALREADY_OPEN"
  | "NO_PAGE_OPEN"
  | "PAGE_STILL_OPEN"
  | "UNSUPPORTED_FONT"
  | "INVALID_SIZE"
  | "INVALID_COORDINATE"
  | "UNENCODABLE_TEXT";

/**
 * Base class for stamping errors.
 */
export class StampError extends Error {
  readonly code: StampErrorCode;

  constructor(message: string, code: StampErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StampError";
    this.code = code;
  }
}

/**
 * The template bytes could not be loaded by the PDF engine.
 *
 * The engine's own error is kept as `cause`.
 */
export class InvalidDocumentError extends StampError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INVALID_DOCUMENT", options);
    this.name = "InvalidDocumentError";
  }
}

/**
 * Session or merge options failed validation.
 */
export class InvalidOptionsError extends StampError {
  constructor(message: string) {
    super(message, "INVALID_OPTIONS");
    this.name = "InvalidOptionsError";
  }
}

/**
 * A page index outside `[0, pageCount)`, or not an integer.
 */
export class PageIndexError extends StampError {
  readonly index: number;
  readonly pageCount: number;

  constructor(index: number, pageCount: number) {
    super(
      pageCount === 0
        ? `Page index ${index} out of bounds (document has no pages)`
        : `Page index ${index} out of bounds (0-${pageCount - 1})`,
      "PAGE_INDEX",
    );
    this.name = "PageIndexError";
    this.index = index;
    this.pageCount = pageCount;
  }
}

/**
 * openPage() was called while another page is open.
 */
export class PageAlreadyOpenError extends StampError {
  readonly openPage: number;

  constructor(openPage: number) {
    super(
      `Page ${openPage} is already open and must be closed before opening another page`,
      "PAGE_ALREADY_OPEN",
    );
    this.name = "PageAlreadyOpenError";
    this.openPage = openPage;
  }
}

/**
 * A page-scoped operation was called with no page open.
 */
export class NoPageOpenError extends StampError {
  constructor(operation: string) {
    super(`A page must be opened before calling ${operation}()`, "NO_PAGE_OPEN");
    this.name = "NoPageOpenError";
  }
}

/**
 * save() or reset() was called while a page still holds uncommitted text.
 */
export class PageStillOpenError extends StampError {
  readonly openPage: number;

  constructor(openPage: number, operation: string) {
    super(
      `Page ${openPage} is still open; close or discard it before calling ${operation}()`,
      "PAGE_STILL_OPEN",
    );
    this.name = "PageStillOpenError";
    this.openPage = openPage;
  }
}

/**
 * The font identifier is not one of the standard fonts.
 */
export class UnsupportedFontError extends StampError {
  readonly font: string;

  constructor(font: string, supported: readonly string[]) {
    super(`"${font}" is not a supported font. Valid names: ${supported.join(", ")}`, "UNSUPPORTED_FONT");
    this.name = "UnsupportedFontError";
    this.font = font;
  }
}

/**
 * Font size is zero, negative or not a finite number.
 */
export class InvalidSizeError extends StampError {
  readonly size: number;

  constructor(size: number) {
    super(`Font size must be a positive number, got ${size}`, "INVALID_SIZE");
    this.name = "InvalidSizeError";
    this.size = size;
  }
}

/**
 * A text position is not a finite number.
 */
export class InvalidCoordinateError extends StampError {
  constructor(axis: string, value: number) {
    super(`Coordinate ${axis} must be a finite number, got ${value}`, "INVALID_COORDINATE");
    this.name = "InvalidCoordinateError";
  }
}

/**
 * The text contains characters the chosen font's built-in encoding cannot
 * represent.
 */
export class UnencodableTextError extends StampError {
  readonly characters: string[];

  constructor(font: string, characters: string[]) {
    const listed = characters.map(c => JSON.stringify(c)).join(", ");

    super(`Font "${font}" cannot encode ${listed}`, "UNENCODABLE_TEXT");
    this.name = "UnencodableTextError";
    this.characters = characters;
  }
}
