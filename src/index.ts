/**
 * pdf-quicktext
 *
 * Stamp text onto existing PDF templates.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// Sessions
// ─────────────────────────────────────────────────────────────────────────────

export {
  type OffsetTextOptions,
  type SessionOptions,
  StampSession,
  type TextOptions,
  type TextStyle,
} from "./api/stamp-session";
export type { EditingState, IdleState, SessionState } from "./api/session-state";
export { DEFAULT_FONT, DEFAULT_FONT_SIZE } from "./api/schemas";

// ─────────────────────────────────────────────────────────────────────────────
// Record merge
// ─────────────────────────────────────────────────────────────────────────────

export {
  type MergeOptions,
  type MergePage,
  type MergeResult,
  mergeRecords,
  readRecords,
} from "./api/record-merge";
export { claimUniqueName, toOutputFileName } from "./helpers/file-names";

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export type { EngineDocument, EngineLoadOptions, PdfEngine, TextRun } from "./engine/types";
export { PdfLibDocument, PdfLibEngine, pdfLibEngine } from "./engine/pdf-lib-engine";

// ─────────────────────────────────────────────────────────────────────────────
// Fonts and units
// ─────────────────────────────────────────────────────────────────────────────

export {
  BASE_FONTS,
  FONT_KEYS,
  type FontInput,
  type FontKey,
  findUnencodable,
  isFontInput,
  resolveFont,
} from "./fonts/standard-fonts";
export { FALLBACK_PAGE_BOX, type PageBox } from "./helpers/page-size";
export { CM_PER_INCH, cmToPoints, fromTopLeft, inchesToPoints, POINTS_PER_INCH } from "./helpers/units";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  InvalidCoordinateError,
  InvalidDocumentError,
  InvalidOptionsError,
  InvalidSizeError,
  NoPageOpenError,
  PageAlreadyOpenError,
  PageIndexError,
  PageStillOpenError,
  StampError,
  type StampErrorCode,
  UnencodableTextError,
  UnsupportedFontError,
} from "./errors";
