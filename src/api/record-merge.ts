/**
 * Record merge: one stamped copy of the template per input record.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { claimUniqueName, toOutputFileName } from "#src/helpers/file-names";
import type { PageBox } from "#src/helpers/page-size";
import type { OffsetTextOptions, StampSession, TextOptions } from "./stamp-session";

/**
 * The open page, as seen by a merge's stamp callback.
 */
export interface MergePage {
  /** 0-based page index */
  readonly index: number;
  /** Media box in points */
  readonly box: PageBox;
  addText(text: string, options: TextOptions): void;
  addTextInches(text: string, options: OffsetTextOptions): void;
  addTextCm(text: string, options: OffsetTextOptions): void;
}

export interface MergeOptions<T> {
  records: Iterable<T>;
  /** Directory the output files are written to; must exist */
  outputDir: string;
  /**
   * Called once per page per record, with the page open. A returned promise
   * is awaited before the page is closed.
   */
  stamp: (page: MergePage, record: T) => void | Promise<void>;
  /**
   * Raw file name for a record, sanitized before use.
   * Default: `String(record)`.
   */
  fileName?: (record: T, index: number) => string;
}

export interface MergeResult {
  /** Paths written, in record order */
  files: string[];
  /** Renamed duplicates and warnings from the session */
  warnings: string[];
}

/**
 * Stamp every page of the template for each record and write one PDF per
 * record.
 *
 * The session is reset before the first record and after each one, so every
 * output starts from the pristine template; edits committed before the call
 * are discarded. If `stamp` or the write fails, the open page is discarded,
 * the session is reset and the error is rethrown; files already written stay.
 *
 * @throws {PageStillOpenError} if the session has a page open
 *
 * @example
 * ```typescript
 * const session = await StampSession.load(template);
 * const names = await readRecords("names.txt");
 *
 * await mergeRecords(session, {
 *   records: names,
 *   outputDir: "out",
 *   stamp: (page, name) => page.addTextInches(name, { fromLeft: 7.1, fromTop: 1.03, size: 10, font: "courier" }),
 * });
 * ```
 */
export async function mergeRecords<T>(
  session: StampSession,
  options: MergeOptions<T>,
): Promise<MergeResult> {
  await session.reset();

  const nameOf = options.fileName ?? ((record: T) => String(record));
  const taken = new Set<string>();
  const files: string[] = [];
  const warnings: string[] = [];

  let index = 0;

  for (const record of options.records) {
    const sanitized = toOutputFileName(nameOf(record, index), index);
    const name = claimUniqueName(sanitized, taken);

    if (name !== sanitized) {
      warnings.push(`Record ${index + 1}: "${sanitized}" already used, writing "${name}"`);
    }

    const path = join(options.outputDir, name);

    try {
      await stampAllPages(session, record, options.stamp);
      await session.saveTo(path);
      files.push(path);
      warnings.push(...session.warnings);
    } finally {
      if (session.isEditing) {
        session.discardPage();
      }

      await session.reset();
    }

    index++;
  }

  return { files, warnings };
}

async function stampAllPages<T>(
  session: StampSession,
  record: T,
  stamp: MergeOptions<T>["stamp"],
): Promise<void> {
  for (let i = 0; i < session.getPageCount(); i++) {
    session.openPage(i);

    const page: MergePage = {
      index: i,
      box: session.getPageBox(),
      addText: (text, options) => session.addText(text, options),
      addTextInches: (text, options) => session.addTextInches(text, options),
      addTextCm: (text, options) => session.addTextCm(text, options),
    };

    await stamp(page, record);
    session.closePage();
  }
}

/**
 * Read records from a UTF-8 text file, one per line.
 *
 * Trailing carriage returns are stripped and blank lines skipped.
 */
export async function readRecords(path: string): Promise<string[]> {
  const content = await readFile(path, "utf8");

  return content
    .split("\n")
    .map(line => line.replace(/\r$/, ""))
    .filter(line => line.trim() !== "");
}
