/**
 * Editing state of a stamp session.
 *
 * The session is either idle or editing exactly one page. All transitions
 * are pure functions over an immutable value; each checks its precondition
 * and throws before producing a new state, so a rejected transition leaves
 * the caller's state untouched.
 */

import type { TextRun } from "#src/engine/types";
import { NoPageOpenError, PageAlreadyOpenError, PageIndexError, PageStillOpenError } from "#src/errors";

export interface IdleState {
  readonly kind: "idle";
}

export interface EditingState {
  readonly kind: "editing";
  /** Index of the open page */
  readonly pageIndex: number;
  /** Runs waiting to be committed, in insertion order */
  readonly pending: readonly TextRun[];
}

export type SessionState = IdleState | EditingState;

export const IDLE: IdleState = { kind: "idle" };

/**
 * IDLE → EDITING.
 *
 * @throws {PageAlreadyOpenError} if a page is already open
 * @throws {PageIndexError} if `pageIndex` is not an integer in `[0, pageCount)`
 */
export function openPage(state: SessionState, pageIndex: number, pageCount: number): EditingState {
  if (state.kind === "editing") {
    throw new PageAlreadyOpenError(state.pageIndex);
  }

  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageCount) {
    throw new PageIndexError(pageIndex, pageCount);
  }

  return { kind: "editing", pageIndex, pending: [] };
}

/**
 * Narrow to the editing state or fail with NoPageOpenError.
 */
export function requireEditing(state: SessionState, operation: string): EditingState {
  if (state.kind !== "editing") {
    throw new NoPageOpenError(operation);
  }

  return state;
}

/**
 * Narrow to the idle state or fail with PageStillOpenError.
 */
export function requireIdle(state: SessionState, operation: string): IdleState {
  if (state.kind !== "idle") {
    throw new PageStillOpenError(state.pageIndex, operation);
  }

  return state;
}

/**
 * EDITING → EDITING, with one more pending run.
 */
export function appendRun(state: SessionState, run: TextRun): EditingState {
  const editing = requireEditing(state, "addText");

  return { ...editing, pending: [...editing.pending, run] };
}

/**
 * EDITING → IDLE. Returns the page and runs that must be committed.
 */
export function closePage(state: SessionState): {
  next: IdleState;
  pageIndex: number;
  runs: readonly TextRun[];
} {
  const editing = requireEditing(state, "closePage");

  return { next: IDLE, pageIndex: editing.pageIndex, runs: editing.pending };
}

/**
 * EDITING → IDLE, dropping pending runs.
 */
export function discardPage(state: SessionState): IdleState {
  requireEditing(state, "discardPage");

  return IDLE;
}
