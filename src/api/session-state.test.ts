import { describe, expect, it } from "vitest";

import type { TextRun } from "#src/engine/types";
import { NoPageOpenError, PageAlreadyOpenError, PageIndexError, PageStillOpenError } from "#src/errors";
import {
  appendRun,
  closePage,
  discardPage,
  type EditingState,
  IDLE,
  openPage,
  requireIdle,
} from "./session-state";

function run(text: string): TextRun {
  return { text, x: 10, y: 20, size: 12, font: "helvetica" };
}

describe("session state", () => {
  describe("openPage", () => {
    it("moves from idle to editing with nothing pending", () => {
      expect(openPage(IDLE, 1, 3)).toEqual({ kind: "editing", pageIndex: 1, pending: [] });
    });

    it("rejects a second open and names the open page", () => {
      const editing = openPage(IDLE, 0, 2);

      expect(() => openPage(editing, 1, 2)).toThrow(PageAlreadyOpenError);
      expect(() => openPage(editing, 1, 2)).toThrow("Page 0 is already open");
    });

    it("reports an open page before a bad index", () => {
      const editing = openPage(IDLE, 0, 2);

      expect(() => openPage(editing, 9, 2)).toThrow(PageAlreadyOpenError);
    });

    it.each([-1, 2, 5, 0.5, Number.NaN])("rejects index %s on a 2-page document", index => {
      expect(() => openPage(IDLE, index, 2)).toThrow(PageIndexError);
    });

    it("rejects every index when there are no pages", () => {
      expect(() => openPage(IDLE, 0, 0)).toThrow("document has no pages");
    });
  });

  describe("appendRun", () => {
    it("requires an open page", () => {
      expect(() => appendRun(IDLE, run("a"))).toThrow(NoPageOpenError);
    });

    it("keeps runs in insertion order without changing the input state", () => {
      const opened = openPage(IDLE, 0, 1);
      const once = appendRun(opened, run("a"));
      const twice = appendRun(once, run("b"));

      expect(opened.pending).toEqual([]);
      expect(once.pending.map(r => r.text)).toEqual(["a"]);
      expect(twice.pending.map(r => r.text)).toEqual(["a", "b"]);
    });
  });

  describe("closePage", () => {
    it("returns the runs to commit and an idle state", () => {
      const editing: EditingState = appendRun(openPage(IDLE, 2, 3), run("x"));
      const result = closePage(editing);

      expect(result.next).toBe(IDLE);
      expect(result.pageIndex).toBe(2);
      expect(result.runs).toEqual([run("x")]);
    });

    it("requires an open page", () => {
      expect(() => closePage(IDLE)).toThrow(NoPageOpenError);
      expect(() => closePage(IDLE)).toThrow("closePage()");
    });
  });

  describe("discardPage", () => {
    it("returns to idle", () => {
      expect(discardPage(appendRun(openPage(IDLE, 0, 1), run("x")))).toBe(IDLE);
    });

    it("requires an open page", () => {
      expect(() => discardPage(IDLE)).toThrow(NoPageOpenError);
    });
  });

  describe("requireIdle", () => {
    it("passes when idle", () => {
      expect(requireIdle(IDLE, "save")).toBe(IDLE);
    });

    it("fails while a page is open", () => {
      const editing = openPage(IDLE, 1, 2);

      expect(() => requireIdle(editing, "save")).toThrow(PageStillOpenError);
      expect(() => requireIdle(editing, "save")).toThrow(
        "Page 1 is still open; close or discard it before calling save()",
      );
    });
  });
});
