import { describe, expect, it } from "vitest";

import {
  InvalidDocumentError,
  InvalidSizeError,
  PageIndexError,
  UnencodableTextError,
} from "#src/errors";
import {
  asciiHex,
  captureError,
  captureRejection,
  countPages,
  createTemplate,
  readFontResourceNames,
  readPageContent,
} from "#src/test-utils";
import { PdfLibEngine } from "./pdf-lib-engine";
import type { TextRun } from "./types";

const engine = new PdfLibEngine();

function courier(text: string, overrides: Partial<TextRun> = {}): TextRun {
  return { text, x: 72, y: 700, size: 10, font: "courier", ...overrides };
}

describe("PdfLibEngine", () => {
  describe("load", () => {
    it("reads the page count", async () => {
      const doc = await engine.load(await createTemplate({ pages: 3 }));

      expect(doc.getPageCount()).toBe(3);
      expect(doc.warnings).toEqual([]);
    });

    it("wraps parse failures in InvalidDocumentError", async () => {
      const garbage = new TextEncoder().encode("this is not a pdf");
      const error = await captureRejection(engine.load(garbage));

      expect(error).toBeInstanceOf(InvalidDocumentError);
      expect(error).toMatchObject({ code: "INVALID_DOCUMENT" });
      expect(error).toHaveProperty("cause");
    });
  });

  describe("getPageBox", () => {
    it("returns the media box in points", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1, size: [400, 600] }));

      expect(doc.getPageBox(0)).toEqual({ x: 0, y: 0, width: 400, height: 600 });
    });

    it("falls back to US Letter and warns once per page", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1, withoutMediaBox: true }));

      expect(doc.getPageBox(0)).toEqual({ x: 0, y: 0, width: 612, height: 792 });
      expect(doc.getPageBox(0)).toEqual({ x: 0, y: 0, width: 612, height: 792 });
      expect(doc.warnings).toEqual(["Page 0 has no usable /MediaBox, using US Letter (612x792)"]);
    });

    it("rejects out-of-range pages", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));

      expect(() => doc.getPageBox(1)).toThrow(PageIndexError);
    });
  });

  describe("drawText", () => {
    it("writes one text object with the standard font", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));

      doc.drawText(0, courier("Alice"));

      const saved = await doc.serialize();
      const content = await readPageContent(saved, 0);

      expect(content).toContain(
        ["q", "0 0 0 rg", "BT", "/Courier 10 Tf", "1 0 0 1 72 700 Tm", "<416C696365> Tj", "ET", "Q"].join(
          "\n",
        ),
      );
      expect(await readFontResourceNames(saved, 0)).toEqual(["Courier"]);
    });

    it("sets leading and breaks lines for multi-line text", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));

      doc.drawText(0, courier("Alice\nSmith"));

      const content = await readPageContent(await doc.serialize(), 0);

      expect(content).toContain(
        [
          "/Courier 10 Tf",
          "12 TL",
          "1 0 0 1 72 700 Tm",
          `<${asciiHex("Alice")}> Tj`,
          "T*",
          `<${asciiHex("Smith")}> Tj`,
          "ET",
        ].join("\n"),
      );
    });

    it("draws an empty string as an empty text object", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));

      doc.drawText(0, courier(""));

      const content = await readPageContent(await doc.serialize(), 0);

      expect(content).toContain("1 0 0 1 72 700 Tm\n<> Tj\nET");
    });

    it("reuses one resource name for repeated runs on a page", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));

      doc.drawText(0, courier("one"));
      doc.drawText(0, courier("two", { y: 680 }));

      expect(await readFontResourceNames(await doc.serialize(), 0)).toEqual(["Courier"]);
    });

    it("keeps an existing font resource under the same name", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1, courierResourceTaken: true }));

      doc.drawText(0, courier("Alice"));

      const saved = await doc.serialize();

      expect(await readFontResourceNames(saved, 0)).toEqual(["Courier", "Courier-1"]);
      expect(await readPageContent(saved, 0)).toContain("/Courier-1 10 Tf");
    });

    it("only touches the page it draws on", async () => {
      const doc = await engine.load(await createTemplate({ pages: 2 }));

      doc.drawText(1, courier("Bob"));

      const saved = await doc.serialize();

      expect(await countPages(saved)).toBe(2);
      expect(await readPageContent(saved, 0)).not.toContain("Tj");
      expect(await readPageContent(saved, 1)).toContain(`<${asciiHex("Bob")}> Tj`);
    });

    it("rejects text the font cannot encode without changing the page", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));
      const error = captureError(() => doc.drawText(0, courier("日本")));

      expect(error).toBeInstanceOf(UnencodableTextError);
      expect(error).toMatchObject({ characters: ["日", "本"] });
      expect(await readFontResourceNames(await doc.serialize(), 0)).toEqual([]);
    });

    it("validates size and page", async () => {
      const doc = await engine.load(await createTemplate({ pages: 1 }));

      expect(() => doc.drawText(0, courier("a", { size: 0 }))).toThrow(InvalidSizeError);
      expect(() => doc.drawText(0, courier("a", { size: Number.NaN }))).toThrow(InvalidSizeError);
      expect(() => doc.drawText(3, courier("a"))).toThrow(PageIndexError);
    });
  });

  describe("serialize", () => {
    it("gives the same bytes when nothing changed in between", async () => {
      const doc = await engine.load(await createTemplate({ pages: 2, header: "Certificate" }));

      doc.drawText(0, courier("Alice"));

      const first = await doc.serialize();
      const second = await doc.serialize();

      expect(Buffer.from(second).equals(Buffer.from(first))).toBe(true);
    });
  });
});
