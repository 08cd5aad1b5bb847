/**
 * The standard 14 Type 1 fonts every PDF reader provides.
 *
 * Text is stamped with these fonts only, so nothing is ever embedded beyond
 * a small font dictionary. Fonts are addressed by a lowercase key
 * (`"courier"`, `"timesbold"`) or by their PostScript base name
 * (`"Courier"`, `"Times-Bold"`).
 */

import { type EncodingType, Encodings } from "@pdf-lib/standard-fonts";
import { StandardFonts } from "pdf-lib";
import { z } from "zod";

import { UnsupportedFontError } from "#src/errors";

/** Font keys accepted by the stamping API. */
export const FONT_KEYS = [
  "courier",
  "courierbold",
  "courierboldoblique",
  "courieroblique",
  "helvetica",
  "helveticabold",
  "helveticaboldoblique",
  "helveticaoblique",
  "timesroman",
  "timesbold",
  "timesitalic",
  "timesbolditalic",
  "symbol",
  "zapfdingbats",
] as const;

export const FontKeySchema = z.enum(FONT_KEYS);
export type FontKey = z.infer<typeof FontKeySchema>;

/** Anything `resolveFont` accepts: a key or a base name. */
export type FontInput = FontKey | `${StandardFonts}`;

/**
 * Base font for each key.
 */
export const BASE_FONTS: Readonly<Record<FontKey, StandardFonts>> = {
  courier: StandardFonts.Courier,
  courierbold: StandardFonts.CourierBold,
  courierboldoblique: StandardFonts.CourierBoldOblique,
  courieroblique: StandardFonts.CourierOblique,
  helvetica: StandardFonts.Helvetica,
  helveticabold: StandardFonts.HelveticaBold,
  helveticaboldoblique: StandardFonts.HelveticaBoldOblique,
  helveticaoblique: StandardFonts.HelveticaOblique,
  timesroman: StandardFonts.TimesRoman,
  timesbold: StandardFonts.TimesRomanBold,
  timesitalic: StandardFonts.TimesRomanItalic,
  timesbolditalic: StandardFonts.TimesRomanBoldItalic,
  symbol: StandardFonts.Symbol,
  zapfdingbats: StandardFonts.ZapfDingbats,
};

const keyByBaseName = new Map<string, FontKey>(
  FONT_KEYS.map(key => [BASE_FONTS[key], key] as const),
);

/**
 * Check whether a string names a supported font.
 */
export function isFontInput(font: string): font is FontInput {
  return FontKeySchema.safeParse(font).success || keyByBaseName.has(font);
}

/**
 * Resolve a font identifier to its key.
 *
 * @throws {UnsupportedFontError} if the identifier is neither a key nor a base name
 *
 * @example
 * ```ts
 * resolveFont("courier"); // "courier"
 * resolveFont("Times-Bold"); // "timesbold"
 * ```
 */
export function resolveFont(font: string): FontKey {
  const parsed = FontKeySchema.safeParse(font);

  if (parsed.success) {
    return parsed.data;
  }

  const key = keyByBaseName.get(font);

  if (key === undefined) {
    throw new UnsupportedFontError(font, FONT_KEYS);
  }

  return key;
}

/**
 * Built-in encoding of a font. Symbol and ZapfDingbats have their own;
 * the other twelve use WinAnsi.
 */
function encodingFor(key: FontKey): EncodingType {
  switch (key) {
    case "symbol":
      return Encodings.Symbol;
    case "zapfdingbats":
      return Encodings.ZapfDingbats;
    default:
      return Encodings.WinAnsi;
  }
}

const codePointCache = new Map<FontKey, ReadonlySet<number>>();

function supportedCodePoints(key: FontKey): ReadonlySet<number> {
  let points = codePointCache.get(key);

  if (!points) {
    points = new Set(encodingFor(key).supportedCodePoints);
    codePointCache.set(key, points);
  }

  return points;
}

/**
 * Characters of `text` that `font` cannot encode, in order of first
 * appearance, without duplicates. Line breaks are not reported; they split
 * lines rather than being drawn.
 *
 * @example
 * ```ts
 * findUnencodable("Zoë", "courier"); // []
 * findUnencodable("日本", "courier"); // ["日", "本"]
 * ```
 */
export function findUnencodable(text: string, font: FontKey): string[] {
  const points = supportedCodePoints(font);
  const missing: string[] = [];

  for (const char of text) {
    if (char === "\n" || char === "\r") continue;

    const codePoint = char.codePointAt(0);

    if (codePoint !== undefined && !points.has(codePoint) && !missing.includes(char)) {
      missing.push(char);
    }
  }

  return missing;
}
