/**
 * Zod schemas for session configuration and text placement.
 */

import { z } from "zod";

import { InvalidOptionsError } from "#src/errors";
import { isFontInput, resolveFont } from "#src/fonts/standard-fonts";

/** Default font size in points */
export const DEFAULT_FONT_SIZE = 11;

/** Default font key */
export const DEFAULT_FONT = "timesroman";

/** A position in points: any finite number */
export const CoordinateSchema = z.number().finite();

/** A font size in points: finite and strictly positive */
export const FontSizeSchema = z.number().positive().finite();

/** A font identifier, resolved to its key */
export const FontSchema = z
  .string()
  .refine(isFontInput, font => ({ message: `Unsupported font: ${font}` }))
  .transform(resolveFont);

/**
 * Validated session settings (everything except the engine).
 */
export const SessionConfigSchema = z.object({
  defaultFont: FontSchema.default(DEFAULT_FONT),
  defaultSize: FontSizeSchema.default(DEFAULT_FONT_SIZE),
  ignoreEncryption: z.boolean().default(false),
  useObjectStreams: z.boolean().default(true),
});
export type SessionConfig = z.output<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

/**
 * Parse session settings, applying defaults.
 *
 * @throws {InvalidOptionsError} listing every invalid field
 */
export function parseSessionConfig(input: SessionConfigInput): SessionConfig {
  const result = SessionConfigSchema.safeParse(input);

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");

    throw new InvalidOptionsError(`Invalid session options: ${details}`);
  }

  return result.data;
}
