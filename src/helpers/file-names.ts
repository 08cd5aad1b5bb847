/**
 * Output file naming for record merges.
 */

/** Longest stem kept before the extension, in code points */
export const MAX_STEM_LENGTH = 200;

/**
 * Characters never allowed in an output name: path separators, characters
 * reserved on Windows, and C0/C1 control characters.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: control characters are what is being matched
const UNSAFE_CHARS = /[/\\<>:"|?*\u0000-\u001f\u007f-\u009f]/g;

/**
 * Turn a raw record (typically a line of input) into a safe PDF file name.
 *
 * Surrounding whitespace is trimmed, unsafe characters become `_`, runs of
 * whitespace and underscores collapse to a single `_`, and leading dots are
 * removed so the name can never be `.`/`..` or hidden. An empty result falls
 * back to `record-<index + 1>`.
 *
 * @example
 * ```ts
 * toOutputFileName("Alice Smith\n", 0); // "Alice_Smith.pdf"
 * toOutputFileName("../etc/passwd", 3); // "_etc_passwd.pdf"
 * toOutputFileName("   ", 3); // "record-4.pdf"
 * ```
 */
export function toOutputFileName(raw: string, index: number): string {
  let stem = raw
    .trim()
    .replace(UNSAFE_CHARS, "_")
    .replace(/[\s_]+/g, "_")
    .replace(/^\.+/, "");

  const chars = Array.from(stem);

  if (chars.length > MAX_STEM_LENGTH) {
    stem = chars.slice(0, MAX_STEM_LENGTH).join("");
  }

  if (stem === "" || stem === "_") {
    stem = `record-${index + 1}`;
  }

  return `${stem}.pdf`;
}

/**
 * Make `name` unique among `taken` by appending `-2`, `-3`, ... before the
 * extension. The returned name is added to `taken`.
 */
export function claimUniqueName(name: string, taken: Set<string>): string {
  let candidate = name;

  if (taken.has(candidate)) {
    const dot = name.lastIndexOf(".");
    const stem = dot > 0 ? name.slice(0, dot) : name;
    const ext = dot > 0 ? name.slice(dot) : "";

    for (let n = 2; taken.has(candidate); n++) {
      candidate = `${stem}-${n}${ext}`;
    }
  }

  taken.add(candidate);

  return candidate;
}
