// Line breaks stored in workbook XML: OOXML escapes and numeric character references.
const LINE_BREAK_PLACEHOLDERS =
  /_x000d__x000a_|_x000d_|_x000a_|&#(?:13|x0*d);&#(?:10|x0*a);|&#(?:13|x0*d);|&#(?:10|x0*a);/gi;

/**
 * Canonical form of command or formula text: line-break placeholders become
 * spaces, runs of quotes become one quote, whitespace is collapsed and the
 * ends trimmed. Applying it twice gives the same result as applying it once.
 */
export function normalizeCommandText(input: string | null | undefined): string {
  if (!input) return "";
  return input
    .replace(LINE_BREAK_PLACEHOLDERS, " ")
    .replace(/"{2,}/g, '"')
    .replace(/\s+/g, " ")
    .trim();
}
