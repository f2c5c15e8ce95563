/**
 * Text clean-up for the operator's terminal.
 * Incoming chat text may carry Unicode punctuation and mIRC formatting codes;
 * a packet terminal wants plain printable ASCII.
 */
import asciiMap from './data/ascii-map.json';

const replacements: [string, string][] = Object.entries(asciiMap);

// mIRC colour (\x03 with optional fg,bg digits), bold, italic, underline, reverse, reset
const FORMATTING_PATTERN = /\x03(?:\d{1,2}(?:,\d{1,2})?)?|[\x02\x0F\x16\x1D\x1E\x1F]/g;

/**
 * Replace known Unicode characters with ASCII equivalents and drop the rest
 * @param text - The text to sanitize
 */
export function sanitizeUnicode(text: string): string {
  if (!text) {
    return text;
  }

  let sanitized = text;
  for (const [unicode, ascii] of replacements) {
    sanitized = sanitized.split(unicode).join(ascii);
  }

  // Keep tab and printable ASCII only
  return sanitized.replace(/[^\x09\x20-\x7E]/g, '');
}

/** Remove IRC formatting codes and control characters, leaving Unicode alone. */
export function stripFormatting(text: string): string {
  return text.replace(FORMATTING_PATTERN, '').replace(/[\x00-\x08\x0A-\x1F\x7F]/g, '');
}

/** Everything incoming text goes through before it is printed. */
export function sanitizeForTerminal(text: string, asciiOnly: boolean): string {
  const stripped = stripFormatting(text);
  return asciiOnly ? sanitizeUnicode(stripped) : stripped;
}
