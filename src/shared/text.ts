/** Characters that make up borders, rules and spinners in TUI output */
const DECORATIVE_CHARS = new Set(
  " \t─│┌┐└┘├┤┬┴┼═║╔╗╚╝╠╣╦╩╬▀▄█▌▐░▒▓■□▪▫-_=~"
);

export const EMPTY_OUTPUT_PLACEHOLDER = "Assistant activity detected";

export const TRUNCATION_MARKER = "[...truncated]\n";

function isDecorative(line: string): boolean {
  for (const ch of line) {
    if (!DECORATIVE_CHARS.has(ch)) return false;
  }
  return true;
}

/**
 * Drop lines made only of box-drawing glyphs and separators.
 * Blank lines and everything else pass through untouched.
 */
export function stripDecorativeLines(text: string): string {
  return text
    .split("\n")
    .filter((line) => {
      const trimmed = line.trim();
      return trimmed === "" || !isDecorative(trimmed);
    })
    .join("\n");
}

/**
 * Keep the last `max` non-empty lines, in order.
 */
export function tailNonEmptyLines(
  text: string | null,
  max: number
): string {
  if (!text) return EMPTY_OUTPUT_PLACEHOLDER;
  const relevant = text.split("\n").filter((line) => line.trim() !== "");
  if (relevant.length === 0) return EMPTY_OUTPUT_PLACEHOLDER;
  return relevant.slice(-max).join("\n");
}

/**
 * Cut to the most recent `limit` characters, marking the cut. Counts code
 * points, so a surrogate pair is never split.
 */
export function truncateTail(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return TRUNCATION_MARKER + chars.slice(-limit).join("");
}

/** Escape for Telegram's HTML parse mode */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** Escape for HTML attribute values in the web UI */
export function escapeHtmlAttr(text: string): string {
  return escapeHtml(text).replace(/"/g, "&quot;").replace(/'/g, "&#39;");
}
