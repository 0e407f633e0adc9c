/**
 * Terminal column widths for rendered lines. ANSI escape sequences take no
 * columns; CJK and other full-width characters take two.
 */

const ANSI_SEQUENCE = /\x1b\[[0-9;?]*[A-Za-z]/y;
const RESET = "\x1b[0m";

export function isFullWidth(code: number): boolean {
  return (
    (code >= 0x1100 && code <= 0x115f) || // Hangul Jamo
    (code >= 0x2e80 && code <= 0x9fff) || // CJK radicals, symbols, ideographs
    (code >= 0xac00 && code <= 0xd7af) || // Hangul syllables
    (code >= 0xf900 && code <= 0xfaff) || // CJK compatibility ideographs
    (code >= 0xfe10 && code <= 0xfe6f) || // CJK compatibility forms
    (code >= 0xff01 && code <= 0xff60) || // Fullwidth ASCII variants
    (code >= 0xffe0 && code <= 0xffe6) || // Fullwidth symbols
    (code >= 0x20000 && code <= 0x2fa1f) // CJK extension B+
  );
}

type Piece = { text: string; width: number };

function* pieces(text: string): Generator<Piece> {
  let i = 0;
  while (i < text.length) {
    ANSI_SEQUENCE.lastIndex = i;
    const escape = ANSI_SEQUENCE.exec(text);
    if (escape) {
      yield { text: escape[0], width: 0 };
      i += escape[0].length;
      continue;
    }
    const code = text.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(code);
    yield { text: char, width: isFullWidth(code) ? 2 : 1 };
    i += char.length;
  }
}

/** Columns `text` occupies on a terminal. */
export function displayWidth(text: string): number {
  let width = 0;
  for (const piece of pieces(text)) width += piece.width;
  return width;
}

/**
 * Cut `text` to at most `maxWidth` columns, ending in "…" when cut. Escape
 * sequences are kept, and a cut styled line is closed with a reset.
 */
export function truncateToWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (displayWidth(text) <= maxWidth) return text;

  let out = "";
  let width = 0;
  let styled = false;
  for (const piece of pieces(text)) {
    if (piece.width === 0) {
      out += piece.text;
      styled = true;
      continue;
    }
    // One column stays free for the ellipsis.
    if (width + piece.width > maxWidth - 1) break;
    out += piece.text;
    width += piece.width;
  }
  return `${out}…${styled ? RESET : ""}`;
}
