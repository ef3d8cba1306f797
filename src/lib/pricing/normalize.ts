const CURRENCY_SYMBOLS = /[€$£]/g;
const UNIT_SUFFIX = /\/\s*τεμ\.?/g;
const WHITESPACE = /\s/g;
const DECIMAL_LITERAL = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Convert scraped price text into a number.
 *
 * Strips currency symbols, the per-piece unit suffix and every whitespace
 * character, then reads the first comma as the decimal point. Anything that
 * is not a plain unsigned decimal afterwards is unparseable.
 */
export function cleanPrice(text: string | null | undefined): number | null {
  if (!text) return null;

  const stripped = text
    .replace(UNIT_SUFFIX, "")
    .replace(CURRENCY_SYMBOLS, "")
    .replace(WHITESPACE, "")
    .replace(",", ".");

  if (!DECIMAL_LITERAL.test(stripped)) return null;
  const value = Number(stripped);
  return Number.isFinite(value) ? value : null;
}

/**
 * Keep the digits of `text` plus a single decimal separator.
 *
 * The first comma or dot encountered is committed to as the decimal mark and
 * written as a comma; every later comma or dot is dropped as thousands noise.
 * So "1.234,56" becomes "1,23456" and "1,234.56" becomes "1,23456".
 */
export function extractDigitsWithSeparator(text: string): string {
  let digits = "";
  let separatorFound = false;

  for (const char of text) {
    if (char >= "0" && char <= "9") {
      digits += char;
    } else if ((char === "," || char === ".") && !separatorFound) {
      digits += ",";
      separatorFound = true;
    }
  }

  return digits;
}
