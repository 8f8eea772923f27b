export { Scanner, isWhitespace, isAsciiLetter, isAsciiDigit, isAsciiAlphanumeric } from "./scanner.js";
export { parseMarkup, parseMarkupFragment } from "./markup.js";
export type { MarkupParseOptions } from "./markup.js";
