import type { ParseErrorKind } from "./errors.js";

export const StyleEventKind = {
  MARKUP_PARSED: "markup_parsed",
  STYLESHEET_PARSED: "stylesheet_parsed",
  ELEMENT_STYLED: "element_styled",
  PARSE_FAILED: "parse_failed",
} as const;

export type StyleEventKind = (typeof StyleEventKind)[keyof typeof StyleEventKind];

export interface MarkupParsedData {
  elementCount: number;
  textCount: number;
}

export interface StylesheetParsedData {
  ruleCount: number;
  declarationCount: number;
}

export interface ElementStyledData {
  tagName: string;
  matchedRules: number;
  propertyCount: number;
}

export interface ParseFailedData {
  source: "markup" | "stylesheet";
  errorKind: ParseErrorKind;
  message: string;
}

export type StyleEvent =
  | { kind: typeof StyleEventKind.MARKUP_PARSED; timestamp: Date; data: MarkupParsedData }
  | { kind: typeof StyleEventKind.STYLESHEET_PARSED; timestamp: Date; data: StylesheetParsedData }
  | { kind: typeof StyleEventKind.ELEMENT_STYLED; timestamp: Date; data: ElementStyledData }
  | { kind: typeof StyleEventKind.PARSE_FAILED; timestamp: Date; data: ParseFailedData };
