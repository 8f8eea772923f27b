export interface Selector {
  readonly tag?: string;
  readonly id?: string;
  readonly classes: readonly string[];
}

export interface Specificity {
  readonly ids: 0 | 1;
  readonly classes: number; // distinct class tokens
  readonly tags: 0 | 1;
}

export const Unit = {
  PX: "px",
  PERCENT: "percent",
  EM: "em",
  REM: "rem",
  NONE: "none",
} as const;

export type Unit = (typeof Unit)[keyof typeof Unit];

export interface KeywordValue {
  readonly kind: "keyword";
  readonly text: string;
}

export interface SizeValue {
  readonly kind: "size";
  readonly value: number;
  readonly unit: Unit;
}

export interface ColorValue {
  readonly kind: "color";
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export type Value = KeywordValue | SizeValue | ColorValue;

export function keywordValue(text: string): KeywordValue {
  return { kind: "keyword", text };
}

export function sizeValue(value: number, unit: Unit): SizeValue {
  return { kind: "size", value, unit };
}

export function colorValue(r: number, g: number, b: number): ColorValue {
  return { kind: "color", r, g, b };
}

export interface Declaration {
  readonly property: string;
  readonly value: Value;
}

export interface Rule {
  readonly selectors: readonly Selector[];
  readonly declarations: readonly Declaration[];
}

export interface Stylesheet {
  readonly rules: readonly Rule[];
}

const UNIT_SUFFIX: Record<Unit, string> = {
  px: "px",
  percent: "%",
  em: "em",
  rem: "rem",
  none: "",
};

function hexByte(n: number): string {
  return n.toString(16).padStart(2, "0");
}

export function formatValue(value: Value): string {
  switch (value.kind) {
    case "keyword":
      return value.text;
    case "size":
      return `${value.value}${UNIT_SUFFIX[value.unit]}`;
    case "color":
      return `#${hexByte(value.r)}${hexByte(value.g)}${hexByte(value.b)}`;
  }
}
