import type { Node } from "./dom.js";
import type { Value } from "./stylesheet.js";

export type PropertyMap = ReadonlyMap<string, Value>;

export interface StyledNode {
  readonly node: Node;
  readonly properties: PropertyMap;
  readonly children: readonly StyledNode[];
}

/**
 * Reads a keyword property, falling back when the property is missing or
 * holds a size or color.
 */
export function getKeyword(
  properties: PropertyMap,
  name: string,
  fallback = "",
): string {
  const value = properties.get(name);
  if (value?.kind === "keyword") return value.text;
  return fallback;
}
