import type {
  ElementData,
  Node,
  Rule,
  Selector,
  Specificity,
  StyledNode,
  Stylesheet,
  Value,
} from "../types/index.js";
import { elementClasses, elementId, StyleEventKind } from "../types/index.js";
import type { StyleEventEmitter } from "../events/emitter.js";

export interface ResolveOptions {
  emitter?: StyleEventEmitter;
}

export interface MatchedRule {
  specificity: Specificity;
  rule: Rule;
}

export function matches(element: ElementData, selector: Selector): boolean {
  if (selector.tag !== undefined && selector.tag !== element.tagName) {
    return false;
  }

  // An element without an id never satisfies an id selector
  if (selector.id !== undefined && selector.id !== elementId(element)) {
    return false;
  }

  if (selector.classes.length > 0) {
    const classes = elementClasses(element);
    return selector.classes.every((c) => classes.has(c));
  }

  return true;
}

export function specificity(selector: Selector): Specificity {
  return {
    ids: selector.id !== undefined ? 1 : 0,
    classes: new Set(selector.classes).size,
    tags: selector.tag !== undefined ? 1 : 0,
  };
}

export function compareSpecificity(a: Specificity, b: Specificity): number {
  return a.ids - b.ids || a.classes - b.classes || a.tags - b.tags;
}

/**
 * Rules matching the element, in stylesheet order. A rule takes the
 * specificity of the first selector in its list that matches.
 */
export function matchingRules(element: ElementData, stylesheet: Stylesheet): MatchedRule[] {
  const matched: MatchedRule[] = [];
  for (const rule of stylesheet.rules) {
    const selector = rule.selectors.find((s) => matches(element, s));
    if (selector !== undefined) {
      matched.push({ specificity: specificity(selector), rule });
    }
  }
  return matched;
}

function cascadeMatched(matched: readonly MatchedRule[]): Map<string, Value> {
  // Array.prototype.sort is stable, so equal specificity keeps source order
  // and the later rule applies last.
  const sorted = [...matched].sort((a, b) =>
    compareSpecificity(a.specificity, b.specificity),
  );

  const properties = new Map<string, Value>();
  for (const { rule } of sorted) {
    for (const decl of rule.declarations) {
      properties.set(decl.property, decl.value);
    }
  }
  return properties;
}

export function cascade(element: ElementData, stylesheet: Stylesheet): Map<string, Value> {
  return cascadeMatched(matchingRules(element, stylesheet));
}

export function styleTree(
  node: Node,
  stylesheet: Stylesheet,
  options: ResolveOptions = {},
): StyledNode {
  switch (node.kind) {
    case "text":
      return { node, properties: new Map(), children: [] };
    case "element": {
      const matched = matchingRules(node.data, stylesheet);
      const properties = cascadeMatched(matched);
      if (options.emitter) {
        options.emitter.emit({
          kind: StyleEventKind.ELEMENT_STYLED,
          timestamp: new Date(),
          data: {
            tagName: node.data.tagName,
            matchedRules: matched.length,
            propertyCount: properties.size,
          },
        });
      }
      return {
        node,
        properties,
        children: node.children.map((child) => styleTree(child, stylesheet, options)),
      };
    }
  }
}

export function resolveStyles(
  root: Node,
  stylesheet: Stylesheet,
  options: ResolveOptions = {},
): StyledNode {
  return styleTree(root, stylesheet, options);
}
