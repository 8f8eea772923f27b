export interface ElementData {
  readonly tagName: string;
  readonly attributes: ReadonlyMap<string, string>;
}

export interface TextNode {
  readonly kind: "text";
  readonly content: string;
}

export interface ElementNode {
  readonly kind: "element";
  readonly data: ElementData;
  readonly children: readonly Node[];
}

export type Node = TextNode | ElementNode;

export function textNode(content: string): TextNode {
  return { kind: "text", content };
}

export function elementNode(
  tagName: string,
  attributes: ReadonlyMap<string, string> = new Map(),
  children: readonly Node[] = [],
): ElementNode {
  return { kind: "element", data: { tagName, attributes }, children };
}

export function elementId(data: ElementData): string | undefined {
  return data.attributes.get("id");
}

export function elementClasses(data: ElementData): Set<string> {
  const classAttr = data.attributes.get("class");
  if (classAttr === undefined) return new Set();
  return new Set(classAttr.split(/\s+/).filter((c) => c !== ""));
}

/** Counts elements and text runs in a document tree, root included. */
export function countNodes(node: Node): { elements: number; texts: number } {
  if (node.kind === "text") return { elements: 0, texts: 1 };
  let elements = 1;
  let texts = 0;
  for (const child of node.children) {
    const counts = countNodes(child);
    elements += counts.elements;
    texts += counts.texts;
  }
  return { elements, texts };
}
