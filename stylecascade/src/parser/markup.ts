import {
  countNodes,
  elementNode,
  textNode,
  MalformedAttributeError,
  MismatchedTagError,
  StyleEventKind,
  UnexpectedEofError,
  type ElementNode,
  type Node,
  type TextNode,
} from "../types/index.js";
import { withFailureEvent, type StyleEventEmitter } from "../events/emitter.js";
import { Scanner, isAsciiAlphanumeric } from "./scanner.js";

export interface MarkupParseOptions {
  emitter?: StyleEventEmitter;
  /** Tag of the synthetic element wrapping a fragment. */
  rootTag?: string;
}

const DEFAULT_ROOT_TAG = "root";
const TAG_NAME = /^[A-Za-z0-9]+$/;

function parseNodeFrom(input: string): Node {
  const scanner = new Scanner(input);
  return parseNode();

  function parseNode(): Node {
    scanner.skipWhitespace();
    if (scanner.peek() === "<") {
      return parseElement();
    }
    return parseText();
  }

  function parseText(): TextNode {
    return textNode(scanner.consumeWhile((c) => c !== "<"));
  }

  function parseTagName(): string {
    return scanner.consumeWhile(isAsciiAlphanumeric);
  }

  function parseAttribute(attributes: Map<string, string>): void {
    const start = scanner.position();
    const name = parseTagName();
    if (name === "") {
      throw new MalformedAttributeError("Expected an attribute name", start);
    }
    scanner.expect("=", (pos) =>
      new MalformedAttributeError(`Expected '=' after attribute "${name}"`, pos),
    );

    const quotePos = scanner.position();
    const quote = scanner.atEnd() ? "" : scanner.peek();
    if (quote !== '"' && quote !== "'") {
      throw new MalformedAttributeError(
        `Expected a quoted value for attribute "${name}"`,
        quotePos,
      );
    }
    scanner.advance();
    const value = scanner.consumeWhile((c) => c !== quote);
    scanner.expect(quote, (pos) =>
      new MalformedAttributeError(`Unterminated value for attribute "${name}"`, pos),
    );

    // Repeated names overwrite
    attributes.set(name, value);
  }

  function parseAttributes(): Map<string, string> {
    const attributes = new Map<string, string>();
    while (true) {
      scanner.skipWhitespace();
      if (scanner.atEnd()) {
        throw new UnexpectedEofError("Unexpected end of input inside a start tag", scanner.position());
      }
      if (scanner.peek() === ">") break;
      parseAttribute(attributes);
    }
    return attributes;
  }

  function parseElement(): ElementNode {
    scanner.advance(); // '<', checked by parseNode
    const tagName = parseTagName();
    const attributes = parseAttributes();
    scanner.advance(); // '>', where parseAttributes stopped

    const children = parseElements();

    const closing = `</${tagName}>`;
    if (!scanner.startsWith(closing)) {
      throw new MismatchedTagError(tagName, scanner.position());
    }
    for (let i = 0; i < closing.length; i++) {
      scanner.advance();
    }

    return elementNode(tagName, attributes, children);
  }

  function parseElements(): Node[] {
    const nodes: Node[] = [];
    while (true) {
      scanner.skipWhitespace();
      if (scanner.atEnd()) {
        throw new UnexpectedEofError("Unexpected end of input before closing tag", scanner.position());
      }
      if (scanner.startsWith("</")) break;
      nodes.push(parseNode());
    }
    return nodes;
  }
}

/**
 * Parses a single markup node. Anything after the first complete node is
 * ignored; use {@link parseMarkupFragment} for several top-level siblings.
 */
export function parseMarkup(input: string, options: MarkupParseOptions = {}): Node {
  const { emitter } = options;
  const node = withFailureEvent(emitter, "markup", () => parseNodeFrom(input));

  if (emitter) {
    const counts = countNodes(node);
    emitter.emit({
      kind: StyleEventKind.MARKUP_PARSED,
      timestamp: new Date(),
      data: { elementCount: counts.elements, textCount: counts.texts },
    });
  }
  return node;
}

/**
 * Parses several top-level siblings under a synthetic `rootTag` element.
 * The input must not contain the root's own closing tag.
 */
export function parseMarkupFragment(
  input: string,
  options: MarkupParseOptions = {},
): ElementNode {
  const rootTag = options.rootTag ?? DEFAULT_ROOT_TAG;
  if (!TAG_NAME.test(rootTag)) {
    throw new Error(`Invalid fragment root tag "${rootTag}": use ASCII letters and digits`);
  }
  const closing = `</${rootTag}>`;
  if (input.includes(closing)) {
    throw new Error(`Fragment must not contain the closing root tag "${closing}"`);
  }
  const node = parseMarkup(`<${rootTag}>${input}${closing}`, options);
  if (node.kind !== "element") {
    throw new Error(`Fragment root "${rootTag}" did not parse as an element`);
  }
  return node;
}
