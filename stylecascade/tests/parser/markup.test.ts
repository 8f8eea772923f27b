import { describe, test, expect } from "vitest";
import { parseMarkup, parseMarkupFragment } from "../../src/parser/index.js";
import { StyleEventEmitter } from "../../src/events/emitter.js";
import {
  elementNode,
  textNode,
  MalformedAttributeError,
  MismatchedTagError,
  OutOfBoundsError,
  ParseErrorKind,
  StyleParseError,
  UnexpectedEofError,
  type StyleEvent,
} from "../../src/types/index.js";

describe("parseMarkup", () => {
  test("parses an element with a text child", () => {
    expect(parseMarkup("<p>hi</p>")).toEqual(
      elementNode("p", new Map(), [textNode("hi")]),
    );
  });

  test("parses double- and single-quoted attributes", () => {
    const node = parseMarkup(`<div id="x" class='a b'></div>`);
    expect(node).toEqual(
      elementNode("div", new Map([["id", "x"], ["class", "a b"]]), []),
    );
  });

  test("repeated attribute names keep the last value", () => {
    const node = parseMarkup(`<a x="1" x="2"></a>`);
    expect(node.kind).toBe("element");
    if (node.kind !== "element") return;
    expect(node.data.attributes.get("x")).toBe("2");
    expect(node.data.attributes.size).toBe(1);
  });

  test("parses nested elements separated by whitespace", () => {
    const node = parseMarkup("<div>\n  <p>one</p>\n  <p>two</p>\n</div>");
    expect(node).toEqual(
      elementNode("div", new Map(), [
        elementNode("p", new Map(), [textNode("one")]),
        elementNode("p", new Map(), [textNode("two")]),
      ]),
    );
  });

  test("text runs drop leading whitespace and keep trailing whitespace", () => {
    expect(parseMarkup("<p> hello world </p>")).toEqual(
      elementNode("p", new Map(), [textNode("hello world ")]),
    );
  });

  test("mixes text and element children in source order", () => {
    expect(parseMarkup("<div>a<b>c</b>d</div>")).toEqual(
      elementNode("div", new Map(), [
        textNode("a"),
        elementNode("b", new Map(), [textNode("c")]),
        textNode("d"),
      ]),
    );
  });

  test("parses a bare text document", () => {
    expect(parseMarkup("just text")).toEqual(textNode("just text"));
  });

  test("skips leading whitespace before the root", () => {
    expect(parseMarkup("  \n<b>x</b>")).toEqual(
      elementNode("b", new Map(), [textNode("x")]),
    );
  });

  test("returns only the first top-level node", () => {
    expect(parseMarkup("<a></a><b></b>")).toEqual(elementNode("a"));
  });
});

describe("parseMarkup errors", () => {
  test("rejects a mismatched closing tag", () => {
    expect(() => parseMarkup("<div></span>")).toThrow(MismatchedTagError);
  });

  test("reports where the closing tag was expected", () => {
    let caught: unknown;
    try {
      parseMarkup("<div></span>");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StyleParseError);
    if (!(caught instanceof StyleParseError)) return;
    expect(caught.kind).toBe(ParseErrorKind.UNCLOSED_OR_MISMATCHED_TAG);
    expect(caught.message).toBe('Expected closing tag "</div>" at line 1, column 6');
    expect(caught.offset).toBe(5);
  });

  test("tag names are case-sensitive", () => {
    expect(() => parseMarkup("<DIV></div>")).toThrow(MismatchedTagError);
  });

  test("rejects an unclosed element", () => {
    expect(() => parseMarkup("<div>")).toThrow(UnexpectedEofError);
    expect(() => parseMarkup("<div>text")).toThrow(UnexpectedEofError);
  });

  test("rejects a start tag cut off by end of input", () => {
    expect(() => parseMarkup(`<div id="x"`)).toThrow(UnexpectedEofError);
  });

  test("rejects an unquoted attribute value", () => {
    expect(() => parseMarkup("<div id=x></div>")).toThrow(MalformedAttributeError);
  });

  test("rejects an attribute without '='", () => {
    expect(() => parseMarkup(`<div id"x"></div>`)).toThrow(MalformedAttributeError);
  });

  test("rejects mismatched attribute quotes", () => {
    expect(() => parseMarkup(`<div id="x'></div>`)).toThrow(MalformedAttributeError);
  });

  test("rejects empty input", () => {
    expect(() => parseMarkup("")).toThrow(OutOfBoundsError);
  });
});

describe("parseMarkupFragment", () => {
  test("wraps top-level siblings in a synthetic root", () => {
    expect(parseMarkupFragment("<p>a</p><p>b</p>")).toEqual(
      elementNode("root", new Map(), [
        elementNode("p", new Map(), [textNode("a")]),
        elementNode("p", new Map(), [textNode("b")]),
      ]),
    );
  });

  test("uses the configured root tag", () => {
    const root = parseMarkupFragment("text", { rootTag: "body" });
    expect(root.data.tagName).toBe("body");
    expect(root.children).toEqual([textNode("text")]);
  });

  test("rejects input that would close the synthetic root early", () => {
    expect(() => parseMarkupFragment("<p>a</p></root><p>b</p>")).toThrow(
      'Fragment must not contain the closing root tag "</root>"',
    );
    expect(() => parseMarkupFragment("x</body>", { rootTag: "body" })).toThrow(
      'Fragment must not contain the closing root tag "</body>"',
    );
  });

  test("rejects a root tag the markup grammar cannot express", () => {
    expect(() => parseMarkupFragment("", { rootTag: "my-root" })).toThrow(
      'Invalid fragment root tag "my-root"',
    );
  });
});

describe("markup events", () => {
  test("emits markup_parsed with node counts", () => {
    const emitter = new StyleEventEmitter();
    const events: StyleEvent[] = [];
    emitter.onEvent = (e) => events.push(e);

    parseMarkup("<div><p>hi</p>text</div>", { emitter });

    expect(events).toHaveLength(1);
    expect(events[0]?.kind).toBe("markup_parsed");
    expect(events[0]?.data).toEqual({ elementCount: 2, textCount: 2 });
  });

  test("emits parse_failed before rethrowing", () => {
    const emitter = new StyleEventEmitter();
    const events: StyleEvent[] = [];
    emitter.onEvent = (e) => events.push(e);

    expect(() => parseMarkup("<div>", { emitter })).toThrow(UnexpectedEofError);
    expect(events).toHaveLength(1);
    expect(events[0]?.kind).toBe("parse_failed");
    expect(events[0]?.data).toMatchObject({
      source: "markup",
      errorKind: ParseErrorKind.UNEXPECTED_EOF,
    });
  });
});
