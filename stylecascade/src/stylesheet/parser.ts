import {
  colorValue,
  keywordValue,
  sizeValue,
  InvalidColorError,
  InvalidNumberError,
  MalformedDeclarationError,
  StyleEventKind,
  Unit,
  UnterminatedBlockError,
  type Declaration,
  type Rule,
  type Selector,
  type SourcePosition,
  type Stylesheet,
  type Value,
} from "../types/index.js";
import { withFailureEvent, type StyleEventEmitter } from "../events/emitter.js";
import { Scanner, isAsciiDigit, isAsciiLetter, isAsciiAlphanumeric } from "../parser/scanner.js";

export interface StylesheetParseOptions {
  emitter?: StyleEventEmitter;
}

const START_OF_INPUT: SourcePosition = { offset: 0, line: 1, column: 1 };

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;
const DECIMAL = /^[0-9]+(\.[0-9]*)?([eE][+-]?[0-9]+)?$/;

// Checked in order; "rem" must come before "em".
const SIZE_SUFFIXES: ReadonlyArray<readonly [string, Unit]> = [
  ["px", Unit.PX],
  ["%", Unit.PERCENT],
  ["rem", Unit.REM],
  ["em", Unit.EM],
];

function isIdentifierChar(ch: string): boolean {
  return isAsciiAlphanumeric(ch) || ch === "-" || ch === "_";
}

/**
 * Classifies a raw declaration value by its first character: `#` is a
 * color, a digit is a size, anything else is kept verbatim as a keyword.
 */
export function parseValue(raw: string, position: SourcePosition = START_OF_INPUT): Value {
  const first = raw.charAt(0);

  if (first === "#") {
    if (!HEX_COLOR.test(raw)) {
      throw new InvalidColorError(raw, position);
    }
    return colorValue(
      parseInt(raw.slice(1, 3), 16),
      parseInt(raw.slice(3, 5), 16),
      parseInt(raw.slice(5, 7), 16),
    );
  }

  if (isAsciiDigit(first)) {
    let numeric = raw;
    let unit: Unit = Unit.NONE;
    for (const [suffix, suffixUnit] of SIZE_SUFFIXES) {
      if (raw.endsWith(suffix)) {
        numeric = raw.slice(0, raw.length - suffix.length);
        unit = suffixUnit;
        break;
      }
    }
    if (!DECIMAL.test(numeric)) {
      throw new InvalidNumberError(raw, position);
    }
    return sizeValue(Number(numeric), unit);
  }

  return keywordValue(raw);
}

function parseRulesFrom(input: string): Rule[] {
  const scanner = new Scanner(input);
  const rules: Rule[] = [];

  while (true) {
    scanner.skipWhitespace();
    if (scanner.atEnd()) break;
    rules.push(parseRule());
  }

  return rules;

  function parseIdentifier(): string {
    return scanner.consumeWhile(isIdentifierChar);
  }

  function parseSelector(): Selector {
    let tag: string | undefined;
    let id: string | undefined;
    const classes: string[] = [];

    while (!scanner.atEnd()) {
      const ch = scanner.peek();
      if (ch === "#") {
        scanner.advance();
        id = parseIdentifier();
      } else if (ch === ".") {
        scanner.advance();
        classes.push(parseIdentifier());
      } else if (ch === "*") {
        scanner.advance();
      } else if (isAsciiLetter(ch)) {
        const name = parseIdentifier();
        if (tag === undefined) tag = name;
      } else {
        break;
      }
    }

    const selector: { tag?: string; id?: string; classes: string[] } = { classes };
    if (tag !== undefined) selector.tag = tag;
    if (id !== undefined) selector.id = id;
    return selector;
  }

  function parseSelectorList(): Selector[] {
    const selectors: Selector[] = [];
    while (true) {
      scanner.skipWhitespace();
      selectors.push(parseSelector());
      scanner.skipWhitespace();
      if (scanner.atEnd() || scanner.peek() !== ",") break;
      scanner.advance();
    }
    return selectors;
  }

  function parseDeclaration(): Declaration {
    const start = scanner.position();
    const property = parseIdentifier();
    if (property === "") {
      throw new MalformedDeclarationError("Expected a property name", start);
    }

    scanner.skipWhitespace();
    scanner.expect(":", (pos) =>
      new MalformedDeclarationError(`Expected ':' after property "${property}"`, pos),
    );
    scanner.skipWhitespace();

    const valuePos = scanner.position();
    const raw = scanner.consumeWhile((c) => c !== ";").trimEnd();
    scanner.expect(";", (pos) =>
      new MalformedDeclarationError(`Expected ';' after value of "${property}"`, pos),
    );
    if (raw === "") {
      throw new MalformedDeclarationError(`Missing value for property "${property}"`, valuePos);
    }

    return { property, value: parseValue(raw, valuePos) };
  }

  function parseDeclarationBlock(): Declaration[] {
    scanner.expect("{", (pos) =>
      new UnterminatedBlockError(pos, "Expected '{' to open a declaration block"),
    );

    const declarations: Declaration[] = [];
    while (true) {
      scanner.skipWhitespace();
      if (scanner.atEnd()) {
        throw new UnterminatedBlockError(scanner.position());
      }
      if (scanner.peek() === "}") {
        scanner.advance();
        break;
      }
      declarations.push(parseDeclaration());
    }
    return declarations;
  }

  function parseRule(): Rule {
    const selectors = parseSelectorList();
    scanner.skipWhitespace();
    const declarations = parseDeclarationBlock();
    return { selectors, declarations };
  }
}

export function parseStylesheet(
  input: string,
  options: StylesheetParseOptions = {},
): Stylesheet {
  const { emitter } = options;
  const rules = withFailureEvent(emitter, "stylesheet", () => parseRulesFrom(input));

  if (emitter) {
    emitter.emit({
      kind: StyleEventKind.STYLESHEET_PARSED,
      timestamp: new Date(),
      data: {
        ruleCount: rules.length,
        declarationCount: rules.reduce((n, rule) => n + rule.declarations.length, 0),
      },
    });
  }
  return { rules };
}
