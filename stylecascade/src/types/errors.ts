export const ParseErrorKind = {
  OUT_OF_BOUNDS: "out_of_bounds",
  UNEXPECTED_EOF: "unexpected_eof",
  MALFORMED_ATTRIBUTE: "malformed_attribute",
  UNCLOSED_OR_MISMATCHED_TAG: "unclosed_or_mismatched_tag",
  INVALID_COLOR: "invalid_color",
  INVALID_NUMBER: "invalid_number",
  MALFORMED_DECLARATION: "malformed_declaration",
  UNTERMINATED_BLOCK: "unterminated_block",
} as const;

export type ParseErrorKind = (typeof ParseErrorKind)[keyof typeof ParseErrorKind];

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export class StyleParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(message: string, kind: ParseErrorKind, position: SourcePosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = "StyleParseError";
    this.kind = kind;
    this.offset = position.offset;
    this.line = position.line;
    this.column = position.column;
  }
}

export class OutOfBoundsError extends StyleParseError {
  constructor(message: string, position: SourcePosition) {
    super(message, ParseErrorKind.OUT_OF_BOUNDS, position);
    this.name = "OutOfBoundsError";
  }
}

export class UnexpectedEofError extends StyleParseError {
  constructor(message: string, position: SourcePosition) {
    super(message, ParseErrorKind.UNEXPECTED_EOF, position);
    this.name = "UnexpectedEofError";
  }
}

export class MalformedAttributeError extends StyleParseError {
  constructor(message: string, position: SourcePosition) {
    super(message, ParseErrorKind.MALFORMED_ATTRIBUTE, position);
    this.name = "MalformedAttributeError";
  }
}

export class MismatchedTagError extends StyleParseError {
  readonly expected: string;

  constructor(expected: string, position: SourcePosition) {
    super(`Expected closing tag "</${expected}>"`, ParseErrorKind.UNCLOSED_OR_MISMATCHED_TAG, position);
    this.name = "MismatchedTagError";
    this.expected = expected;
  }
}

export class InvalidColorError extends StyleParseError {
  constructor(raw: string, position: SourcePosition) {
    super(`Invalid color "${raw}": expected # followed by 6 hex digits`, ParseErrorKind.INVALID_COLOR, position);
    this.name = "InvalidColorError";
  }
}

export class InvalidNumberError extends StyleParseError {
  constructor(raw: string, position: SourcePosition) {
    super(`Invalid number in size value "${raw}"`, ParseErrorKind.INVALID_NUMBER, position);
    this.name = "InvalidNumberError";
  }
}

export class MalformedDeclarationError extends StyleParseError {
  constructor(message: string, position: SourcePosition) {
    super(message, ParseErrorKind.MALFORMED_DECLARATION, position);
    this.name = "MalformedDeclarationError";
  }
}

export class UnterminatedBlockError extends StyleParseError {
  constructor(position: SourcePosition, message = 'Declaration block is missing its closing "}"') {
    super(message, ParseErrorKind.UNTERMINATED_BLOCK, position);
    this.name = "UnterminatedBlockError";
  }
}
